export interface DocumentOcrAdapter {
  name: string;
  /** Read the text of an ID card or passport image. Never throws. */
  extract(image: Buffer, filename?: string): Promise<OcrResult>;
}

export type OcrResult =
  | { ok: true; text: string; lines: string[] }
  | { ok: false; error: string };

export { DemoOcrAdapter } from './adapters/demo.js';
export { OcrSpaceAdapter, parseOcrSpaceResponse, type OcrSpaceConfig } from './adapters/ocr-space.js';
export { extractIdFields, splitLines, type IdFields } from './id-fields.js';
