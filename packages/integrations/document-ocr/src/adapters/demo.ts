import type { DocumentOcrAdapter, OcrResult } from '../index.js';

/** Default when no OCR provider is configured; the route answers with demo fields. */
export class DemoOcrAdapter implements DocumentOcrAdapter {
  name = 'Demo (no OCR)';

  async extract(): Promise<OcrResult> {
    return { ok: false, error: 'OCR provider not configured' };
  }
}
