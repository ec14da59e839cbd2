/**
 * OCR.space document OCR
 *
 * Posts the uploaded image to the OCR.space parse endpoint and returns the
 * recognized text. Any transport, HTTP or engine error is reported as a
 * failed result so the route can answer with its fallback fields.
 *
 * @see https://ocr.space/OCRAPI
 */

import { createLogger, errorMessage } from '@visitor-kiosk/core';
import type { DocumentOcrAdapter, OcrResult } from '../index.js';
import { splitLines } from '../id-fields.js';

const log = createLogger('OcrSpaceAdapter');

export interface OcrSpaceConfig {
  apiKey: string;
  /** Defaults to the public endpoint */
  apiUrl?: string;
  /** OCR.space language code, e.g. "eng" */
  language?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeError(body: Record<string, unknown>): string {
  const message = body.ErrorMessage;
  if (Array.isArray(message)) return message.filter((m) => typeof m === 'string').join('; ');
  if (typeof message === 'string' && message) return message;
  return 'OCR engine reported an error';
}

/** Text of every parsed page, or the engine's error. */
export function parseOcrSpaceResponse(body: unknown): OcrResult {
  if (!isRecord(body)) return { ok: false, error: 'Unexpected OCR response' };
  if (body.IsErroredOnProcessing === true) return { ok: false, error: describeError(body) };

  const pages = Array.isArray(body.ParsedResults) ? body.ParsedResults : [];
  const texts = pages
    .filter(isRecord)
    .map((page) => page.ParsedText)
    .filter((text): text is string => typeof text === 'string');

  if (texts.length === 0) return { ok: false, error: 'No text found in image' };

  const text = texts.join('\n');
  return { ok: true, text, lines: splitLines(text) };
}

export class OcrSpaceAdapter implements DocumentOcrAdapter {
  name = 'OCR.space';

  private apiKey: string;
  private apiUrl: string;
  private language: string;
  private timeoutMs: number;

  constructor(config: OcrSpaceConfig) {
    this.apiKey = config.apiKey;
    this.apiUrl = config.apiUrl || 'https://api.ocr.space/parse/image';
    this.language = config.language || 'eng';
    this.timeoutMs = config.timeoutMs ?? 15000;
  }

  async extract(image: Buffer, filename = 'document.png'): Promise<OcrResult> {
    const form = new FormData();
    form.append('language', this.language);
    form.append('isOverlayRequired', 'false');
    form.append('file', new Blob([image]), filename);

    try {
      const response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: { apikey: this.apiKey },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        log.warn({ status: response.status }, 'OCR request rejected');
        return { ok: false, error: `OCR service responded with HTTP ${response.status}` };
      }

      return parseOcrSpaceResponse(await response.json());
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'OCR request failed');
      return { ok: false, error: errorMessage(err) };
    }
  }
}
