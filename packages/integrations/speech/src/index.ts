export interface SpeechAdapter {
  name: string;
  /** Never throws; failures come back as `{ ok: false }`. */
  transcribe(audio: Buffer, language: string, filename?: string): Promise<TranscriptionResult>;
  /** WAV bytes, or null when speech could not be produced. */
  synthesize(text: string, language: string): Promise<Buffer | null>;
}

export type TranscriptionResult =
  | { ok: true; transcript: string; language: string }
  | { ok: false; error: string };

export { DemoSpeechAdapter } from './adapters/demo.js';
export { OpenAiSpeechAdapter, type OpenAiSpeechConfig, type OpenAiAudioClient } from './adapters/openai.js';
export { wavHeader, SILENT_WAV, type WavFormat } from './wav.js';
