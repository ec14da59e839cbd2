import type { SpeechAdapter, TranscriptionResult } from '../index.js';

export class DemoSpeechAdapter implements SpeechAdapter {
  name = 'Demo (no speech)';

  async transcribe(): Promise<TranscriptionResult> {
    return { ok: false, error: 'Speech provider not configured' };
  }

  async synthesize(): Promise<Buffer | null> {
    return null;
  }
}
