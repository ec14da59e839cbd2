/**
 * OpenAI speech
 *
 * Speech-to-text through the Whisper transcription endpoint and
 * text-to-speech through the audio speech endpoint, returned as WAV.
 */

import OpenAI, { toFile } from 'openai';
import { createLogger, errorMessage } from '@visitor-kiosk/core';
import type { SpeechAdapter, TranscriptionResult } from '../index.js';

const log = createLogger('OpenAiSpeechAdapter');

type AudioFile = Awaited<ReturnType<typeof toFile>>;

/** The part of the OpenAI client the adapter calls. */
export interface OpenAiAudioClient {
  audio: {
    transcriptions: {
      create(body: { file: AudioFile; model: string; language?: string }): PromiseLike<{ text: string }>;
    };
    speech: {
      create(body: {
        input: string;
        model: string;
        voice: 'alloy';
        response_format: 'wav';
      }): PromiseLike<{ arrayBuffer(): Promise<ArrayBuffer> }>;
    };
  };
}

export interface OpenAiSpeechConfig {
  apiKey: string;
  sttModel?: string;
  ttsModel?: string;
  timeoutMs?: number;
}

export class OpenAiSpeechAdapter implements SpeechAdapter {
  name = 'OpenAI';

  private client: OpenAiAudioClient;
  private sttModel: string;
  private ttsModel: string;

  constructor(config: OpenAiSpeechConfig, client?: OpenAiAudioClient) {
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs ?? 30000, maxRetries: 1 });
    this.sttModel = config.sttModel || 'whisper-1';
    this.ttsModel = config.ttsModel || 'tts-1';
  }

  async transcribe(audio: Buffer, language: string, filename = 'speech.wav'): Promise<TranscriptionResult> {
    try {
      const file = await toFile(audio, filename);
      const result = await this.client.audio.transcriptions.create({
        file,
        model: this.sttModel,
        // Whisper takes ISO-639-1 codes: "en-US" -> "en"
        language: language.split('-')[0].toLowerCase(),
      });
      return { ok: true, transcript: result.text, language };
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Transcription failed');
      return { ok: false, error: errorMessage(err) };
    }
  }

  async synthesize(text: string, _language: string): Promise<Buffer | null> {
    try {
      const response = await this.client.audio.speech.create({
        input: text,
        model: this.ttsModel,
        voice: 'alloy',
        response_format: 'wav',
      });
      return Buffer.from(await response.arrayBuffer());
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Speech synthesis failed');
      return null;
    }
  }
}
