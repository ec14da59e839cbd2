import { createPool, MemoryKioskStore, PgKioskStore, type KioskStore } from '@visitor-kiosk/db';
import { DemoOcrAdapter, OcrSpaceAdapter, type DocumentOcrAdapter } from '@visitor-kiosk/document-ocr';
import { DemoSpeechAdapter, OpenAiSpeechAdapter, type SpeechAdapter } from '@visitor-kiosk/speech';
import {
  ConsoleNotificationAdapter,
  NotificationRouter,
  SendGridEmailAdapter,
} from '@visitor-kiosk/notifications';
import type { AppConfig } from './config.js';

/**
 * Everything a request handler needs, built once at startup and handed to
 * Fastify. Interview state is not here: it travels with each request.
 */
export interface AppContext {
  store: KioskStore;
  ocr: DocumentOcrAdapter;
  speech: SpeechAdapter;
  notifier: NotificationRouter;
}

/** Receives a line per adapter choice, e.g. Fastify's logger. */
export type StartupLog = (message: string) => void;

export function createStore(config: AppConfig): KioskStore {
  if (config.database.adapter === 'memory') return new MemoryKioskStore();
  return new PgKioskStore(createPool(config.database.url));
}

export function createOcrAdapter(config: AppConfig, log: StartupLog): DocumentOcrAdapter {
  if (config.ocr.adapter === 'ocrspace') {
    if (config.ocr.ocrSpaceApiKey) {
      return new OcrSpaceAdapter({
        apiKey: config.ocr.ocrSpaceApiKey,
        apiUrl: config.ocr.ocrSpaceApiUrl,
        language: config.ocr.language,
      });
    }
    log('OCR_ADAPTER=ocrspace but OCR_SPACE_API_KEY is not set; using demo OCR');
  }
  return new DemoOcrAdapter();
}

export function createSpeechAdapter(config: AppConfig, log: StartupLog): SpeechAdapter {
  if (config.speech.adapter === 'openai') {
    if (config.speech.openaiApiKey) {
      return new OpenAiSpeechAdapter({
        apiKey: config.speech.openaiApiKey,
        sttModel: config.speech.sttModel,
        ttsModel: config.speech.ttsModel,
      });
    }
    log('SPEECH_ADAPTER=openai but OPENAI_API_KEY is not set; using demo speech');
  }
  return new DemoSpeechAdapter();
}

export function createNotifier(config: AppConfig): NotificationRouter {
  const router = new NotificationRouter();
  if (config.notifications.adapter === 'sendgrid') {
    router.registerChannel('EMAIL', new SendGridEmailAdapter(config.notifications.sendgrid));
    // No SMS provider; host texts are logged
    router.registerChannel('SMS', new ConsoleNotificationAdapter());
  } else {
    router.register(new ConsoleNotificationAdapter());
  }
  return router;
}

export function createAppContext(config: AppConfig, log: StartupLog = () => {}): AppContext {
  const context: AppContext = {
    store: createStore(config),
    ocr: createOcrAdapter(config, log),
    speech: createSpeechAdapter(config, log),
    notifier: createNotifier(config),
  };
  log(
    `Adapters: store=${context.store.name}, ocr=${context.ocr.name}, speech=${context.speech.name}, ` +
      `notifications=${context.notifier.adapterNames.join('+')}`,
  );
  return context;
}
