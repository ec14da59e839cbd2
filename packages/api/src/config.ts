import { getDatabaseUrl } from '@visitor-kiosk/db';

export type StoreAdapter = 'postgres' | 'memory';

export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    nodeEnv: string;
    frontendUrl: string;
    rateLimitMax: number;
    uploadLimitBytes: number;
  };
  database: {
    adapter: StoreAdapter;
    url: string;
  };
  ocr: {
    adapter: string;
    ocrSpaceApiKey?: string;
    ocrSpaceApiUrl?: string;
    language: string;
  };
  speech: {
    adapter: string;
    openaiApiKey?: string;
    sttModel: string;
    ttsModel: string;
  };
  notifications: {
    adapter: string;
    sendgrid: {
      apiKey?: string;
      fromEmail?: string;
    };
  };
  sentry: {
    dsn?: string;
    tracesSampleRate: number;
    release?: string;
  };
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tracesSampleRate = parseFloat(env.SENTRY_TRACES_SAMPLE_RATE || '0.1');

  return {
    server: {
      port: intFromEnv(env.PORT, 3000),
      host: env.HOST || '0.0.0.0',
      logLevel: env.LOG_LEVEL || 'info',
      nodeEnv: env.NODE_ENV || 'development',
      frontendUrl: env.FRONTEND_URL || 'http://localhost:3000',
      rateLimitMax: intFromEnv(env.RATE_LIMIT_MAX, 100),
      uploadLimitBytes: intFromEnv(env.UPLOAD_LIMIT_BYTES, 10 * 1024 * 1024),
    },
    database: {
      adapter: env.STORE_ADAPTER === 'memory' ? 'memory' : 'postgres',
      url: getDatabaseUrl(env),
    },
    ocr: {
      adapter: env.OCR_ADAPTER || 'demo',
      ocrSpaceApiKey: env.OCR_SPACE_API_KEY || undefined,
      ocrSpaceApiUrl: env.OCR_SPACE_API_URL || undefined,
      language: env.OCR_LANGUAGE || 'eng',
    },
    speech: {
      adapter: env.SPEECH_ADAPTER || 'demo',
      openaiApiKey: env.OPENAI_API_KEY || undefined,
      sttModel: env.OPENAI_STT_MODEL || 'whisper-1',
      ttsModel: env.OPENAI_TTS_MODEL || 'tts-1',
    },
    notifications: {
      adapter: env.NOTIFICATION_ADAPTER || 'console',
      sendgrid: {
        apiKey: env.SENDGRID_API_KEY || undefined,
        fromEmail: env.SENDGRID_FROM_EMAIL || undefined,
      },
    },
    sentry: {
      dsn: env.SENTRY_DSN || undefined,
      tracesSampleRate: Number.isNaN(tracesSampleRate) ? 0.1 : tracesSampleRate,
      release: env.SENTRY_RELEASE || undefined,
    },
  };
}
