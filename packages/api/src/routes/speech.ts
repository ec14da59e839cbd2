import type { FastifyPluginAsync } from 'fastify';
import type { Multipart } from '@fastify/multipart';
import { SILENT_WAV } from '@visitor-kiosk/speech';

const DEFAULT_STT_LANGUAGE = 'en-US';
const DEFAULT_TTS_LANGUAGE = 'en';

function fieldValue(part: Multipart | Multipart[] | undefined): string | undefined {
  const first = Array.isArray(part) ? part[0] : part;
  if (!first || first.type !== 'field') return undefined;
  return typeof first.value === 'string' ? first.value : undefined;
}

interface TtsBody {
  text?: unknown;
  language?: unknown;
}

const speechRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/speech/stt: multipart `file` (audio) with an optional `language` field
  fastify.post('/stt', async (request, reply) => {
    const file = await request.file();
    if (!file) {
      return reply.code(400).send({ error: 'file is required' });
    }

    const audio = await file.toBuffer();
    // Only fields sent before the file part are visible here
    const language = fieldValue(file.fields.language) || DEFAULT_STT_LANGUAGE;
    const result = await fastify.ctx.speech.transcribe(audio, language, file.filename);

    if (!result.ok) {
      request.log.warn({ adapter: fastify.ctx.speech.name, error: result.error }, 'Transcription failed');
      return {
        transcript: `This is a dummy transcript of the audio (could not perform real STT: ${result.error})`,
        language,
        filename: file.filename,
      };
    }

    return {
      transcript: result.transcript,
      language: result.language,
      filename: file.filename,
    };
  });

  // POST /api/speech/tts: WAV audio for the given text
  fastify.post<{ Body: TtsBody | null }>('/tts', async (request, reply) => {
    const body: TtsBody = request.body ?? {};
    const { text, language } = body;
    if (typeof text !== 'string') {
      return reply.code(400).send({ error: 'text is required' });
    }

    const lang = typeof language === 'string' && language ? language : DEFAULT_TTS_LANGUAGE;
    const audio = await fastify.ctx.speech.synthesize(text, lang);
    if (!audio) {
      request.log.debug({ adapter: fastify.ctx.speech.name }, 'No speech produced, sending silent WAV');
    }

    return reply.type('audio/wav').send(audio ?? SILENT_WAV);
  });
};

export default speechRoutes;
