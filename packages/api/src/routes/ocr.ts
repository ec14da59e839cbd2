import type { FastifyPluginAsync } from 'fastify';
import { extractIdFields } from '@visitor-kiosk/document-ocr';

// Returned when no text could be read, so the kiosk can still demo the flow
const FALLBACK_FIELDS = {
  full_name: 'Demo Person',
  id_number: 'ID123456789',
  dob: '1990-01-01',
};

const ocrRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/ocr/upload-id: multipart `file` holding an ID card or passport image
  fastify.post('/upload-id', async (request, reply) => {
    const file = await request.file();
    if (!file) {
      return reply.code(400).send({ error: 'file is required' });
    }

    const image = await file.toBuffer();
    const result = await fastify.ctx.ocr.extract(image, file.filename);

    if (!result.ok) {
      request.log.warn({ adapter: fastify.ctx.ocr.name, error: result.error }, 'OCR failed, returning demo fields');
      return {
        status: 'fallback',
        ocr_fields: FALLBACK_FIELDS,
        filename: file.filename,
        message: result.error,
      };
    }

    return {
      status: 'success',
      ocr_fields: {
        ocr_text: result.text,
        lines: result.lines,
        ...extractIdFields(result.lines),
      },
      filename: file.filename,
    };
  });
};

export default ocrRoutes;
