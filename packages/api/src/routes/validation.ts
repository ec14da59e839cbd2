import type { FastifyPluginAsync } from 'fastify';
import { validateField } from '@visitor-kiosk/core';

interface ValidateFieldBody {
  field?: unknown;
  value?: unknown;
}

const validationRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/validation/validate-field: Live form check for one field
  fastify.post<{ Body: ValidateFieldBody | null }>('/validate-field', async (request, reply) => {
    const body: ValidateFieldBody = request.body ?? {};
    const { field, value } = body;
    if (typeof field !== 'string' || typeof value !== 'string') {
      return reply.code(400).send({ error: 'field and value must be strings' });
    }
    return validateField(field, value);
  });
};

export default validationRoutes;
