import type { FastifyPluginAsync } from 'fastify';
import { step, toCheckinDetails, type InterviewState } from '@visitor-kiosk/core';
import { VisitService } from '../services/visit-service.js';
import { sanitizeAnswer } from '../utils/sanitize.js';

interface CheckinStepBody {
  conversation_state?: unknown;
  user_input?: unknown;
  input_mode?: unknown;
}

function isInterviewState(value: unknown): value is InterviewState {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((answer) => typeof answer === 'string');
}

function parseVisitId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

const visitorRoutes: FastifyPluginAsync = async (fastify) => {
  const visitService = new VisitService(fastify.ctx.store);

  // POST /api/visitor/checkin-step: Advance the conversational check-in by one answer
  fastify.post<{ Body: CheckinStepBody | null }>('/checkin-step', async (request, reply) => {
    const body: CheckinStepBody = request.body ?? {};
    const { conversation_state, user_input, input_mode } = body;

    if (!isInterviewState(conversation_state)) {
      return reply.code(400).send({ error: 'conversation_state must be an object of string answers' });
    }
    if (typeof user_input !== 'string') {
      return reply.code(400).send({ error: 'user_input must be a string' });
    }
    // Usually "voice" or "text"; the engine treats both alike
    if (typeof input_mode !== 'string') {
      return reply.code(400).send({ error: 'input_mode must be a string' });
    }

    request.log.debug({ inputMode: input_mode }, 'Check-in step');
    return step(conversation_state, user_input);
  });

  // POST /api/visitor/checkin-finalize: Persist visitor, host and visit log
  fastify.post<{ Body: Record<string, unknown> | null }>('/checkin-finalize', async (request, reply) => {
    const body: Record<string, unknown> = request.body ?? {};
    const details = toCheckinDetails({
      ...body,
      full_name: sanitizeAnswer(body.full_name),
      purpose: sanitizeAnswer(body.purpose),
    });
    if (!details) {
      return reply.code(400).send({ error: 'Missing required check-in fields.' });
    }

    const visit = await visitService.finalize(details);
    request.log.info({ visitId: visit.id, hostId: visit.host.id }, 'Visitor checked in');
    return visit;
  });

  // POST /api/visitor/checkout/:id
  fastify.post<{ Params: { id: string } }>('/checkout/:id', async (request, reply) => {
    const visitId = parseVisitId(request.params.id);
    if (visitId === null) return reply.code(400).send({ error: 'Invalid visit id' });

    const visit = await visitService.checkOut(visitId);
    request.log.info({ visitId }, 'Visitor checked out');
    return visit;
  });

  // POST /api/visitor/cancel/:id
  fastify.post<{ Params: { id: string } }>('/cancel/:id', async (request, reply) => {
    const visitId = parseVisitId(request.params.id);
    if (visitId === null) return reply.code(400).send({ error: 'Invalid visit id' });

    const visit = await visitService.cancel(visitId);
    request.log.info({ visitId }, 'Visit cancelled');
    return visit;
  });
};

export default visitorRoutes;
