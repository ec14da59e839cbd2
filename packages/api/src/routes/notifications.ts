import type { FastifyPluginAsync } from 'fastify';
import {
  HOST_VISITOR_ARRIVED_EMAIL,
  HOST_VISITOR_ARRIVED_SMS,
  renderTemplate,
} from '@visitor-kiosk/core';
import { hostNameFromEmail } from '@visitor-kiosk/db';
import { stripHtml } from '../utils/sanitize.js';

interface NotifyHostBody {
  host_email?: unknown;
  visitor_name?: unknown;
  purpose?: unknown;
  host_phone?: unknown;
}

function nonEmpty(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

const notificationRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/notifications/notify-host: Tell a host their visitor has arrived
  fastify.post<{ Body: NotifyHostBody | null }>('/notify-host', async (request, reply) => {
    const body: NotifyHostBody = request.body ?? {};
    const hostEmail = nonEmpty(body.host_email);
    const visitorName = nonEmpty(body.visitor_name);
    if (!hostEmail || !visitorName) {
      return reply.code(400).send({ error: 'host_email and visitor_name required' });
    }

    const vars = {
      hostName: hostNameFromEmail(hostEmail),
      visitorName: stripHtml(visitorName),
      purpose: stripHtml(nonEmpty(body.purpose) ?? 'not given'),
      timestamp: new Date().toISOString(),
    };

    const email = renderTemplate(HOST_VISITOR_ARRIVED_EMAIL, vars);
    const results = await fastify.ctx.notifier.notify({
      subject: email.subject ?? HOST_VISITOR_ARRIVED_EMAIL.name,
      message: email.body,
      recipients: [hostEmail],
      channels: ['EMAIL'],
      metadata: { visitorName },
    });

    const hostPhone = nonEmpty(body.host_phone);
    if (hostPhone) {
      const sms = renderTemplate(HOST_VISITOR_ARRIVED_SMS, vars);
      results.push(...(await fastify.ctx.notifier.notify({
        subject: HOST_VISITOR_ARRIVED_SMS.name,
        message: sms.body,
        recipients: [hostPhone],
        channels: ['SMS'],
        metadata: { visitorName },
      })));
    }

    const failed = results.filter((r) => !r.success);
    if (failed.length > 0) {
      request.log.warn({ hostEmail, failures: failed }, 'Host notification partly failed');
    }

    return { status: 'sent', host_email: hostEmail, visitor_name: visitorName };
  });
};

export default notificationRoutes;
