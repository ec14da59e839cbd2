import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import multipart from '@fastify/multipart';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { errorMessage } from '@visitor-kiosk/core';

import { getConfig, type AppConfig } from './config.js';
import { createAppContext, type AppContext } from './context.js';

// Plugins
import contextPlugin from './plugins/context.js';
import sentryPlugin from './plugins/sentry.js';

// Routes
import visitorRoutes from './routes/visitor.js';
import ocrRoutes from './routes/ocr.js';
import speechRoutes from './routes/speech.js';
import notificationRoutes from './routes/notifications.js';
import adminRoutes from './routes/admin.js';
import validationRoutes from './routes/validation.js';

// Side-effect: import types for augmentation
import './types.js';

export interface BuildServerOptions {
  config?: AppConfig;
  /** Pre-built collaborators; tests pass an in-memory store and fakes. */
  context?: AppContext;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();
  const { nodeEnv } = config.server;
  const prettyLogs = nodeEnv !== 'production' && nodeEnv !== 'test';

  const app = Fastify({
    logger: {
      level: config.server.logLevel,
      ...(prettyLogs && {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss' },
        },
      }),
      serializers: {
        req(req: FastifyRequest) {
          return {
            method: req.method,
            url: req.url,
            remoteAddress: req.ip,
          };
        },
      },
      redact: ['req.headers.authorization', 'req.headers.cookie'],
    },
  });

  await app.register(cors, {
    origin: config.server.frontendUrl.split(',').map((origin) => origin.trim()),
    credentials: true,
  });

  await app.register(rateLimit, {
    max: config.server.rateLimitMax,
    timeWindow: '1 minute',
  });

  await app.register(multipart, {
    limits: { fileSize: config.server.uploadLimitBytes, files: 1 },
  });

  // OpenAPI documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Visitor Kiosk API',
        description: 'Conversational visitor check-in, ID scanning, speech and host notification',
        version: '1.0.0',
      },
    },
  });
  await app.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    app.log.error({
      err: error,
      url: request.url,
      method: request.method,
    });

    if (statusCode >= 500) {
      reply.code(statusCode).send({
        error: 'Internal Server Error',
        statusCode,
      });
    } else {
      reply.code(statusCode).send({
        error: error.message,
        statusCode,
      });
    }
  });

  // Plugins
  await app.register(sentryPlugin, { sentry: config.sentry, environment: nodeEnv });
  await app.register(contextPlugin, {
    context: options.context ?? createAppContext(config, (message) => app.log.info(message)),
  });

  app.get('/', async () => {
    return { message: 'Healthy' };
  });

  // Readiness check (confirms the store is reachable)
  app.get('/ready', async (_request, reply) => {
    try {
      await app.ctx.store.ping();
      return { status: 'ready' };
    } catch (err) {
      app.log.error({ error: errorMessage(err) }, 'Readiness check failed');
      return reply.code(503).send({ status: 'not ready' });
    }
  });

  // Routes
  await app.register(visitorRoutes, { prefix: '/api/visitor' });
  await app.register(ocrRoutes, { prefix: '/api/ocr' });
  await app.register(speechRoutes, { prefix: '/api/speech' });
  await app.register(notificationRoutes, { prefix: '/api/notifications' });
  await app.register(adminRoutes, { prefix: '/api/admin' });
  await app.register(validationRoutes, { prefix: '/api/validation' });

  return app;
}
