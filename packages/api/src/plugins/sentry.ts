import fp from 'fastify-plugin';
import * as Sentry from '@sentry/node';
import type { AppConfig } from '../config.js';

export interface SentryPluginOptions {
  sentry: AppConfig['sentry'];
  environment: string;
}

export default fp<SentryPluginOptions>(async (fastify, opts) => {
  const { dsn, release, tracesSampleRate } = opts.sentry;

  if (!dsn) {
    fastify.log.info('SENTRY_DSN not set, Sentry error tracking disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment: opts.environment,
    release,
    tracesSampleRate,
    integrations: [Sentry.httpIntegration()],
  });

  fastify.log.info('Sentry error tracking initialized');

  fastify.addHook('onError', async (request, _reply, error) => {
    Sentry.withScope((scope) => {
      scope.setContext('request', {
        method: request.method,
        url: request.url,
        headers: {
          'user-agent': request.headers['user-agent'],
          'content-type': request.headers['content-type'],
        },
        ip: request.ip,
      });
      scope.setTag('http.method', request.method);
      scope.setTag('http.url', request.routeOptions.url || request.url);

      Sentry.captureException(error);
    });
  });

  // Flush events on server shutdown
  fastify.addHook('onClose', async () => {
    await Sentry.close(2000);
  });
}, { name: 'sentry' });
