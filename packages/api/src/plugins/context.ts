import fp from 'fastify-plugin';
import type { AppContext } from '../context.js';

export interface ContextPluginOptions {
  context: AppContext;
}

export default fp<ContextPluginOptions>(async (fastify, opts) => {
  fastify.decorate('ctx', opts.context);

  fastify.addHook('onClose', async () => {
    await opts.context.store.close();
  });
}, { name: 'context' });
