import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { startInvalidationSubscriber } from './invalidation-subscriber.js';

export interface InvalidationPluginOptions {
  redisUrl: string;
}

/**
 * Fastify plugin that keeps the API's registry cache in step with the
 * worker, which deletes destinations and creates endpoints on its own.
 */
async function invalidationPlugin(fastify: FastifyInstance, options: InvalidationPluginOptions): Promise<void> {
  const cleanup = await startInvalidationSubscriber(options.redisUrl, fastify.log, {
    registry: fastify.registry,
  });

  fastify.addHook('onClose', cleanup);
}

export default fp(invalidationPlugin, {
  name: 'invalidation',
  dependencies: ['registry'],
  fastify: '5.x',
});
