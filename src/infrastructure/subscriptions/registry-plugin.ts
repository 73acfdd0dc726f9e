import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { MemoizingCache } from '../../application/memoizing-cache.js';
import { SubscriptionRegistry } from '../../application/subscription-registry.js';
import { DrizzleSubscriptionStore } from '../db/subscription-repository.js';
import { DiscordWebhookTransport } from '../discord/webhook-transport.js';
import { publishInvalidation } from '../redis/invalidation-notifier.js';

export interface RegistryPluginOptions {
  botToken: string;
  apiBase: string;
  webhookName: string;
}

/**
 * Fastify plugin that builds the API process's SubscriptionRegistry.
 *
 * Every write is published on the invalidation channel so the worker's
 * registry drops its cached copy.
 */
async function registryPlugin(fastify: FastifyInstance, options: RegistryPluginOptions): Promise<void> {
  const registry = new SubscriptionRegistry({
    store: new DrizzleSubscriptionStore(fastify.db),
    transport: new DiscordWebhookTransport({ ...options, log: fastify.log }),
    cache: new MemoizingCache(),
    log: fastify.log,
    onChange: (entityId) =>
      publishInvalidation(fastify.redis, fastify.log, { scope: 'subscription', entity_id: entityId }),
  });

  fastify.decorate('registry', registry);
}

export default fp(registryPlugin, {
  name: 'registry',
  dependencies: ['db', 'redis'],
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.registry` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    registry: SubscriptionRegistry;
  }
}
