import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  EVENT_KINDS,
  EVENT_KIND_BITS,
  InvalidFlagValueError,
  SubscriptionFlags,
  type DestinationConfig,
} from '../../domain/index.js';
import { entityParamsSchema, putSubscriptionSchema } from '../../application/subscription-schema.js';

/** Public view of a destination. Endpoint credentials never leave the server. */
export function toSubscriptionResponse(config: DestinationConfig) {
  return {
    entity_id: config.entityId,
    channel_id: config.channelId,
    thread_id: config.threadId,
    flags: config.flags.value.toString(),
    kinds: config.flags.kinds(),
    endpoint_configured: config.endpointId !== null,
  };
}

/**
 * Subscription routes.
 *
 * GET    /api/v1/event-kinds                  - kinds and their bit positions
 * GET    /api/v1/subscriptions/:entity_id     - current subscription
 * PUT    /api/v1/subscriptions/:entity_id     - replace subscription
 * DELETE /api/v1/subscriptions/:entity_id     - unsubscribe entirely
 */
async function subscriptionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/event-kinds ──────────────────────────────
  fastify.get(
    '/api/v1/event-kinds',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const kinds = EVENT_KINDS.map((kind) => ({ kind, bit: EVENT_KIND_BITS[kind] }));
      return reply.status(200).send(kinds);
    },
  );

  // ── GET /api/v1/subscriptions/:entity_id ─────────────────
  fastify.get(
    '/api/v1/subscriptions/:entity_id',
    async (
      request: FastifyRequest<{ Params: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = entityParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'entity_id must be a Discord snowflake' });
      }

      const config = await fastify.registry.get(params.data.entity_id);
      return reply.status(200).send(toSubscriptionResponse(config));
    },
  );

  // ── PUT /api/v1/subscriptions/:entity_id ─────────────────
  fastify.put(
    '/api/v1/subscriptions/:entity_id',
    async (
      request: FastifyRequest<{ Params: unknown; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = entityParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'entity_id must be a Discord snowflake' });
      }

      const parsed = putSubscriptionSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const { kinds, flags, channel_id, thread_id } = parsed.data;
      try {
        const subscriptions = kinds !== undefined
          ? SubscriptionFlags.of(...kinds)
          : SubscriptionFlags.fromValue(BigInt(flags ?? '0'));

        const config = await fastify.registry.setSubscriptions(
          params.data.entity_id,
          subscriptions,
          channel_id,
          thread_id ?? null,
        );
        return reply.status(200).send(toSubscriptionResponse(config));
      } catch (err: unknown) {
        if (err instanceof InvalidFlagValueError) {
          return reply.status(400).send({ error: err.message, code: err.code });
        }
        throw err;
      }
    },
  );

  // ── DELETE /api/v1/subscriptions/:entity_id ──────────────
  fastify.delete(
    '/api/v1/subscriptions/:entity_id',
    async (
      request: FastifyRequest<{ Params: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = entityParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'entity_id must be a Discord snowflake' });
      }

      const deleted = await fastify.registry.delete(params.data.entity_id);
      if (!deleted) {
        return reply.status(404).send({ error: 'Subscription not found' });
      }

      return reply.status(204).send();
    },
  );
}

export default fp(subscriptionRoutes, {
  name: 'subscription-routes',
  dependencies: ['registry'],
  fastify: '5.x',
});
