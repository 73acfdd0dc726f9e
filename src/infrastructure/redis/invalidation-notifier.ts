import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import { z } from 'zod';

export const INVALIDATION_CHANNEL = 'herald_invalidations';

export const invalidationMessageSchema = z.discriminatedUnion('scope', [
  z.object({ scope: z.literal('subscription'), entity_id: z.string().min(1), ts: z.string().optional() }),
  z.object({ scope: z.literal('fashion-report'), ts: z.string().optional() }),
]);

export type InvalidationMessage = z.infer<typeof invalidationMessageSchema>;

/**
 * Publishes a cache invalidation to the other process.
 *
 * Best-effort: publish failures are logged but never propagated to the
 * caller, so HTTP responses are never affected by Pub/Sub issues.
 */
export async function publishInvalidation(
  redis: Pick<Redis, 'publish'>,
  log: BaseLogger,
  message: InvalidationMessage,
): Promise<void> {
  try {
    await redis.publish(INVALIDATION_CHANNEL, JSON.stringify({ ...message, ts: new Date().toISOString() }));
    log.debug({ channel: INVALIDATION_CHANNEL, scope: message.scope }, 'Published invalidation');
  } catch (err: unknown) {
    log.error({ err, scope: message.scope }, 'Failed to publish invalidation');
  }
}
