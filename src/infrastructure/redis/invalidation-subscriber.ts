import { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { FashionReportService } from '../../application/fashion-report.js';
import type { SubscriptionRegistry } from '../../application/subscription-registry.js';
import { INVALIDATION_CHANNEL, invalidationMessageSchema } from './invalidation-notifier.js';

export interface InvalidationTargets {
  registry: Pick<SubscriptionRegistry, 'invalidate'>;
  /** Absent in the API process, which never looks up reports. */
  reports?: Pick<FashionReportService, 'reset'>;
}

/**
 * Subscribes to the invalidation channel. Both processes run one, so each
 * sees the other's subscription writes.
 *
 * ioredis requires a dedicated connection for subscriber mode, so this
 * opens its own client. Returns a cleanup function for graceful shutdown.
 */
export async function startInvalidationSubscriber(
  redisUrl: string,
  log: BaseLogger,
  targets: InvalidationTargets,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Invalidation subscriber Redis connection established');

  sub.on('message', (channel: string, message: string) => {
    if (channel !== INVALIDATION_CHANNEL) return;
    handleInvalidation(message, targets, log);
  });

  await sub.subscribe(INVALIDATION_CHANNEL);
  log.info({ channel: INVALIDATION_CHANNEL }, 'Subscribed to invalidations');

  return async () => {
    try {
      await sub.unsubscribe(INVALIDATION_CHANNEL);
      await sub.quit();
    } catch (err: unknown) {
      log.warn({ err }, 'Invalidation subscriber did not close cleanly');
    }
    log.info('Invalidation subscriber disconnected');
  };
}

/**
 * Applies one raw Pub/Sub message. Malformed messages are logged and
 * skipped.
 *
 * Exported for unit testing; callers outside this module should use
 * `startInvalidationSubscriber()` instead.
 */
export function handleInvalidation(rawMessage: string, targets: InvalidationTargets, log: BaseLogger): boolean {
  let json: unknown;
  try {
    json = JSON.parse(rawMessage);
  } catch (err: unknown) {
    log.warn({ err, message: rawMessage }, 'Invalidation message is not JSON, skipping');
    return false;
  }

  const parsed = invalidationMessageSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ message: rawMessage }, 'Malformed invalidation message, skipping');
    return false;
  }

  const message = parsed.data;
  if (message.scope === 'subscription') {
    const cleared = targets.registry.invalidate(message.entity_id);
    log.info({ entity_id: message.entity_id, cleared }, 'Subscription cache invalidated');
    return cleared;
  }

  if (!targets.reports) {
    log.debug('No fashion report cache in this process, ignoring reset');
    return false;
  }

  const cleared = targets.reports.reset();
  log.info({ cleared }, 'Fashion report cache invalidated');
  return cleared;
}
