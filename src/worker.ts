import { pino } from 'pino';
import { Redis } from 'ioredis';
import { createDbClient, ensureSchema, DrizzleSubscriptionStore } from './infrastructure/db/index.js';
import { DiscordWebhookTransport } from './infrastructure/discord/webhook-transport.js';
import { HttpReportSource } from './infrastructure/reports/http-report-source.js';
import { startInvalidationSubscriber } from './infrastructure/redis/invalidation-subscriber.js';
import { publishInvalidation } from './infrastructure/redis/invalidation-notifier.js';
import { loadConfig, loadEnv } from './infrastructure/config/index.js';
import {
  DispatchFanout,
  FashionReportService,
  MemoizingCache,
  NotificationScheduler,
  SubscriptionRegistry,
  createEventTasks,
} from './application/index.js';

/**
 * Standalone scheduler process.
 *
 * Runs one loop per event kind and fans every occurrence out to the
 * subscribed guilds. Occurrence times are pure functions of the clock, so
 * a restart simply resumes at the next occurrence.
 */
const env = loadEnv();
const config = loadConfig();
const log = pino({ level: env.logLevel });

const { sql, db } = createDbClient(env.databaseUrl);

// Publisher connection; the subscriber opens its own.
const redis = new Redis(env.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

let scheduler: NotificationScheduler | null = null;
let cleanupSubscriber: null | (() => Promise<void>) = null;

async function main(): Promise<void> {
  if (env.discordToken === '') {
    log.warn('DISCORD_BOT_TOKEN is not set; webhook creation will fail');
  }

  await ensureSchema(sql);
  log.info('Database ready (event_subscriptions + delivery_endpoints tables)');

  await redis.connect();
  log.info('Redis publisher connected');

  const cache = new MemoizingCache();
  const transport = new DiscordWebhookTransport({
    botToken: env.discordToken,
    apiBase: config.discord.api_base,
    webhookName: config.discord.webhook_name,
    log,
  });

  const registry = new SubscriptionRegistry({
    store: new DrizzleSubscriptionStore(db),
    transport,
    cache,
    log,
    // Self-healing deletes and new endpoints must reach the API's cache too.
    onChange: (entityId) => publishInvalidation(redis, log, { scope: 'subscription', entity_id: entityId }),
  });

  const reports = new FashionReportService({
    source: new HttpReportSource({
      url: config.fashion_report.source_url,
      userAgent: config.fashion_report.user_agent,
      log,
    }),
    cache,
    log,
    maxAttempts: config.fashion_report.max_attempts,
    retryBaseMs: config.fashion_report.retry_base_seconds * 1000,
  });

  cleanupSubscriber = await startInvalidationSubscriber(env.redisUrl, log, { registry, reports });

  const enabled = new Set(config.scheduler.kinds);
  const tasks = createEventTasks(reports).filter((task) => enabled.has(task.kind));

  scheduler = new NotificationScheduler({
    tasks,
    registry,
    fanout: new DispatchFanout(registry, transport, log),
    log,
  });
  scheduler.start();
}

// Graceful shutdown on SIGINT / SIGTERM
async function shutdown(): Promise<void> {
  log.info('Shutting down worker...');
  try {
    if (scheduler) await scheduler.stop();
    if (cleanupSubscriber) await cleanupSubscriber();
    await redis.quit();
    await sql.end();
  } catch (err: unknown) {
    log.error({ err }, 'Worker did not shut down cleanly');
    process.exit(1);
  }
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
