import Fastify from 'fastify';

import {
  redisPlugin,
  invalidationPlugin,
  dbPlugin,
  registryPlugin,
  loadConfig,
  loadEnv,
} from './infrastructure/index.js';

import {
  subscriptionRoutes,
  scheduleRoutes,
  adminRoutes,
} from './interfaces/http/index.js';

/**
 * Bootstrap the API server.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) HTTP routes
 * 3) listen()
 */
async function main(): Promise<void> {
  const env = loadEnv();
  const config = loadConfig();

  const fastify = Fastify({
    logger: {
      level: env.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: env.redisUrl });
  await fastify.register(dbPlugin, { databaseUrl: env.databaseUrl });
  await fastify.register(registryPlugin, {
    botToken: env.discordToken,
    apiBase: config.discord.api_base,
    webhookName: config.discord.webhook_name,
  });
  await fastify.register(invalidationPlugin, { redisUrl: env.redisUrl });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  fastify.get('/health', async () => ({ status: 'ok' }));

  await fastify.register(subscriptionRoutes);
  await fastify.register(scheduleRoutes);
  await fastify.register(adminRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: env.host,
    port: env.port,
  });

  const shutdown = (): void => {
    fastify.log.info('Shutting down API server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Failed to close cleanly');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
