export { redisPlugin, invalidationPlugin, publishInvalidation, startInvalidationSubscriber, handleInvalidation, INVALIDATION_CHANNEL } from './redis/index.js';
export type { InvalidationMessage, InvalidationTargets, InvalidationPluginOptions } from './redis/index.js';
export { createDbClient, dbPlugin, ensureSchema, DrizzleSubscriptionStore, eventSubscriptions, deliveryEndpoints } from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { DiscordWebhookTransport } from './discord/webhook-transport.js';
export type { DiscordWebhookTransportOptions } from './discord/webhook-transport.js';
export { HttpReportSource, findReport } from './reports/http-report-source.js';
export type { HttpReportSourceOptions } from './reports/http-report-source.js';
export { loadConfig, loadEnv, DEFAULT_CONFIG } from './config/index.js';
export type { HeraldConfig, RuntimeEnv } from './config/index.js';
export { InMemorySubscriptionStore, registryPlugin } from './subscriptions/index.js';
export type { RegistryPluginOptions } from './subscriptions/index.js';
