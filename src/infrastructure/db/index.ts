export { eventSubscriptions, deliveryEndpoints, bit64, EMPTY_BITS } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, SqlClient } from './client.js';
export { DrizzleSubscriptionStore } from './subscription-repository.js';
export type { SubscriptionRow, EndpointRow } from './subscription-repository.js';
export { ensureSchema } from './migrate.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
