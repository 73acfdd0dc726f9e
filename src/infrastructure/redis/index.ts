export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishInvalidation, invalidationMessageSchema, INVALIDATION_CHANNEL } from './invalidation-notifier.js';
export type { InvalidationMessage } from './invalidation-notifier.js';
export { startInvalidationSubscriber, handleInvalidation } from './invalidation-subscriber.js';
export type { InvalidationTargets } from './invalidation-subscriber.js';
export { default as invalidationPlugin } from './invalidation-plugin.js';
export type { InvalidationPluginOptions } from './invalidation-plugin.js';
