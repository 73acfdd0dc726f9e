export { InMemorySubscriptionStore } from './in-memory-store.js';
export { default as registryPlugin } from './registry-plugin.js';
export type { RegistryPluginOptions } from './registry-plugin.js';
