export { loadConfig, loadEnv, parseSimpleYaml, DEFAULT_CONFIG } from './app-config.js';
export type { HeraldConfig, RuntimeEnv } from './app-config.js';
