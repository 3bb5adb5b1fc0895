export { loadConfig, loadStoreConfig } from './app-config.js';
export type { AppConfig, StoreConfig, LogLevel } from './app-config.js';
export { loadRuleSeeds } from './rules-file.js';
