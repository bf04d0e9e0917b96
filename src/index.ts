/**
 * config-migrate public API
 *
 * The engine lives in ./migrations; the shipped migrations in ./definitions.
 */

export * from './migrations/index.js';
export { createMigrations, createRegistry } from './definitions/index.js';
export { loadConfig, DEFAULT_CONFIG, CONFIG_FILENAME } from './config/config.js';
export type { MigrateConfig, MigrateConfigFile } from './config/config.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
