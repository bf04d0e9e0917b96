/**
 * Migration system public API
 *
 * Migrations are compiled in: each definition lives in src/definitions/ and is listed in
 * src/definitions/index.ts. Applied versions are tracked per file in
 * migrations/schema-status.json and migrations/custom-status.json.
 *
 * To add a new migration:
 * 1. Run `config-migrate generate <name>`
 * 2. Implement up() (and down() when the change can be undone)
 * 3. Add it to the list in src/definitions/index.ts
 */

export { ConfigMigration, MIGRATION_VERSION_PATTERN } from './migration.js';
export { MigrationContext } from './context.js';
export type { AddKeyOptions, FamilyOption } from './context.js';
export { Transaction, TransactionGuard, TransactionState, serializeJson } from './transaction.js';
export type { TransactionOutcome } from './transaction.js';
export { MigrationStatus, SCHEMA_STATUS_FILENAME, CUSTOM_STATUS_FILENAME } from './status.js';
export type { LedgerDelta } from './status.js';
export { MigrationRegistry, compareVersions } from './registry.js';
export { MigrationManager } from './manager.js';
export type { TrackedConfigFile } from './manager.js';
export { MigrationExecutionPlan, FileState } from './plan.js';
export { MigrationRunner } from './runner.js';
export type { RunOptions } from './runner.js';
export { MigrationWorkspace } from './workspace.js';
export { Keypath, navigate } from './keypath.js';
export { parseConfigFile, expandFamily, customKeyForSchema } from './config-files.js';
export type { ConfigFile } from './config-files.js';
export { initFromSchemas, createSubconfig, resetCustomConfigs, inferReference } from './setup.js';
export { generateMigration } from './generator.js';
export { IRREVERSIBLE, MigrationMode, isJsonObject } from './types.js';
export type {
  Irreversible,
  JsonObject,
  JsonValue,
  LedgerEntries,
  LedgerKind,
  MigrationExecutionResult,
  MigrationRunSummary
} from './types.js';
