/**
 * Migration system types
 * Versioned, transactional migrations over families of JSON config files
 */

/**
 * JSON document model
 * Config documents are parsed into this recursive union and navigated explicitly.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Direction a migration is executed in */
export enum MigrationMode {
  UP = 'up',
  DOWN = 'down'
}

/**
 * Returned from down() when a migration cannot be reversed.
 */
export const IRREVERSIBLE = Symbol('irreversible');
export type Irreversible = typeof IRREVERSIBLE;

/** Outcome of executing one migration against its target files */
export interface MigrationExecutionResult {
  /**
   * committed: changes landed
   * unchanged: the migration touched none of its target files
   * rolled_back: the migration raised Rollback
   */
  state: 'committed' | 'unchanged' | 'rolled_back';

  /** Ledger keys of the config files the migration changed */
  files: string[];

  /** Message carried by the Rollback signal */
  reason?: string;
}

/** Summary of a runner batch */
export interface MigrationRunSummary {
  /** Migrations considered (had at least one target file) */
  total: number;

  /** Migrations that committed changes */
  applied: number;

  /** Migrations that touched none of their target files */
  skipped: number;

  /** Migrations that raised Rollback */
  rolledBack: number;
}

/** Which of the two ledgers a config file belongs to */
export type LedgerKind = 'schema' | 'custom';

/** Ledger document format: ledger key -> applied versions in application order */
export type LedgerEntries = Record<string, string[]>;
