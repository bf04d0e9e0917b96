import { MigrationContext } from './context.js';
import { TransactionState, type Transaction } from './transaction.js';
import type { MigrationWorkspace } from './workspace.js';
import {
  IRREVERSIBLE,
  MigrationMode,
  type Irreversible,
  type MigrationExecutionResult
} from './types.js';
import { IrreversibleMigrationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const MIGRATION_VERSION_PATTERN = /^\d+$/;

/**
 * Base class for configuration migrations
 *
 * Subclasses declare a `version` (unix timestamp of creation) and a `name`,
 * implement up() and, when the change can be undone, down().
 */
export abstract class ConfigMigration {
  abstract readonly version: string;
  abstract readonly name: string;

  /** Optional human-readable description shown by the CLI */
  readonly description?: string;

  /**
   * Apply the migration. Read and write files only through `txn` or `ctx`.
   */
  abstract up(txn: Transaction, ctx: MigrationContext): void;

  /**
   * Reverse the migration.
   * Returns IRREVERSIBLE unless overridden.
   */
  down(_txn: Transaction, _ctx: MigrationContext): void | Irreversible {
    return IRREVERSIBLE;
  }

  /** "<version> << <name> >>" */
  describe(): string {
    return `${this.version} << ${this.name} >>`;
  }

  /**
   * Run up() or down() against `targetFiles` in one transaction.
   *
   * The ledger update is staged in the same transaction as the content changes,
   * so both land on commit or neither does.
   */
  execute(workspace: MigrationWorkspace, mode: MigrationMode, targetFiles?: readonly string[]): MigrationExecutionResult {
    logger.debug(`[ConfigMigration] ${mode.toUpperCase()} ${this.describe()} on ${targetFiles?.length ?? 'all'} file(s)`);

    const outcome = workspace.transaction(txn => {
      const ctx = new MigrationContext(txn, workspace, targetFiles);

      if (mode === MigrationMode.UP) {
        this.up(txn, ctx);
      } else if (this.down(txn, ctx) === IRREVERSIBLE) {
        throw new IrreversibleMigrationError(this.version, this.name);
      }

      const modified = txn.getModifiedFiles();
      const files = modified
        .filter(file => !workspace.status.isLedgerFile(file))
        .map(file => workspace.key(file));

      const deltas = workspace.status.buildUpdatedMigrationStatuses(this.version, mode, modified);
      for (const delta of [deltas.custom, deltas.schema]) {
        if (delta.dirty) {
          txn.write(delta.file, delta.entries);
        }
      }

      return files;
    });

    if (outcome.state === TransactionState.COMMITTED) {
      return { state: 'committed', files: outcome.value };
    }
    if (outcome.reason !== undefined) {
      return { state: 'rolled_back', files: [], reason: outcome.reason };
    }
    return { state: 'unchanged', files: [] };
  }
}
