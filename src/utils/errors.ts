export class MigrateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MigrateError';
  }
}

export class ConfigurationError extends MigrateError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Migration lifecycle
// ============================================================================

/**
 * A migration's down() cannot undo its up(). Halts the current rollback batch.
 */
export class IrreversibleMigrationError extends MigrateError {
  constructor(public readonly version: string, migrationName: string) {
    super(`Migration ${version} (${migrationName}) is irreversible and cannot be rolled back`);
    this.name = 'IrreversibleMigrationError';
  }
}

/**
 * Intentional cancellation raised from migration logic.
 * The transaction is rolled back and the signal is not propagated.
 */
export class Rollback extends MigrateError {
  constructor(reason: string = 'Migration requested a rollback') {
    super(reason);
    this.name = 'Rollback';
  }
}

export class MigrationFailedError extends MigrateError {
  constructor(
    public readonly version: string,
    public readonly migrationName: string,
    public readonly failure: unknown
  ) {
    super(`Migration ${version} (${migrationName}) failed: ${getErrorMessage(failure)}`);
    this.name = 'MigrationFailedError';
  }
}

export class InvalidMigrationNameError extends MigrateError {
  constructor(migrationName: string) {
    super(`Migration name must be a valid identifier (letters, digits, underscores): ${migrationName}`);
    this.name = 'InvalidMigrationNameError';
  }
}

export class DuplicateMigrationError extends MigrateError {
  constructor(version: string) {
    super(`Migration version ${version} is registered more than once`);
    this.name = 'DuplicateMigrationError';
  }
}

// ============================================================================
// Transactions
// ============================================================================

export class ExistingTransactionError extends MigrateError {
  constructor() {
    super('Nested transactions are not supported. A transaction is already active.');
    this.name = 'ExistingTransactionError';
  }
}

export class TransactionNotOpenError extends MigrateError {
  constructor() {
    super('Transactions must be opened before use.');
    this.name = 'TransactionNotOpenError';
  }
}

export class TransactionAlreadyCommittedError extends MigrateError {
  constructor(state: string) {
    super(`Transaction is already closed (${state}).`);
    this.name = 'TransactionAlreadyCommittedError';
  }
}

// ============================================================================
// Config documents
// ============================================================================

export class ConfigNotFoundError extends MigrateError {
  constructor(public readonly path: string) {
    super(`${path} does not exist.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigFormatError extends MigrateError {
  constructor(path: string, reason: string) {
    super(`<${path}> ${reason}`);
    this.name = 'ConfigFormatError';
  }
}

export class KeyNotFoundError extends MigrateError {
  constructor(path: string, keypath: string, role: string = 'Keypath') {
    super(`<${path}> ${role} '${keypath}' does not exist`);
    this.name = 'KeyNotFoundError';
  }
}

export class KeyConflictError extends MigrateError {
  constructor(path: string, keypath: string, reason: string = 'already exists') {
    super(`<${path}> Keypath '${keypath}' ${reason}`);
    this.name = 'KeyConflictError';
  }
}

export class SubconfigMismatchError extends MigrateError {
  constructor(subconfig: string, reference: string) {
    super(
      `Subconfig ${subconfig} and reference ${reference} have different migration histories. ` +
      'Remove the subconfig, then try again.'
    );
    this.name = 'SubconfigMismatchError';
  }
}

// ============================================================================
// Ledger
// ============================================================================

export class LedgerMissingError extends MigrateError {
  constructor(ledgerPath: string) {
    super(`Migration ledger not found at ${ledgerPath}. Run 'config-migrate init' first.`);
    this.name = 'LedgerMissingError';
  }
}

export class LedgerFormatError extends MigrateError {
  constructor(ledgerPath: string, reason: string) {
    super(`Migration ledger ${ledgerPath} is invalid: ${reason}`);
    this.name = 'LedgerFormatError';
  }
}

/**
 * Config files on disk that neither ledger knows about.
 */
export class UntrackedConfigError extends MigrateError {
  constructor(public readonly untrackedFiles: string[]) {
    const filesList = untrackedFiles.map(file => `  - ${file}`).join('\n');
    super(
      `Found ${untrackedFiles.length} config file(s) not tracked by the migration system:\n` +
      `${filesList}\n\n` +
      `These files may have been created by manually copying configs (e.g., using 'cp').\n` +
      `To fix this:\n` +
      `  1. Delete the untracked file(s)\n` +
      `  2. Use 'config-migrate subconfig <path>' to create subconfigs properly\n` +
      `  OR\n` +
      `  1. Run 'config-migrate reset' to remove all custom configs\n` +
      `  2. Run 'config-migrate init' to start fresh`
    );
    this.name = 'UntrackedConfigError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
