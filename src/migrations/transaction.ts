import {
  copyFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmdirSync,
  rmSync,
  writeFileSync
} from 'fs';
import path from 'path';
import { isJsonObject, type JsonObject, type JsonValue } from './types.js';
import {
  ConfigFormatError,
  ConfigNotFoundError,
  ExistingTransactionError,
  Rollback,
  TransactionAlreadyCommittedError,
  TransactionNotOpenError,
  getErrorMessage
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export enum TransactionState {
  UNSTARTED = 'unstarted',
  OPEN = 'open',
  COMMITTED = 'committed',
  ROLLED_BACK = 'rolled_back'
}

/**
 * Single-slot holder for the open transaction.
 * Every workspace on the same staging directory shares one guard through `forStagingDir`.
 */
export class TransactionGuard {
  private static readonly shared = new Map<string, TransactionGuard>();

  private active: Transaction | null = null;

  static forStagingDir(stagingDir: string): TransactionGuard {
    const key = path.resolve(stagingDir);
    let guard = TransactionGuard.shared.get(key);
    if (!guard) {
      guard = new TransactionGuard();
      TransactionGuard.shared.set(key, guard);
    }
    return guard;
  }

  get current(): Transaction | null {
    return this.active;
  }

  acquire(txn: Transaction): void {
    if (this.active !== null && this.active !== txn) {
      throw new ExistingTransactionError();
    }
    this.active = txn;
  }

  release(txn: Transaction): void {
    if (this.active === txn) {
      this.active = null;
    }
  }
}

interface StagedFile {
  staged: string;
  original: string;
}

export type TransactionOutcome<T> =
  | { state: TransactionState.COMMITTED; value: T }
  | { state: TransactionState.ROLLED_BACK; value?: T; reason?: string };

export function serializeJson(data: JsonValue): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Copy-on-write transaction over JSON files
 *
 * Each transaction stages into its own `txn-*` directory under the staging directory.
 * Files are copied there on first touch; reads and writes go to the staged copy.
 * Commit renames every staged copy over its original. Rollback deletes the transaction's
 * directory and never touches originals.
 */
export class Transaction {
  private readonly staged = new Map<string, StagedFile>();
  private _state = TransactionState.UNSTARTED;
  private fileCounter = 0;
  private workDir: string | null = null;

  constructor(
    private readonly guard: TransactionGuard,
    private readonly stagingDir: string
  ) {}

  /**
   * Run `fn` inside a fresh transaction.
   *
   * Normal return commits. A Rollback signal rolls back and is swallowed.
   * Any other error rolls back and is rethrown. The guard is released on every path.
   */
  static run<T>(guard: TransactionGuard, stagingDir: string, fn: (txn: Transaction) => T): TransactionOutcome<T> {
    const txn = new Transaction(guard, stagingDir);
    txn.begin();

    try {
      const value = fn(txn);
      const committed = txn.commit();
      return committed
        ? { state: TransactionState.COMMITTED, value }
        : { state: TransactionState.ROLLED_BACK, value };
    } catch (error: unknown) {
      try {
        txn.rollback();
      } catch (rollbackError: unknown) {
        logger.warn(`Rollback failed: ${getErrorMessage(rollbackError)}`);
      }

      if (error instanceof Rollback) {
        logger.debug(`[Transaction] Rolled back on request: ${error.message}`);
        return { state: TransactionState.ROLLED_BACK, reason: error.message };
      }
      throw error;
    } finally {
      guard.release(txn);
    }
  }

  get state(): TransactionState {
    return this._state;
  }

  begin(): void {
    if (this._state === TransactionState.OPEN) {
      return;
    }
    if (this._state !== TransactionState.UNSTARTED) {
      throw new TransactionAlreadyCommittedError(this._state);
    }

    this.guard.acquire(this);
    try {
      mkdirSync(this.stagingDir, { recursive: true });
      this.workDir = mkdtempSync(path.join(this.stagingDir, 'txn-'));
    } catch (error: unknown) {
      this.guard.release(this);
      throw error;
    }

    this._state = TransactionState.OPEN;
    logger.debug('[Transaction] BEGIN');
  }

  /**
   * Read a JSON file through the transaction.
   * Later reads of the same file see what was written to it in this transaction.
   */
  read(filePath: string): JsonValue {
    const entry = this.stage(filePath, false);
    const content = readFileSync(entry.staged, 'utf-8');

    try {
      const parsed: JsonValue = JSON.parse(content);
      return parsed;
    } catch (error: unknown) {
      throw new ConfigFormatError(entry.original, `invalid JSON: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Write a JSON document through the transaction.
   * Writing a file that does not exist yet stages a new file that commit will create.
   */
  write(filePath: string, data: JsonValue): void {
    const entry = this.stage(filePath, true);
    writeFileSync(entry.staged, serializeJson(data), 'utf-8');
  }

  /**
   * Scoped update: `fn` receives the parsed document and may mutate it in place.
   * The document is written back when `fn` returns; nothing is written if it throws.
   */
  loadForUpdate<T>(filePath: string, fn: (content: JsonObject) => T): T {
    const content = this.read(filePath);
    if (!isJsonObject(content)) {
      throw new ConfigFormatError(path.resolve(filePath), 'root of a config document must be an object');
    }

    const result = fn(content);
    this.write(filePath, content);
    return result;
  }

  /** Absolute paths of every original staged in this transaction */
  getModifiedFiles(): string[] {
    return [...this.staged.values()].map(entry => entry.original);
  }

  /**
   * Swap staged copies into place.
   * @returns false when nothing was staged and the transaction degraded to a rollback
   */
  commit(): boolean {
    this.assertOpen();

    if (this.staged.size === 0) {
      logger.debug('[Transaction] Nothing staged, rolling back');
      this.rollback();
      return false;
    }

    for (const entry of this.staged.values()) {
      mkdirSync(path.dirname(entry.original), { recursive: true });
      renameSync(entry.staged, entry.original);
    }

    this.removeStagingDir();
    this._state = TransactionState.COMMITTED;
    this.guard.release(this);
    logger.debug(`[Transaction] COMMIT (${this.staged.size} file(s))`);
    return true;
  }

  rollback(): void {
    try {
      this.removeStagingDir();
    } finally {
      this._state = TransactionState.ROLLED_BACK;
      this.guard.release(this);
      logger.debug('[Transaction] ROLLBACK');
    }
  }

  private assertOpen(): void {
    if (this._state !== TransactionState.OPEN) {
      throw new TransactionNotOpenError();
    }
  }

  /** Delete this transaction's directory, then the staging directory once nothing else uses it */
  private removeStagingDir(): void {
    if (this.workDir !== null) {
      rmSync(this.workDir, { recursive: true, force: true });
      this.workDir = null;
    }
    if (existsSync(this.stagingDir) && readdirSync(this.stagingDir).length === 0) {
      rmdirSync(this.stagingDir);
    }
  }

  private requireWorkDir(): string {
    if (this.workDir === null) {
      throw new TransactionNotOpenError();
    }
    return this.workDir;
  }

  private stage(filePath: string, allowCreate: boolean): StagedFile {
    this.assertOpen();
    const original = path.resolve(filePath);

    const existing = this.staged.get(original);
    if (existing) {
      return existing;
    }

    const exists = existsSync(original);
    if (!exists && !allowCreate) {
      throw new ConfigNotFoundError(original);
    }

    const staged = path.join(this.requireWorkDir(), `${this.fileCounter}_${path.basename(original)}`);
    this.fileCounter++;

    if (exists) {
      copyFileSync(original, staged);
    }

    const entry: StagedFile = { staged, original };
    this.staged.set(original, entry);
    logger.debug(`[Transaction] STAGING ${original}${exists ? '' : ' (new file)'}`);

    return entry;
  }
}
