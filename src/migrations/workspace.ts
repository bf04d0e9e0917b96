import { existsSync, readdirSync } from 'fs';
import path from 'path';
import { CONFIG_FILENAME, type MigrateConfig } from '../config/config.js';
import { parseConfigFile, type ConfigFile } from './config-files.js';
import { MigrationStatus } from './status.js';
import { Transaction, TransactionGuard, type TransactionOutcome } from './transaction.js';
import { LedgerMissingError } from '../utils/errors.js';
import { resolveProjectPath, toProjectKey } from '../utils/paths.js';

/**
 * Everything one invocation needs to work on a project root:
 * resolved settings, the ledger service and the transaction guard.
 */
export class MigrationWorkspace {
  readonly guard: TransactionGuard;
  readonly status: MigrationStatus;

  constructor(readonly config: MigrateConfig) {
    this.guard = TransactionGuard.forStagingDir(config.stagingDir);
    this.status = new MigrationStatus({
      rootDir: config.rootDir,
      statusDir: config.statusDir,
      schemaMarker: config.schemaMarker
    });
  }

  get rootDir(): string {
    return this.config.rootDir;
  }

  key(filePath: string): string {
    return toProjectKey(this.config.rootDir, filePath);
  }

  resolve(filePath: string): string {
    return resolveProjectPath(this.config.rootDir, filePath);
  }

  describe(filePath: string): ConfigFile | null {
    return parseConfigFile(this.key(filePath), this.config.schemaMarker);
  }

  isIgnored(filename: string): boolean {
    return this.config.ignore.includes(filename);
  }

  transaction<T>(fn: (txn: Transaction) => T): TransactionOutcome<T> {
    return Transaction.run(this.guard, this.config.stagingDir, fn);
  }

  /**
   * JSON config files in one directory, as descriptors.
   * Ledger documents, the settings file and ignore-listed names are excluded.
   */
  listDirectory(dir: string): ConfigFile[] {
    const absoluteDir = this.resolve(dir);
    if (!existsSync(absoluteDir)) {
      return [];
    }

    return readdirSync(absoluteDir, { withFileTypes: true })
      .filter(entry => entry.isFile() && entry.name.endsWith('.json'))
      .filter(entry => entry.name !== CONFIG_FILENAME && !this.isIgnored(entry.name))
      .map(entry => path.join(absoluteDir, entry.name))
      .filter(file => !this.status.isLedgerFile(file))
      .map(file => this.describe(file))
      .filter((descriptor): descriptor is ConfigFile => descriptor !== null)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  /** Every config file across the configured search directories */
  listConfigFiles(): ConfigFile[] {
    const seen = new Map<string, ConfigFile>();
    for (const dir of this.config.searchDirs) {
      for (const file of this.listDirectory(dir)) {
        seen.set(file.key, file);
      }
    }
    return [...seen.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  hasLedger(): boolean {
    return existsSync(this.status.customStatusFile);
  }

  /**
   * Every command except init and reset works on an initialized project.
   */
  requireLedger(): void {
    if (!this.hasLedger()) {
      throw new LedgerMissingError(this.key(this.status.customStatusFile));
    }
  }
}
