import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { parseConfigFile } from './config-files.js';
import { MigrationMode, type LedgerEntries, type LedgerKind } from './types.js';
import { LedgerFormatError, getErrorMessage } from '../utils/errors.js';
import { isPathWithinDirectory, toProjectKey } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

export const SCHEMA_STATUS_FILENAME = 'schema-status.json';
export const CUSTOM_STATUS_FILENAME = 'custom-status.json';

const LedgerSchema = z.record(z.string(), z.array(z.string()));

/**
 * Updated copy of one ledger, produced for a single migration version.
 * `dirty` is false when no entry changed, so the ledger need not be rewritten.
 */
export interface LedgerDelta {
  kind: LedgerKind;
  /** Absolute path of the ledger document */
  file: string;
  entries: LedgerEntries;
  dirty: boolean;
}

export interface MigrationStatusOptions {
  rootDir: string;
  statusDir: string;
  schemaMarker: string;
}

/**
 * Migration ledger
 *
 * Two documents map ledger keys to applied versions: one for schema (template) files and
 * one for custom files. A file's kind never changes, so each key lives in exactly one of them.
 */
export class MigrationStatus {
  readonly schemaStatusFile: string;
  readonly customStatusFile: string;

  constructor(private readonly options: MigrationStatusOptions) {
    this.schemaStatusFile = path.join(options.statusDir, SCHEMA_STATUS_FILENAME);
    this.customStatusFile = path.join(options.statusDir, CUSTOM_STATUS_FILENAME);
  }

  ledgerFile(kind: LedgerKind): string {
    return kind === 'schema' ? this.schemaStatusFile : this.customStatusFile;
  }

  isLedgerFile(filePath: string): boolean {
    const absolute = path.resolve(this.options.rootDir, filePath);
    return absolute === this.schemaStatusFile || absolute === this.customStatusFile;
  }

  normalizePath(filePath: string): string {
    return toProjectKey(this.options.rootDir, filePath);
  }

  /** Ledger a file's history is recorded in */
  kindOf(filePath: string): LedgerKind {
    const descriptor = parseConfigFile(this.normalizePath(filePath), this.options.schemaMarker);
    return descriptor?.isSchema ? 'schema' : 'custom';
  }

  /**
   * Read and validate one ledger. A missing document is an empty ledger.
   */
  loadLedger(kind: LedgerKind): LedgerEntries {
    const file = this.ledgerFile(kind);
    if (!existsSync(file)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error: unknown) {
      throw new LedgerFormatError(file, getErrorMessage(error));
    }

    const parsed = LedgerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LedgerFormatError(file, parsed.error.issues.map(issue => issue.message).join('; '));
    }
    return parsed.data;
  }

  /**
   * Merged key -> versions view of both ledgers. Schema entries win on overlap.
   */
  loadStatus(): LedgerEntries {
    return {
      ...this.loadLedger('custom'),
      ...this.loadLedger('schema')
    };
  }

  getMigrations(filePath: string): string[] {
    const status = this.loadStatus();
    return [...(status[this.normalizePath(filePath)] ?? [])];
  }

  isTracked(filePath: string): boolean {
    const key = this.normalizePath(filePath);
    return Object.hasOwn(this.loadLedger('schema'), key) || Object.hasOwn(this.loadLedger('custom'), key);
  }

  /** Keys present in both ledgers */
  overlaps(): string[] {
    const schema = this.loadLedger('schema');
    return Object.keys(this.loadLedger('custom')).filter(key => Object.hasOwn(schema, key)).sort();
  }

  /**
   * Build the ledger documents that result from applying (UP) or removing (DOWN)
   * `version` on the files a transaction touched.
   *
   * Ledger documents themselves and files outside the project root are not recorded.
   */
  buildUpdatedMigrationStatuses(
    version: string,
    mode: MigrationMode,
    modifiedFiles: readonly string[]
  ): { custom: LedgerDelta; schema: LedgerDelta } {
    const deltas: Record<LedgerKind, LedgerDelta> = {
      custom: { kind: 'custom', file: this.customStatusFile, entries: this.loadLedger('custom'), dirty: false },
      schema: { kind: 'schema', file: this.schemaStatusFile, entries: this.loadLedger('schema'), dirty: false }
    };

    for (const file of modifiedFiles) {
      const absolute = path.resolve(this.options.rootDir, file);
      if (this.isLedgerFile(absolute) || !isPathWithinDirectory(this.options.rootDir, absolute)) {
        continue;
      }

      const key = this.normalizePath(absolute);
      const delta = deltas[this.kindOf(key)];
      const versions = delta.entries[key] ?? [];

      if (mode === MigrationMode.UP) {
        if (!versions.includes(version)) {
          delta.entries[key] = [...versions, version];
          delta.dirty = true;
        }
      } else if (versions.includes(version)) {
        delta.entries[key] = versions.filter(v => v !== version);
        delta.dirty = true;
      }
    }

    logger.debug(
      `[MigrationStatus] ${mode} ${version}: custom ${deltas.custom.dirty ? 'changed' : 'unchanged'}, ` +
      `schema ${deltas.schema.dirty ? 'changed' : 'unchanged'}`
    );

    return deltas;
  }
}
