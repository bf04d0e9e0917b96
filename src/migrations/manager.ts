import { existsSync, readdirSync } from 'fs';
import type { ConfigFile } from './config-files.js';
import type { ConfigMigration } from './migration.js';
import type { MigrationRegistry } from './registry.js';
import type { MigrationWorkspace } from './workspace.js';
import { logger } from '../utils/logger.js';

/** Definition filenames: <unix_timestamp>_<identifier>.ts */
export const DEFINITION_FILE_PATTERN = /^(\d+)_([A-Za-z_][A-Za-z0-9_]*)\.ts$/;

export interface TrackedConfigFile extends ConfigFile {
  /** Versions applied to this file, in application order */
  applied: string[];
  tracked: boolean;
}

/**
 * Migration manager
 * Joins the registered migrations with the config files on disk and their ledger history
 */
export class MigrationManager {
  constructor(
    readonly workspace: MigrationWorkspace,
    private readonly registry: MigrationRegistry
  ) {}

  /** Registered migrations, ascending by version */
  loadMigrations(): ConfigMigration[] {
    return this.registry.getAll();
  }

  /**
   * Every config file that can be migrated, with its applied versions.
   */
  fetchConfigs(): TrackedConfigFile[] {
    const schemaLedger = this.workspace.status.loadLedger('schema');
    const customLedger = this.workspace.status.loadLedger('custom');

    return this.workspace.listConfigFiles().map(file => {
      const ledger = file.isSchema ? schemaLedger : customLedger;
      const tracked = Object.hasOwn(ledger, file.key);
      return { ...file, applied: tracked ? [...ledger[file.key]] : [], tracked };
    });
  }

  /**
   * Custom files on disk that the custom ledger does not know about.
   * Schema files missing from the schema ledger are treated as having no migrations applied.
   */
  findUntrackedConfigs(): string[] {
    return this.fetchConfigs()
      .filter(file => !file.isSchema && !file.tracked)
      .map(file => file.key);
  }

  /**
   * Definition files in the definitions directory whose version is not registered.
   */
  findUnregisteredDefinitions(): string[] {
    const dir = this.workspace.config.definitionsDir;
    if (!existsSync(dir)) {
      return [];
    }

    return readdirSync(dir)
      .filter(name => {
        const match = DEFINITION_FILE_PATTERN.exec(name);
        return match !== null && !this.registry.has(match[1]);
      })
      .sort();
  }

  warnUnregisteredDefinitions(): void {
    for (const name of this.findUnregisteredDefinitions()) {
      logger.warn(`Migration file ${name} is not registered and will not run`);
    }
  }
}
