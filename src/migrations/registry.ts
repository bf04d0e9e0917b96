import { MIGRATION_VERSION_PATTERN, type ConfigMigration } from './migration.js';
import { DuplicateMigrationError, MigrateError } from '../utils/errors.js';

/**
 * Migration registry
 * Holds the explicit list of compiled-in migrations, ordered by version
 */
export class MigrationRegistry {
  private readonly migrations = new Map<string, ConfigMigration>();

  constructor(migrations: readonly ConfigMigration[] = []) {
    for (const migration of migrations) {
      this.register(migration);
    }
  }

  register(migration: ConfigMigration): void {
    if (!MIGRATION_VERSION_PATTERN.test(migration.version)) {
      throw new MigrateError(`Migration ${migration.name} has an invalid version '${migration.version}' (expected a unix timestamp)`);
    }
    if (this.migrations.has(migration.version)) {
      throw new DuplicateMigrationError(migration.version);
    }
    this.migrations.set(migration.version, migration);
  }

  /**
   * All migrations in ascending version order.
   * Versions are compared numerically, so a shorter timestamp still sorts first.
   */
  getAll(): ConfigMigration[] {
    return [...this.migrations.values()].sort((a, b) => compareVersions(a.version, b.version));
  }

  get(version: string): ConfigMigration | undefined {
    return this.migrations.get(version);
  }

  has(version: string): boolean {
    return this.migrations.has(version);
  }

  get size(): number {
    return this.migrations.size;
  }
}

export function compareVersions(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}
