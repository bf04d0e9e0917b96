/**
 * Migration execution planning
 *
 * Determines which files need which migrations, so a file can lag behind others in the
 * same family and still be brought up to date one migration at a time.
 */

import type { ConfigMigration } from './migration.js';
import type { MigrationManager, TrackedConfigFile } from './manager.js';
import { MigrationMode } from './types.js';
import { UntrackedConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Migration state of a single configuration file */
export class FileState {
  readonly applied: Set<string>;
  readonly pending: ConfigMigration[] = [];
  readonly rollback: ConfigMigration[] = [];

  constructor(readonly file: TrackedConfigFile) {
    this.applied = new Set(file.applied);
  }

  get key(): string {
    return this.file.key;
  }

  get isSchema(): boolean {
    return this.file.isSchema;
  }

  /** UP: migration still needs to be applied */
  needsMigration(version: string): boolean {
    return !this.applied.has(version);
  }

  /** DOWN: migration can be rolled back */
  hasMigration(version: string): boolean {
    return this.applied.has(version);
  }
}

/**
 * Read-only view of what a batch would do, computed before anything is mutated.
 *
 * Usage:
 *   const plan = MigrationExecutionPlan.build(manager, MigrationMode.UP);
 *   for (const migration of plan.migrations) {
 *     const files = plan.getFilesNeeding(migration.version);
 *     if (files.length > 0) migration.execute(workspace, MigrationMode.UP, files);
 *   }
 */
export class MigrationExecutionPlan {
  readonly fileStates = new Map<string, FileState>();

  private constructor(
    readonly mode: MigrationMode,
    readonly migrations: ConfigMigration[]
  ) {}

  static build(manager: MigrationManager, mode: MigrationMode = MigrationMode.UP): MigrationExecutionPlan {
    const untracked = manager.findUntrackedConfigs();
    if (untracked.length > 0) {
      throw new UntrackedConfigError(untracked);
    }

    const plan = new MigrationExecutionPlan(mode, manager.loadMigrations());

    for (const file of manager.fetchConfigs()) {
      const state = new FileState(file);
      for (const migration of plan.migrations) {
        if (state.needsMigration(migration.version)) {
          state.pending.push(migration);
        } else {
          state.rollback.push(migration);
        }
      }
      plan.fileStates.set(file.key, state);
    }

    logger.debug(
      `[MigrationExecutionPlan] ${mode}: ${plan.fileStates.size} file(s), ${plan.migrations.length} migration(s)`
    );

    return plan;
  }

  /** Migrations in the order this plan's mode executes them */
  get ordered(): ConfigMigration[] {
    return this.mode === MigrationMode.UP ? [...this.migrations] : [...this.migrations].reverse();
  }

  /** UP: keys of files that do not have `version` yet */
  getFilesNeeding(version: string): string[] {
    return [...this.fileStates.values()].filter(state => state.needsMigration(version)).map(state => state.key);
  }

  /** DOWN: keys of files that have `version` applied */
  getFilesHaving(version: string): string[] {
    return [...this.fileStates.values()].filter(state => state.hasMigration(version)).map(state => state.key);
  }

  /** Files this plan's mode would hand to `version` */
  getTargets(version: string): string[] {
    return this.mode === MigrationMode.UP ? this.getFilesNeeding(version) : this.getFilesHaving(version);
  }

  hasWork(mode: MigrationMode = this.mode): boolean {
    return [...this.fileStates.values()].some(state =>
      this.migrations.some(migration =>
        mode === MigrationMode.UP ? state.needsMigration(migration.version) : state.hasMigration(migration.version)
      )
    );
  }

  markApplied(version: string, files: readonly string[]): void {
    for (const key of files) {
      this.fileStates.get(key)?.applied.add(version);
    }
  }

  markRemoved(version: string, files: readonly string[]): void {
    for (const key of files) {
      this.fileStates.get(key)?.applied.delete(version);
    }
  }
}
