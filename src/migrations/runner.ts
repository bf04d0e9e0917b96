import chalk from 'chalk';
import { MigrationExecutionPlan } from './plan.js';
import type { MigrationManager } from './manager.js';
import { MigrationMode, type MigrationExecutionResult, type MigrationRunSummary } from './types.js';
import { IrreversibleMigrationError, MigrationFailedError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RunOptions {
  /** Maximum number of migrations that may commit changes (up: all, down: 1) */
  step?: number;
  /** Suppress progress output */
  silent?: boolean;
}

const RULE = '='.repeat(80);

/**
 * Migration runner
 * Executes a batch of migrations file-by-file as computed by the plan
 */
export class MigrationRunner {
  constructor(private readonly manager: MigrationManager) {}

  runUp(options: RunOptions = {}): MigrationRunSummary {
    return this.run(MigrationMode.UP, options.step ?? Number.POSITIVE_INFINITY, options.silent ?? false);
  }

  runDown(options: RunOptions = {}): MigrationRunSummary {
    return this.run(MigrationMode.DOWN, options.step ?? 1, options.silent ?? false);
  }

  /**
   * Build a plan for `mode` without executing it
   */
  plan(mode: MigrationMode): MigrationExecutionPlan {
    return MigrationExecutionPlan.build(this.manager, mode);
  }

  private run(mode: MigrationMode, step: number, silent: boolean): MigrationRunSummary {
    const summary: MigrationRunSummary = { total: 0, applied: 0, skipped: 0, rolledBack: 0 };
    const print = (...lines: string[]): void => {
      if (!silent) {
        console.log(...lines);
      }
    };

    logger.debug(`[MigrationRunner] Starting ${mode} (step: ${step})`);
    this.manager.warnUnregisteredDefinitions();

    const plan = this.plan(mode);
    if (!plan.hasWork()) {
      print(chalk.dim(mode === MigrationMode.UP ? 'No migrations to execute.' : 'No migrations to roll back.'));
      return summary;
    }

    print(chalk.bold(mode === MigrationMode.UP ? '\nExecuting migrations...' : '\nRolling back migrations...'));

    let remaining = step;
    for (const migration of plan.ordered) {
      if (remaining <= 0) {
        break;
      }

      const targets = plan.getTargets(migration.version);
      print(RULE);
      print(chalk.cyan(`${mode === MigrationMode.UP ? 'MIGRATE' : 'ROLLBACK'} ${migration.describe()}`));
      if (migration.description) {
        print(chalk.dim(`  ${migration.description}`));
      }

      if (targets.length === 0) {
        print(chalk.dim(mode === MigrationMode.UP
          ? '  -- Up to date, skipping migration. --'
          : '  -- Migration not applied, skipping. --'));
        continue;
      }

      summary.total++;

      let result: MigrationExecutionResult;
      try {
        result = migration.execute(this.manager.workspace, mode, targets);
      } catch (error: unknown) {
        print(chalk.red(`  ✗ ${getErrorMessage(error)}`));
        logger.debug(`[MigrationRunner] ${migration.describe()} failed: ${getErrorMessage(error)}`);
        if (error instanceof IrreversibleMigrationError) {
          throw error;
        }
        throw new MigrationFailedError(migration.version, migration.name, error);
      }

      switch (result.state) {
        case 'committed':
          summary.applied++;
          remaining--;
          if (mode === MigrationMode.UP) {
            plan.markApplied(migration.version, result.files);
          } else {
            plan.markRemoved(migration.version, result.files);
          }
          for (const file of result.files) {
            print(chalk.dim(`  ${file}`));
          }
          print(chalk.green('  ✓'), chalk.dim(mode === MigrationMode.UP ? 'Applied' : 'Rolled back'));
          break;
        case 'unchanged':
          summary.skipped++;
          print(chalk.yellow('  ⊘'), chalk.dim('No target files changed'));
          break;
        case 'rolled_back':
          summary.rolledBack++;
          print(chalk.yellow('  ↺'), chalk.dim(`Rolled back by migration: ${result.reason ?? ''}`));
          break;
      }
    }

    print(RULE);
    logger.debug(
      `[MigrationRunner] ${mode} complete: ${summary.applied} applied, ${summary.skipped} skipped, ` +
      `${summary.rolledBack} rolled back`
    );

    return summary;
  }
}
