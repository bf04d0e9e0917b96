import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { MigrationManager, MigrationMode, MigrationRunner, type MigrationRegistry } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace } from '../workspace.js';

export function createStatusCommand(registry: MigrationRegistry): Command {
  const command = new Command('status');

  command
    .description('Show applied and pending migrations for every config file')
    .action((_options: Record<string, never>, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd, { requireLedger: true });
        const manager = new MigrationManager(workspace, registry);
        manager.warnUnregisteredDefinitions();

        const plan = new MigrationRunner(manager).plan(MigrationMode.UP);

        const table = new Table({
          head: [chalk.cyan('File'), chalk.cyan('Kind'), chalk.cyan('Applied'), chalk.cyan('Pending')],
          style: {
            head: [],
            border: ['grey']
          }
        });

        for (const state of plan.fileStates.values()) {
          table.push([
            chalk.white(state.key),
            state.isSchema ? chalk.magenta('schema') : chalk.white('custom'),
            chalk.green(String(state.applied.size)),
            state.pending.length > 0
              ? chalk.yellow(state.pending.map(migration => migration.version).join('\n'))
              : chalk.dim('-')
          ]);
        }

        console.log(chalk.bold(`\n${registry.size} registered migration(s)\n`));
        console.log(table.toString());

        const overlaps = workspace.status.overlaps();
        if (overlaps.length > 0) {
          logger.warn(`Recorded in both ledgers: ${overlaps.join(', ')}`);
        }
      } catch (error: unknown) {
        logger.error('Failed to read migration status:', error);
        process.exit(1);
      }
    });

  return command;
}
