import { Command } from 'commander';
import { MigrationManager, MigrationRunner, type MigrationRegistry } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace, parseStep } from '../workspace.js';

interface DownOptions {
  step?: number;
}

export function createDownCommand(registry: MigrationRegistry): Command {
  const command = new Command('down');

  command
    .description('Roll back applied migrations, newest first')
    .option('-s, --step <n>', 'Roll back at most n migrations', parseStep, 1)
    .action((options: DownOptions, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd, { requireLedger: true });
        const runner = new MigrationRunner(new MigrationManager(workspace, registry));
        const summary = runner.runDown({ step: options.step });

        if (summary.total > 0) {
          logger.success(`${summary.applied} migration(s) rolled back`);
        }
      } catch (error: unknown) {
        logger.error('Rollback failed:', error);
        process.exit(1);
      }
    });

  return command;
}
