import { Command } from 'commander';
import { MigrationManager, MigrationRunner, type MigrationRegistry } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace, parseStep } from '../workspace.js';

interface UpOptions {
  step?: number;
}

export function createUpCommand(registry: MigrationRegistry): Command {
  const command = new Command('up');

  command
    .description('Apply pending migrations')
    .option('-s, --step <n>', 'Apply at most n migrations (default: all)', parseStep)
    .action((options: UpOptions, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd, { requireLedger: true });
        const runner = new MigrationRunner(new MigrationManager(workspace, registry));
        const summary = runner.runUp({ step: options.step });

        if (summary.total > 0) {
          logger.success(`${summary.applied} migration(s) applied`);
        }
      } catch (error: unknown) {
        logger.error('Migration failed:', error);
        process.exit(1);
      }
    });

  return command;
}
