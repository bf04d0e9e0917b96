import { Command } from 'commander';
import chalk from 'chalk';
import { initFromSchemas } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace } from '../workspace.js';

export function createInitCommand(): Command {
  const command = new Command('init');

  command
    .description('Create custom config files from their schemas and start the migration ledgers')
    .action((_options: Record<string, never>, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd);
        const result = initFromSchemas(workspace);

        for (const key of result.created) {
          console.log(`  ${chalk.green('✓')} Created ${key}`);
        }
        for (const key of result.skipped) {
          console.log(`  ${chalk.dim('⊘')} ${chalk.dim(`${key} already exists, run 'up' to migrate it`)}`);
        }

        logger.success(`Initialized ${result.created.length} config file(s)`);
      } catch (error: unknown) {
        logger.error('Initialization failed:', error);
        process.exit(1);
      }
    });

  return command;
}
