import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { resetCustomConfigs } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace } from '../workspace.js';

interface ResetOptions {
  force?: boolean;
}

export function createResetCommand(): Command {
  const command = new Command('reset');

  command
    .description('Delete all custom config files and the custom ledger; schemas are kept')
    .option('-f, --force', 'Skip the confirmation prompt')
    .action(async (options: ResetOptions, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd);

        if (!options.force) {
          const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
            {
              type: 'confirm',
              name: 'confirm',
              message: 'This deletes every custom config file. Continue?',
              default: false
            }
          ]);

          if (!confirm) {
            console.log(chalk.yellow('Reset cancelled.'));
            return;
          }
        }

        const removed = resetCustomConfigs(workspace);
        for (const key of removed) {
          console.log(`  ${chalk.red('✗')} Removed ${key}`);
        }
        logger.success(`Reset complete. Run 'config-migrate init' to start fresh.`);
      } catch (error: unknown) {
        logger.error('Reset failed:', error);
        process.exit(1);
      }
    });

  return command;
}
