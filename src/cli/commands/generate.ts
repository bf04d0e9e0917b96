import { Command } from 'commander';
import chalk from 'chalk';
import path from 'path';
import { generateMigration } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace } from '../workspace.js';

export function createGenerateCommand(): Command {
  const command = new Command('generate');

  command
    .description('Create a new migration file stamped with the current time')
    .argument('<name>', 'Migration name (letters, digits, underscores)')
    .action((name: string, _options: Record<string, never>, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd, { requireLedger: true });
        const generated = generateMigration(name, workspace.config.definitionsDir);
        const indexFile = workspace.key(path.join(path.dirname(generated.filePath), 'index.ts'));

        logger.success(`Created ${workspace.key(generated.filePath)}`);
        console.log(chalk.dim(`  Register ${generated.className} in ${indexFile} to run it.`));
      } catch (error: unknown) {
        logger.error('Failed to generate migration:', error);
        process.exit(1);
      }
    });

  return command;
}
