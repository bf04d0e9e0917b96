import { Command } from 'commander';
import chalk from 'chalk';
import { createSubconfig } from '../../migrations/index.js';
import { logger } from '../../utils/logger.js';
import { openWorkspace } from '../workspace.js';

interface SubconfigOptions {
  reference?: string;
}

export function createSubconfigCommand(): Command {
  const command = new Command('subconfig');

  command
    .description('Create a config variant that shares the migration history of its reference')
    .argument('<path>', 'Subconfig to create, e.g. config.alt.json')
    .option('-r, --reference <path>', 'Reference config (default: <family>.json in the same directory)')
    .action((subconfig: string, options: SubconfigOptions, cmd: Command) => {
      try {
        const workspace = openWorkspace(cmd, { requireLedger: true });
        const result = createSubconfig(workspace, subconfig, options.reference);

        if (result.createdFile) {
          logger.success(`Created ${result.subconfig} from ${result.reference}`);
        } else {
          logger.success(`Registered existing ${result.subconfig}`);
        }
        console.log(chalk.dim(`  ${result.versions.length} migration(s) recorded`));
      } catch (error: unknown) {
        logger.error('Failed to create subconfig:', error);
        process.exit(1);
      }
    });

  return command;
}
