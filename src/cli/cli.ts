import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { MigrationRegistry } from '../migrations/index.js';
import { getDirname } from '../utils/paths.js';
import { createInitCommand } from './commands/init.js';
import { createGenerateCommand } from './commands/generate.js';
import { createUpCommand } from './commands/up.js';
import { createDownCommand } from './commands/down.js';
import { createSubconfigCommand } from './commands/subconfig.js';
import { createResetCommand } from './commands/reset.js';
import { createStatusCommand } from './commands/status.js';

export interface CLIOptions {
  registry: MigrationRegistry;
}

function readVersion(): string {
  try {
    // Same relative location from src/cli and dist/cli
    const packageJsonPath = join(getDirname(import.meta.url), '../../package.json');
    const packageJson: { version?: unknown } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createCLI({ registry }: CLIOptions): Command {
  const program = new Command();

  program
    .name('config-migrate')
    .description('Transactional, versioned migrations for families of JSON config files')
    .version(readVersion())
    .option('-C, --root <dir>', 'Project root (default: $CONFIG_MIGRATE_ROOT or the current directory)')
    .option('--debug', 'Write debug logs to the session log file');

  program.addCommand(createInitCommand());
  program.addCommand(createGenerateCommand());
  program.addCommand(createUpCommand(registry));
  program.addCommand(createDownCommand(registry));
  program.addCommand(createSubconfigCommand());
  program.addCommand(createResetCommand());
  program.addCommand(createStatusCommand(registry));

  return program;
}
