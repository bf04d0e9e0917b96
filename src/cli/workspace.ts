import { InvalidArgumentError, type Command } from 'commander';
import { loadConfig } from '../config/config.js';
import { MigrationWorkspace } from '../migrations/index.js';
import { logger } from '../utils/logger.js';

type GlobalOptions = {
  root?: string;
  debug?: boolean;
};

/**
 * Workspace for the project root selected by the global options.
 * Commands other than init and reset pass `requireLedger`.
 */
export function openWorkspace(command: Command, options: { requireLedger?: boolean } = {}): MigrationWorkspace {
  const globals = command.optsWithGlobals<GlobalOptions>();

  if (globals.debug) {
    const sessionDir = logger.enableDebugMode();
    if (sessionDir) {
      logger.info(`Debug logs: ${sessionDir}`);
    }
  }

  const workspace = new MigrationWorkspace(loadConfig({ rootDir: globals.root, debug: globals.debug }));
  logger.debug(`[cli] ${command.name()} in ${workspace.rootDir}`);

  if (options.requireLedger) {
    workspace.requireLedger();
  }
  return workspace;
}

/**
 * commander argument parser for --step
 */
export function parseStep(value: string): number {
  const step = Number(value);
  if (!Number.isInteger(step) || step < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return step;
}
