#!/usr/bin/env node

import { createRegistry } from '../definitions/index.js';
import { logger } from '../utils/logger.js';
import { createCLI } from './cli.js';

const program = createCLI({ registry: createRegistry() });

if (process.argv.length === 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Unexpected error:', error);
  process.exit(1);
});
