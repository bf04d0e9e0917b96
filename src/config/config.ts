import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { isPathWithinDirectory } from '../utils/paths.js';

dotenv.config();

export const CONFIG_FILENAME = 'migrate.config.json';

const MigrateConfigFileSchema = z.object({
  searchDirs: z.array(z.string().min(1)).nonempty().optional(),
  ignore: z.array(z.string()).optional(),
  schemaMarker: z.string().regex(/^[^.\/\\]+$/, 'must be a single filename segment').optional(),
  statusDir: z.string().min(1).optional(),
  stagingDir: z.string().min(1).optional(),
  definitionsDir: z.string().min(1).optional()
}).strict();

export type MigrateConfigFile = z.infer<typeof MigrateConfigFileSchema>;

/**
 * Fully resolved configuration for one project root.
 * Directory settings are absolute; `searchDirs` stay relative to `rootDir`.
 */
export interface MigrateConfig {
  rootDir: string;
  searchDirs: string[];
  ignore: string[];
  schemaMarker: string;
  statusDir: string;
  stagingDir: string;
  definitionsDir: string;
  debug: boolean;
}

export const DEFAULT_CONFIG: Omit<MigrateConfig, 'rootDir' | 'debug'> = {
  searchDirs: ['.'],
  ignore: ['emulator_config.json'],
  schemaMarker: 'schema',
  statusDir: 'migrations',
  stagingDir: 'migrations/.transaction',
  definitionsDir: 'src/definitions'
};

function readConfigFile(configPath: string): MigrateConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${getErrorMessage(error)}`);
  }

  const parsed = MigrateConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${CONFIG_FILENAME}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load configuration for a project root
 *
 * Priority: explicit rootDir > CONFIG_MIGRATE_ROOT > current directory.
 * Settings come from migrate.config.json in the root when present, else defaults.
 */
export function loadConfig(options: { rootDir?: string; debug?: boolean } = {}): MigrateConfig {
  const rootDir = path.resolve(options.rootDir || process.env.CONFIG_MIGRATE_ROOT || process.cwd());
  const configPath = path.join(rootDir, CONFIG_FILENAME);
  const fileConfig = existsSync(configPath) ? readConfigFile(configPath) : {};

  const debug = options.debug
    ?? (process.env.CONFIG_MIGRATE_DEBUG === 'true' || process.env.CONFIG_MIGRATE_DEBUG === '1');

  const config: MigrateConfig = {
    rootDir,
    searchDirs: fileConfig.searchDirs ?? DEFAULT_CONFIG.searchDirs,
    ignore: fileConfig.ignore ?? DEFAULT_CONFIG.ignore,
    schemaMarker: fileConfig.schemaMarker ?? DEFAULT_CONFIG.schemaMarker,
    statusDir: path.resolve(rootDir, fileConfig.statusDir ?? DEFAULT_CONFIG.statusDir),
    stagingDir: path.resolve(rootDir, fileConfig.stagingDir ?? DEFAULT_CONFIG.stagingDir),
    definitionsDir: path.resolve(rootDir, fileConfig.definitionsDir ?? DEFAULT_CONFIG.definitionsDir),
    debug
  };

  assertStagingDirIsolated(config);
  return config;
}

/**
 * Staged copies are deleted with their directory, so the staging directory
 * may not be, or contain, the root, the ledger directory or a search directory.
 */
function assertStagingDirIsolated(config: MigrateConfig): void {
  const protectedDirs: Array<[string, string]> = [
    ['rootDir', config.rootDir],
    ['statusDir', config.statusDir],
    ...config.searchDirs.map((dir): [string, string] => [`searchDirs entry '${dir}'`, path.resolve(config.rootDir, dir)])
  ];

  for (const [label, dir] of protectedDirs) {
    if (isPathWithinDirectory(config.stagingDir, dir)) {
      throw new ConfigurationError(`Invalid ${CONFIG_FILENAME}: stagingDir must not be or contain ${label}`);
    }
  }
}
