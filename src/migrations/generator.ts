import { existsSync, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import { InvalidMigrationNameError, MigrateError } from '../utils/errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface GeneratedMigration {
  version: string;
  name: string;
  className: string;
  filePath: string;
}

export function isValidMigrationName(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * v8_config_to_v9 -> V8ConfigToV9Migration
 */
export function toClassName(name: string): string {
  const pascal = name
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join('');
  return `${pascal}Migration`;
}

export function renderMigrationTemplate(version: string, name: string, className: string): string {
  return `import { ConfigMigration, type MigrationContext, type Transaction } from '../migrations/index.js';

export class ${className} extends ConfigMigration {
  readonly version = '${version}';
  readonly name = '${name}';

  up(_txn: Transaction, _ctx: MigrationContext): void {
    throw new Error('Migration logic not implemented.');
  }

  // Implement down() to make this migration reversible.
  // Without it, down() returns IRREVERSIBLE and rollbacks stop here.
}
`;
}

/**
 * Write a new migration definition stamped with the current unix time.
 * The file still has to be added to the definitions list before it runs.
 */
export function generateMigration(name: string, dir: string, now: Date = new Date()): GeneratedMigration {
  if (!isValidMigrationName(name)) {
    throw new InvalidMigrationNameError(name);
  }

  const version = String(Math.floor(now.getTime() / 1000));
  const className = toClassName(name);
  const filePath = path.join(dir, `${version}_${name}.ts`);

  if (existsSync(filePath)) {
    throw new MigrateError(`Migration file already exists: ${filePath}`);
  }

  mkdirSync(dir, { recursive: true });
  writeFileSync(filePath, renderMigrationTemplate(version, name, className), 'utf-8');

  return { version, name, className, filePath };
}
