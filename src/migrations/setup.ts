import { existsSync, readFileSync, rmSync } from 'fs';
import path from 'path';
import { customKeyForSchema, isSameFamily } from './config-files.js';
import type { JsonValue } from './types.js';
import type { MigrationWorkspace } from './workspace.js';
import {
  ConfigFormatError,
  ConfigNotFoundError,
  MigrateError,
  SubconfigMismatchError,
  getErrorMessage
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface InitResult {
  created: string[];
  skipped: string[];
}

export interface SubconfigResult {
  subconfig: string;
  reference: string;
  versions: string[];
  createdFile: boolean;
}

function readJsonFile(filePath: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(readFileSync(filePath, 'utf-8'));
    return parsed;
  } catch (error: unknown) {
    throw new ConfigFormatError(filePath, `invalid JSON: ${getErrorMessage(error)}`);
  }
}

/**
 * Create custom config files from their schemas
 *
 * New files inherit the schema's applied versions. Existing custom files are left alone;
 * they carry their own history and are brought forward by `up`.
 */
export function initFromSchemas(workspace: MigrationWorkspace): InitResult {
  const { status } = workspace;
  const schemaLedger = status.loadLedger('schema');
  const customLedger = status.loadLedger('custom');
  const result: InitResult = { created: [], skipped: [] };

  workspace.transaction(txn => {
    for (const schema of workspace.listConfigFiles().filter(file => file.isSchema)) {
      const targetKey = customKeyForSchema(schema);
      const target = workspace.resolve(targetKey);

      if (existsSync(target)) {
        result.skipped.push(targetKey);
        continue;
      }

      txn.write(target, readJsonFile(workspace.resolve(schema.key)));
      customLedger[targetKey] = [...(schemaLedger[schema.key] ?? [])];
      result.created.push(targetKey);
      logger.debug(`[init] ${schema.key} -> ${targetKey}`);
    }

    if (result.created.length > 0 || !existsSync(status.customStatusFile)) {
      txn.write(status.customStatusFile, customLedger);
    }
    if (!existsSync(status.schemaStatusFile)) {
      txn.write(status.schemaStatusFile, schemaLedger);
    }
  });

  return result;
}

/**
 * Reference a subconfig is derived from: coordinates/w64h32.alt.json -> coordinates/w64h32.json
 */
export function inferReference(subconfigKey: string): string {
  const dir = path.posix.dirname(subconfigKey);
  const parts = path.posix.basename(subconfigKey).split('.');
  const name = `${parts[0]}.${parts[parts.length - 1]}`;
  return dir === '.' ? name : `${dir}/${name}`;
}

/**
 * Create a subconfig that shares the reference's migration history.
 * An existing subconfig is only registered when its history already matches.
 */
export function createSubconfig(workspace: MigrationWorkspace, subconfig: string, reference?: string): SubconfigResult {
  const subKey = workspace.key(subconfig);
  const refKey = reference ? workspace.key(reference) : inferReference(subKey);
  const subDescriptor = workspace.describe(subKey);
  const refDescriptor = workspace.describe(refKey);

  if (!subDescriptor || subDescriptor.isSchema) {
    throw new MigrateError(`${subKey} is not a valid subconfig name (expected <family>.<variant>.json)`);
  }
  if (subKey === refKey) {
    throw new MigrateError(`Subconfig ${subKey} cannot reference itself`);
  }
  if (!refDescriptor || !isSameFamily(subDescriptor, refDescriptor)) {
    throw new MigrateError(`Subconfig ${subKey} must be in the same family and directory as ${refKey}`);
  }

  const refPath = workspace.resolve(refKey);
  if (!existsSync(refPath)) {
    throw new ConfigNotFoundError(refKey);
  }

  const versions = workspace.status.getMigrations(refKey);
  const subPath = workspace.resolve(subKey);
  const alreadyExists = existsSync(subPath);

  if (alreadyExists) {
    const current = workspace.status.getMigrations(subKey);
    const matches = current.length === versions.length && current.every((v, i) => v === versions[i]);
    if (!matches) {
      throw new SubconfigMismatchError(subKey, refKey);
    }
    logger.debug(`[subconfig] ${subKey} already exists, only writing migration status`);
  }

  workspace.transaction(txn => {
    if (!alreadyExists) {
      txn.write(subPath, readJsonFile(refPath));
    }
    txn.loadForUpdate(workspace.status.customStatusFile, ledger => {
      ledger[subKey] = [...versions];
    });
  });

  return { subconfig: subKey, reference: refKey, versions, createdFile: !alreadyExists };
}

/**
 * Delete every custom file (base and subconfigs) of families that have a schema,
 * then the custom ledger. Schemas and the schema ledger are untouched.
 */
export function resetCustomConfigs(workspace: MigrationWorkspace): string[] {
  const files = workspace.listConfigFiles();
  const schemas = files.filter(file => file.isSchema);
  const removed: string[] = [];

  for (const file of files) {
    if (file.isSchema || !schemas.some(schema => isSameFamily(schema, file))) {
      continue;
    }
    rmSync(workspace.resolve(file.key));
    removed.push(file.key);
    logger.debug(`[reset] removed ${file.key}`);
  }

  if (existsSync(workspace.status.customStatusFile)) {
    rmSync(workspace.status.customStatusFile);
    removed.push(workspace.key(workspace.status.customStatusFile));
  }

  return removed;
}
