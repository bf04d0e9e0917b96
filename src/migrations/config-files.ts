import path from 'path';
import { getFilename, normalizePathSeparators } from '../utils/paths.js';

/**
 * Structured view of a config filename
 *
 * config.schema.json -> { family: 'config', variant: null, isSchema: true,  ext: 'json' }
 * config.json        -> { family: 'config', variant: null, isSchema: false, ext: 'json' }
 * config.beta.json   -> { family: 'config', variant: 'beta', isSchema: false, ext: 'json' }
 */
export interface ConfigFile {
  /** Ledger key: project-relative, forward slashes */
  key: string;
  /** Directory part of the key ('' for the root) */
  dir: string;
  filename: string;
  family: string;
  variant: string | null;
  isSchema: boolean;
  ext: string;
}

export interface FamilyOptions {
  expandSchema: boolean;
  ignore: readonly string[];
}

/**
 * Parse a project-relative key into a ConfigFile descriptor.
 * Returns null for names without a family and an extension (e.g. "Makefile").
 */
export function parseConfigFile(key: string, schemaMarker: string): ConfigFile | null {
  const normalized = normalizePathSeparators(key);
  const filename = getFilename(normalized);
  const parts = filename.split('.');

  if (parts.length < 2 || parts[0] === '') {
    return null;
  }

  const middle = parts.slice(1, -1);
  const isSchema = middle.includes(schemaMarker);
  const variantParts = middle.filter(part => part !== schemaMarker);
  const dir = path.posix.dirname(normalized);

  return {
    key: normalized,
    dir: dir === '.' ? '' : dir,
    filename,
    family: parts[0],
    variant: variantParts.length > 0 ? variantParts.join('.') : null,
    isSchema,
    ext: parts[parts.length - 1]
  };
}

export function isSameFamily(a: ConfigFile, b: ConfigFile): boolean {
  return a.dir === b.dir && a.family === b.family && a.ext === b.ext;
}

/**
 * Key of the custom file a schema is the template for: config.schema.json -> config.json
 */
export function customKeyForSchema(schema: ConfigFile): string {
  const name = schema.variant
    ? `${schema.family}.${schema.variant}.${schema.ext}`
    : `${schema.family}.${schema.ext}`;
  return schema.dir ? `${schema.dir}/${name}` : name;
}

/**
 * Expand a reference file to every sibling that should receive the same change.
 *
 * - Schema reference, expandSchema: every custom file and subconfig of the family
 * - Schema reference, !expandSchema: the schema itself
 * - Custom reference: every custom file and subconfig of the family
 *
 * Schema files and ignore-listed names never appear in an expansion.
 */
export function expandFamily(
  reference: ConfigFile,
  listing: readonly ConfigFile[],
  options: FamilyOptions
): ConfigFile[] {
  if (reference.isSchema && !options.expandSchema) {
    return [reference];
  }

  return listing
    .filter(candidate => isSameFamily(reference, candidate))
    .filter(candidate => !candidate.isSchema)
    .filter(candidate => !options.ignore.includes(candidate.filename))
    .sort((a, b) => a.key.localeCompare(b.key));
}
