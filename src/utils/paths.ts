/**
 * Path Utilities
 *
 * Consolidated path operations including:
 * - Cross-platform path normalization
 * - Project-relative ledger keys
 * - Security checks (directory traversal prevention)
 * - Migrate home directory resolution
 * - ESM module path utilities
 */

import path from 'path';
import { homedir } from 'os';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

// ============================================================================
// Path Normalization and Manipulation
// ============================================================================

/**
 * Normalize path separators to forward slashes for cross-platform consistency
 *
 * @param filePath - Path with either forward slashes or backslashes
 * @returns Path with only forward slashes
 *
 * @example
 * normalizePathSeparators('coordinates\\w64h32.schema.json')
 * // Returns: 'coordinates/w64h32.schema.json'
 */
export function normalizePathSeparators(filePath: string): string {
  return filePath.replaceAll('\\', '/');
}

/**
 * Split path into parts using forward slash as separator
 *
 * @example
 * splitPath('coordinates\\w64h32.json')
 * // Returns: ['coordinates', 'w64h32.json']
 */
export function splitPath(filePath: string): string[] {
  return normalizePathSeparators(filePath).split('/');
}

/**
 * Get the filename from a path (last segment)
 *
 * @example
 * getFilename('colors/teams.schema.json')
 * // Returns: 'teams.schema.json'
 */
export function getFilename(filePath: string): string {
  const parts = splitPath(filePath);
  return parts.at(-1) || '';
}

// ============================================================================
// Project-relative Keys
// ============================================================================

/**
 * Convert a path into the key used by the migration ledgers
 *
 * Keys are relative to the project root and always use forward slashes,
 * so ledgers written on one platform stay valid on another.
 *
 * @param rootDir - Absolute project root
 * @param filePath - Absolute path, or a path relative to the project root
 * @returns Normalized relative key
 *
 * @example
 * toProjectKey('/srv/board', '/srv/board/coordinates/w64h32.json')
 * // Returns: 'coordinates/w64h32.json'
 *
 * @example
 * toProjectKey('/srv/board', './config.json')
 * // Returns: 'config.json'
 */
export function toProjectKey(rootDir: string, filePath: string): string {
  const absolute = path.resolve(rootDir, filePath);
  return normalizePathSeparators(path.relative(rootDir, absolute));
}

/**
 * Resolve a ledger key (or any project-relative path) to an absolute path
 *
 * @example
 * resolveProjectPath('/srv/board', 'coordinates/w64h32.json')
 * // Returns: '/srv/board/coordinates/w64h32.json'
 */
export function resolveProjectPath(rootDir: string, filePath: string): string {
  return path.resolve(rootDir, filePath);
}

// ============================================================================
// Security Utilities
// ============================================================================

/**
 * Check if a resolved path is within a working directory boundary
 *
 * Uses path.relative() rather than string prefix matching, which can be bypassed
 * by paths like /home/user/project-other when checking /home/user/project.
 *
 * @example
 * isPathWithinDirectory('/home/user/project', '/home/user/project/file.txt')
 * // Returns: true
 *
 * @example
 * isPathWithinDirectory('/home/user/project', '/home/user/project-other/file.txt')
 * // Returns: false
 */
export function isPathWithinDirectory(workingDir: string, resolvedPath: string): boolean {
  const relative = path.relative(workingDir, resolvedPath);
  return !relative.startsWith('..') && !path.isAbsolute(relative);
}

// ============================================================================
// Migrate Home Directory Resolution
// ============================================================================

/**
 * Get the config-migrate home directory (debug logs live here)
 *
 * Priority:
 * 1. CONFIG_MIGRATE_HOME environment variable
 * 2. ~/.config-migrate (default)
 *
 * @example
 * process.env.CONFIG_MIGRATE_HOME = '/tmp/config-migrate-test-12345';
 * getMigrateHome() // => '/tmp/config-migrate-test-12345'
 */
export function getMigrateHome(): string {
  if (process.env.CONFIG_MIGRATE_HOME) {
    return process.env.CONFIG_MIGRATE_HOME;
  }

  return path.join(homedir(), '.config-migrate');
}

// ============================================================================
// ESM Module Path Utilities
// ============================================================================

/**
 * Get the directory name of the current module (ESM equivalent of __dirname)
 *
 * @param importMetaUrl - Pass import.meta.url from the calling module
 *
 * @example
 * const __dirname = getDirname(import.meta.url);
 */
export function getDirname(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}
