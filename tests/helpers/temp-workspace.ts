/**
 * Temporary Workspace - Helper for creating isolated project roots
 *
 * Creates temporary directories with helper methods for file operations
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadConfig } from '../../src/config/config.js';
import { MigrationWorkspace } from '../../src/migrations/workspace.js';

export class TempWorkspace {
  public readonly path: string;

  constructor(prefix: string = 'config-migrate-test-') {
    this.path = mkdtempSync(join(tmpdir(), prefix));
  }

  /**
   * Write a file to the workspace
   */
  writeFile(relativePath: string, content: string): string {
    const fullPath = join(this.path, relativePath);

    // Create parent directories if needed
    const dir = join(fullPath, '..');
    mkdirSync(dir, { recursive: true });

    writeFileSync(fullPath, content, 'utf-8');
    return fullPath;
  }

  /**
   * Read a file from the workspace
   */
  readFile(relativePath: string): string {
    const fullPath = join(this.path, relativePath);
    return readFileSync(fullPath, 'utf-8');
  }

  /**
   * Write a JSON file the way the engine serializes it (2-space indent, trailing newline)
   */
  writeJSON(relativePath: string, data: unknown): string {
    return this.writeFile(relativePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  /**
   * Read a JSON file from the workspace
   */
  readJSON(relativePath: string): unknown {
    return JSON.parse(this.readFile(relativePath));
  }

  /**
   * Write both ledgers under migrations/
   */
  writeLedgers(ledgers: { schema?: Record<string, unknown>; custom?: Record<string, unknown> }): void {
    if (ledgers.schema) {
      this.writeJSON('migrations/schema-status.json', ledgers.schema);
    }
    if (ledgers.custom) {
      this.writeJSON('migrations/custom-status.json', ledgers.custom);
    }
  }

  readLedger(kind: 'schema' | 'custom'): unknown {
    return this.readJSON(`migrations/${kind}-status.json`);
  }

  exists(relativePath: string): boolean {
    return existsSync(join(this.path, relativePath));
  }

  list(relativePath: string = '.'): string[] {
    return readdirSync(join(this.path, relativePath)).sort();
  }

  /**
   * Migration workspace rooted at this directory, with default settings
   */
  openProject(): MigrationWorkspace {
    return new MigrationWorkspace(loadConfig({ rootDir: this.path, debug: false }));
  }

  /**
   * Get the full path for a relative path in the workspace
   */
  resolve(relativePath: string): string {
    return join(this.path, relativePath);
  }

  /**
   * Clean up the workspace (remove all files)
   */
  cleanup(): void {
    try {
      rmSync(this.path, { recursive: true, force: true });
    } catch (error) {
      // Ignore cleanup errors
      console.warn(`Failed to cleanup workspace: ${this.path}`, error);
    }
  }

  /**
   * Create a directory in the workspace
   */
  mkdir(relativePath: string): string {
    const fullPath = join(this.path, relativePath);
    mkdirSync(fullPath, { recursive: true });
    return fullPath;
  }
}

/**
 * Create a temporary workspace for testing
 */
export function createTempWorkspace(prefix?: string): TempWorkspace {
  return new TempWorkspace(prefix);
}
