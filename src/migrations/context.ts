import { expandFamily } from './config-files.js';
import { Keypath, hasKey, navigate } from './keypath.js';
import { isJsonObject, type JsonObject, type JsonValue } from './types.js';
import type { Transaction } from './transaction.js';
import type { MigrationWorkspace } from './workspace.js';
import { ConfigNotFoundError, KeyConflictError, KeyNotFoundError } from '../utils/errors.js';

export interface FamilyOption {
  /** Operations on a schema file apply to every custom file of its family (default true) */
  expandSchema?: boolean;
}

export interface AddKeyOptions extends FamilyOption {
  /** Create missing intermediate objects (default true) */
  createParents?: boolean;
}

/**
 * Migration execution context
 *
 * Wraps the migration's transaction and exposes keypath helpers that apply one change to
 * a whole config family. When `targetFiles` is set, only those files are touched.
 *
 * Usage:
 *   ctx.addKey('config.schema.json', 'weather.pregame', true);
 *   ctx.loadForUpdate('config.json', content => { content.key = 'value'; });
 */
export class MigrationContext {
  readonly targetFiles: ReadonlySet<string> | null;

  constructor(
    readonly txn: Transaction,
    private readonly workspace: MigrationWorkspace,
    targetFiles?: readonly string[]
  ) {
    this.targetFiles = targetFiles ? new Set(targetFiles.map(file => workspace.key(file))) : null;
  }

  // Transaction shadows; paths are relative to the project root

  read(filePath: string): JsonValue {
    return this.txn.read(this.workspace.resolve(filePath));
  }

  write(filePath: string, data: JsonValue): void {
    this.txn.write(this.workspace.resolve(filePath), data);
  }

  loadForUpdate<T>(filePath: string, fn: (content: JsonObject) => T): T {
    return this.txn.loadForUpdate(this.workspace.resolve(filePath), fn);
  }

  /** Ledger keys of the files staged so far */
  getModifiedFiles(): string[] {
    return this.txn.getModifiedFiles().map(file => this.workspace.key(file));
  }

  /**
   * Every config file that should receive a change aimed at `references`.
   *
   * configs('config.json')                                   -> ['config.beta.json', 'config.json']
   * configs('config.schema.json')                            -> ['config.beta.json', 'config.json']
   * configs('config.schema.json', { expandSchema: false })   -> ['config.schema.json']
   *
   * Results are ledger keys, filtered to `targetFiles`.
   */
  configs(references: string | readonly string[], options: FamilyOption = {}): string[] {
    const expandSchema = options.expandSchema ?? true;
    const list = typeof references === 'string' ? [references] : references;
    const output = new Set<string>();

    for (const reference of list) {
      const descriptor = this.workspace.describe(reference);
      if (!descriptor) {
        throw new ConfigNotFoundError(this.workspace.resolve(reference));
      }

      const listing = this.workspace.listDirectory(descriptor.dir || '.');
      const family = expandFamily(descriptor, listing, {
        expandSchema,
        ignore: this.workspace.config.ignore
      });

      for (const file of family) {
        output.add(file.key);
      }
    }

    return [...output]
      .filter(key => this.targetFiles === null || this.targetFiles.has(key))
      .sort((a, b) => a.localeCompare(b));
  }

  /**
   * Add a key at `key`. Fails if it already exists (use overwriteKey to replace),
   * or if a parent is missing and `createParents` is false.
   */
  addKey(filePath: string, key: string, value: JsonValue, options: AddKeyOptions = {}): void {
    for (const file of this.configs(filePath, options)) {
      this.setKey(file, new Keypath(key), value, options.createParents ?? true, false);
    }
  }

  /**
   * Add or replace a key at `key`. Fails only if a parent is missing and `createParents` is false.
   */
  overwriteKey(filePath: string, key: string, value: JsonValue, options: AddKeyOptions = {}): void {
    for (const file of this.configs(filePath, options)) {
      this.setKey(file, new Keypath(key), value, options.createParents ?? true, true);
    }
  }

  /**
   * Remove a key. A missing parent or key counts as already removed.
   */
  removeKey(filePath: string, key: string, options: FamilyOption = {}): void {
    const keypath = new Keypath(key);

    for (const file of this.configs(filePath, options)) {
      this.loadForUpdate(file, content => {
        const parent = navigate(content, keypath.parents);
        if (parent && hasKey(parent, keypath.leaf)) {
          delete parent[keypath.leaf];
        }
      });
    }
  }

  /**
   * Move the value at `src` to the full keypath `dst`.
   * The source and the destination's parent must exist; the destination must not,
   * and it may not be the source itself or lie below it.
   */
  moveKey(filePath: string, src: string, dst: string, options: FamilyOption = {}): void {
    const srcPath = new Keypath(src);
    const dstPath = new Keypath(dst);

    const intoSelf = srcPath.parts.every((part, index) => dstPath.parts[index] === part);

    for (const file of this.configs(filePath, options)) {
      if (intoSelf) {
        throw new KeyConflictError(file, dstPath.toString(), `is inside the source keypath '${srcPath.toString()}'`);
      }

      this.loadForUpdate(file, content => {
        const srcParent = navigate(content, srcPath.parents);
        if (!srcParent || !hasKey(srcParent, srcPath.leaf)) {
          throw new KeyNotFoundError(file, srcPath.toString(), 'Source keypath');
        }

        const dstParent = navigate(content, dstPath.parents);
        if (!dstParent) {
          throw new KeyNotFoundError(file, dstPath.toString(), 'Destination keypath');
        }
        if (hasKey(dstParent, dstPath.leaf)) {
          throw new KeyConflictError(file, dstPath.toString());
        }

        const value = srcParent[srcPath.leaf];
        delete srcParent[srcPath.leaf];
        dstParent[dstPath.leaf] = value;
      });
    }
  }

  /**
   * Rename the final segment of `key` to `name`, keeping it in the same parent object.
   */
  renameKey(filePath: string, key: string, name: string, options: FamilyOption = {}): void {
    const keypath = new Keypath(key);

    for (const file of this.configs(filePath, options)) {
      this.loadForUpdate(file, content => {
        const parent = navigate(content, keypath.parents);
        if (!parent || !hasKey(parent, keypath.leaf)) {
          throw new KeyNotFoundError(file, keypath.toString());
        }
        if (hasKey(parent, name)) {
          throw new KeyConflictError(file, [...keypath.parents, name].join(Keypath.SEP));
        }

        const value = parent[keypath.leaf];
        delete parent[keypath.leaf];
        parent[name] = value;
      });
    }
  }

  private setKey(file: string, keypath: Keypath, value: JsonValue, createParents: boolean, overwrite: boolean): void {
    this.loadForUpdate(file, content => {
      let target: JsonObject = content;

      for (const part of keypath.parents) {
        if (!hasKey(target, part)) {
          if (!createParents) {
            throw new KeyNotFoundError(file, keypath.toString());
          }
          target[part] = {};
        }

        const next = target[part];
        if (!isJsonObject(next)) {
          throw new KeyConflictError(file, keypath.toString(), `is blocked by non-object value at '${part}'`);
        }
        target = next;
      }

      if (hasKey(target, keypath.leaf) && !overwrite) {
        throw new KeyConflictError(file, keypath.toString());
      }

      target[keypath.leaf] = value;
    });
  }
}
