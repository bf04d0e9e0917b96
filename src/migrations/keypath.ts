import { isJsonObject, type JsonObject } from './types.js';

/**
 * Dotted keypath into a JSON document, e.g. "teams.name.full"
 */
export class Keypath {
  static readonly SEP = '.';

  readonly parts: readonly string[];

  constructor(readonly raw: string) {
    this.parts = Object.freeze(raw.split(Keypath.SEP));
  }

  /** Segments leading to the final key */
  get parents(): readonly string[] {
    return this.parts.slice(0, -1);
  }

  /** Final segment */
  get leaf(): string {
    return this.parts[this.parts.length - 1];
  }

  toString(): string {
    return this.parts.join(Keypath.SEP);
  }
}

/**
 * Walk `segments` from `root`, returning the object found at the end.
 * Returns undefined when a segment is missing or does not hold an object.
 */
export function navigate(root: JsonObject, segments: readonly string[]): JsonObject | undefined {
  let target: JsonObject = root;

  for (const part of segments) {
    if (!Object.hasOwn(target, part)) {
      return undefined;
    }
    const next = target[part];
    if (!isJsonObject(next)) {
      return undefined;
    }
    target = next;
  }

  return target;
}

export function hasKey(target: JsonObject, key: string): boolean {
  return Object.hasOwn(target, key);
}
