import { describe, it, expect } from 'vitest';
import { customKeyForSchema, expandFamily, isSameFamily, parseConfigFile, type ConfigFile } from '../config-files.js';

function parse(key: string): ConfigFile {
  const descriptor = parseConfigFile(key, 'schema');
  if (!descriptor) {
    throw new Error(`not a config file: ${key}`);
  }
  return descriptor;
}

describe('parseConfigFile', () => {
  it('should parse a schema file', () => {
    expect(parseConfigFile('config.schema.json', 'schema')).toEqual({
      key: 'config.schema.json',
      dir: '',
      filename: 'config.schema.json',
      family: 'config',
      variant: null,
      isSchema: true,
      ext: 'json'
    });
  });

  it('should parse a subconfig in a subdirectory', () => {
    expect(parseConfigFile('coordinates\\w64h32.alt.json', 'schema')).toEqual({
      key: 'coordinates/w64h32.alt.json',
      dir: 'coordinates',
      filename: 'w64h32.alt.json',
      family: 'w64h32',
      variant: 'alt',
      isSchema: false,
      ext: 'json'
    });
  });

  it('should keep the variant of a variant schema', () => {
    const descriptor = parse('config.beta.schema.json');
    expect(descriptor.isSchema).toBe(true);
    expect(descriptor.variant).toBe('beta');
  });

  it('should honour a custom schema marker', () => {
    expect(parseConfigFile('config.template.json', 'template')?.isSchema).toBe(true);
    expect(parseConfigFile('config.schema.json', 'template')?.isSchema).toBe(false);
  });

  it('should reject names without an extension or a family', () => {
    expect(parseConfigFile('Makefile', 'schema')).toBeNull();
    expect(parseConfigFile('.hidden', 'schema')).toBeNull();
  });
});

describe('isSameFamily', () => {
  it('should require the same directory, family and extension', () => {
    expect(isSameFamily(parse('config.json'), parse('config.alt.json'))).toBe(true);
    expect(isSameFamily(parse('config.json'), parse('colors/config.json'))).toBe(false);
    expect(isSameFamily(parse('config.json'), parse('configs.json'))).toBe(false);
  });
});

describe('customKeyForSchema', () => {
  it('should drop the schema marker', () => {
    expect(customKeyForSchema(parse('config.schema.json'))).toBe('config.json');
    expect(customKeyForSchema(parse('colors/teams.schema.json'))).toBe('colors/teams.json');
    expect(customKeyForSchema(parse('config.beta.schema.json'))).toBe('config.beta.json');
  });
});

describe('expandFamily', () => {
  const listing = [
    'config.schema.json',
    'config.json',
    'config.alt.json',
    'config.beta.json',
    'configs.json',
    'emulator_config.json'
  ].map(parse);
  const ignore = ['emulator_config.json'];

  it('should expand a schema to every custom file of its family', () => {
    const keys = expandFamily(parse('config.schema.json'), listing, { expandSchema: true, ignore }).map(f => f.key);
    expect(keys).toEqual(['config.alt.json', 'config.beta.json', 'config.json']);
  });

  it('should return the schema itself without expansion', () => {
    const keys = expandFamily(parse('config.schema.json'), listing, { expandSchema: false, ignore }).map(f => f.key);
    expect(keys).toEqual(['config.schema.json']);
  });

  it('should expand a custom reference to its custom siblings', () => {
    const keys = expandFamily(parse('config.alt.json'), listing, { expandSchema: false, ignore }).map(f => f.key);
    expect(keys).toEqual(['config.alt.json', 'config.beta.json', 'config.json']);
  });

  it('should skip ignore-listed names', () => {
    const emulator = parse('emulator_config.json');
    expect(expandFamily(emulator, listing, { expandSchema: true, ignore })).toEqual([]);
  });
});
