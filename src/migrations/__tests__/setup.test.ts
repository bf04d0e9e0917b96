/**
 * Setup operations: init, subconfig and reset
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createSubconfig, inferReference, initFromSchemas, resetCustomConfigs } from '../setup.js';
import type { MigrationWorkspace } from '../workspace.js';
import { ConfigNotFoundError, MigrateError, SubconfigMismatchError } from '../../utils/errors.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';

describe('setup operations', () => {
  let temp: TempWorkspace;
  let workspace: MigrationWorkspace;

  beforeEach(() => {
    temp = new TempWorkspace('config-migrate-setup-');
    temp.writeJSON('config.schema.json', { rate: 15 });
    temp.writeJSON('colors/teams.schema.json', { home: 'red' });
    workspace = temp.openProject();
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('initFromSchemas', () => {
    it('should create custom files and both ledgers on a fresh project', () => {
      const result = initFromSchemas(workspace);

      expect(result).toEqual({ created: ['config.json'], skipped: [] });
      expect(temp.readJSON('config.json')).toEqual({ rate: 15 });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': [] });
      expect(temp.readLedger('schema')).toEqual({});
      expect(temp.exists('migrations/.transaction')).toBe(false);
    });

    it('should inherit the versions already applied to the schema', () => {
      temp.writeLedgers({ schema: { 'config.schema.json': ['1', '2'] } });

      initFromSchemas(workspace);

      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1', '2'] });
    });

    it('should leave existing custom files alone', () => {
      temp.writeJSON('config.json', { rate: 99 });

      const result = initFromSchemas(workspace);

      expect(result).toEqual({ created: [], skipped: ['config.json'] });
      expect(temp.readJSON('config.json')).toEqual({ rate: 99 });
      expect(temp.readLedger('custom')).toEqual({});
    });

    it('should include schemas from every search directory', () => {
      temp.writeJSON('migrate.config.json', { searchDirs: ['.', 'colors'] });
      workspace = temp.openProject();

      const result = initFromSchemas(workspace);

      expect(result.created).toEqual(['colors/teams.json', 'config.json']);
      expect(temp.readJSON('colors/teams.json')).toEqual({ home: 'red' });
    });
  });

  describe('inferReference', () => {
    it('should map a variant to the base file of its family', () => {
      expect(inferReference('config.alt.json')).toBe('config.json');
      expect(inferReference('coordinates/w64h32.alt.json')).toBe('coordinates/w64h32.json');
    });
  });

  describe('createSubconfig', () => {
    beforeEach(() => {
      initFromSchemas(workspace);
      temp.writeLedgers({ custom: { 'config.json': ['1'] } });
    });

    it('should copy the reference and share its history', () => {
      const result = createSubconfig(workspace, 'config.alt.json');

      expect(result).toEqual({
        subconfig: 'config.alt.json',
        reference: 'config.json',
        versions: ['1'],
        createdFile: true
      });
      expect(temp.readJSON('config.alt.json')).toEqual({ rate: 15 });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1'], 'config.alt.json': ['1'] });
    });

    it('should accept an explicit reference', () => {
      createSubconfig(workspace, 'config.alt.json');
      const result = createSubconfig(workspace, 'config.beta.json', 'config.alt.json');

      expect(result.reference).toBe('config.alt.json');
      expect(temp.readLedger('custom')).toEqual({
        'config.json': ['1'],
        'config.alt.json': ['1'],
        'config.beta.json': ['1']
      });
    });

    it('should register an existing subconfig with a matching history', () => {
      temp.writeJSON('config.alt.json', { rate: 1 });
      temp.writeLedgers({ custom: { 'config.json': ['1'], 'config.alt.json': ['1'] } });

      const result = createSubconfig(workspace, 'config.alt.json');

      expect(result.createdFile).toBe(false);
      expect(temp.readJSON('config.alt.json')).toEqual({ rate: 1 });
    });

    it('should refuse an existing subconfig with a different history', () => {
      temp.writeJSON('config.alt.json', { rate: 1 });

      expect(() => createSubconfig(workspace, 'config.alt.json')).toThrow(SubconfigMismatchError);
      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1'] });
    });

    it('should require the reference to exist', () => {
      expect(() => createSubconfig(workspace, 'colors/teams.alt.json')).toThrow(ConfigNotFoundError);
    });

    it('should refuse references from another family', () => {
      expect(() => createSubconfig(workspace, 'config.alt.json', 'colors/teams.json')).toThrow(MigrateError);
      expect(() => createSubconfig(workspace, 'config.schema.json')).toThrow(MigrateError);
    });
  });

  describe('resetCustomConfigs', () => {
    it('should delete custom files and the custom ledger, keeping schemas', () => {
      initFromSchemas(workspace);
      createSubconfig(workspace, 'config.alt.json');
      temp.writeJSON('notes.json', { keep: true });

      const removed = resetCustomConfigs(workspace);

      expect(removed).toEqual(['config.alt.json', 'config.json', 'migrations/custom-status.json']);
      expect(temp.list()).toEqual(['colors', 'config.schema.json', 'migrations', 'notes.json']);
      expect(temp.exists('migrations/schema-status.json')).toBe(true);
    });
  });
});
