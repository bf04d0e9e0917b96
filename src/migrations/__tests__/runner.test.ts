/**
 * MigrationRunner Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MigrationRunner } from '../runner.js';
import { MigrationManager } from '../manager.js';
import { MigrationRegistry } from '../registry.js';
import type { ConfigMigration } from '../migration.js';
import { IrreversibleMigrationError, MigrationFailedError } from '../../utils/errors.js';
import { TempWorkspace } from '../../../tests/helpers/temp-workspace.js';
import {
  AddFlagMigration,
  CancellingMigration,
  DropLegacyMigration,
  FailingMigration,
  RenameOldKeyMigration
} from '../../../tests/helpers/migrations.js';

describe('MigrationRunner', () => {
  let temp: TempWorkspace;

  function runnerFor(...migrations: ConfigMigration[]): MigrationRunner {
    return new MigrationRunner(new MigrationManager(temp.openProject(), new MigrationRegistry(migrations)));
  }

  beforeEach(() => {
    temp = new TempWorkspace('config-migrate-runner-');
    temp.writeJSON('config.schema.json', { old_key: 5 });
    temp.writeJSON('config.json', { old_key: 5, legacy: true });
    temp.writeLedgers({
      schema: { 'config.schema.json': [] },
      custom: { 'config.json': [] }
    });
  });

  afterEach(() => {
    temp.cleanup();
    vi.restoreAllMocks();
  });

  describe('runUp', () => {
    it('should apply every pending migration in version order', () => {
      const summary = runnerFor(new AddFlagMigration(), new RenameOldKeyMigration()).runUp({ silent: true });

      expect(summary).toEqual({ total: 2, applied: 2, skipped: 0, rolledBack: 0 });
      expect(temp.readJSON('config.schema.json')).toEqual({ new_key: 5 });
      expect(temp.readJSON('config.json')).toEqual({ old_key: 5, legacy: true, features: { flag: true } });
      expect(temp.readLedger('schema')).toEqual({ 'config.schema.json': ['1700000001'] });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1700000002'] });
    });

    it('should write nothing when run a second time', () => {
      const runner = runnerFor(new AddFlagMigration());
      runner.runUp({ silent: true });

      const before = {
        config: temp.readFile('config.json'),
        schema: temp.readFile('config.schema.json'),
        custom: temp.readFile('migrations/custom-status.json'),
        schemaLedger: temp.readFile('migrations/schema-status.json')
      };

      // the schema never receives the change, so it is offered again and left alone
      const summary = runner.runUp({ silent: true });
      expect(summary).toEqual({ total: 1, applied: 0, skipped: 1, rolledBack: 0 });

      expect(temp.readFile('config.json')).toBe(before.config);
      expect(temp.readFile('config.schema.json')).toBe(before.schema);
      expect(temp.readFile('migrations/custom-status.json')).toBe(before.custom);
      expect(temp.readFile('migrations/schema-status.json')).toBe(before.schemaLedger);
    });

    it('should stop after the given number of committed migrations', () => {
      const summary = runnerFor(new RenameOldKeyMigration(), new AddFlagMigration()).runUp({ step: 1, silent: true });

      expect(summary.applied).toBe(1);
      expect(temp.readJSON('config.schema.json')).toEqual({ new_key: 5 });
      expect(temp.readJSON('config.json')).toEqual({ old_key: 5, legacy: true });
    });

    it('should count a requested rollback and keep going', () => {
      const summary = runnerFor(new AddFlagMigration(), new CancellingMigration()).runUp({ silent: true });

      expect(summary).toEqual({ total: 2, applied: 1, skipped: 0, rolledBack: 1 });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1700000002'] });
    });

    it('should halt on failure and keep earlier commits', () => {
      const runner = runnerFor(new AddFlagMigration(), new FailingMigration());

      expect(() => runner.runUp({ silent: true })).toThrow(MigrationFailedError);
      expect(() => runner.runUp({ silent: true })).toThrow('Migration 1700000004 (failing) failed: boom');

      expect(temp.readJSON('config.json')).toEqual({ old_key: 5, legacy: true, features: { flag: true } });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': ['1700000002'] });
    });

    it('should print a header for each migration', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      runnerFor(new AddFlagMigration()).runUp();

      const lines = log.mock.calls.map(args => args.map(String).join(' '));
      expect(lines).toContainEqual(expect.stringContaining('MIGRATE 1700000002 << add_flag >>'));
    });
  });

  describe('runDown', () => {
    it('should roll back only the newest migration by default', () => {
      const runner = runnerFor(new RenameOldKeyMigration(), new AddFlagMigration());
      runner.runUp({ silent: true });

      const summary = runner.runDown({ silent: true });

      expect(summary).toEqual({ total: 1, applied: 1, skipped: 0, rolledBack: 0 });
      expect(temp.readJSON('config.json')).toEqual({ old_key: 5, legacy: true, features: {} });
      expect(temp.readJSON('config.schema.json')).toEqual({ new_key: 5 });
      expect(temp.readLedger('custom')).toEqual({ 'config.json': [] });
    });

    it('should roll back several migrations newest first', () => {
      const runner = runnerFor(new RenameOldKeyMigration(), new AddFlagMigration());
      runner.runUp({ silent: true });

      runner.runDown({ step: 2, silent: true });

      expect(temp.readJSON('config.schema.json')).toEqual({ old_key: 5 });
      expect(temp.readLedger('schema')).toEqual({ 'config.schema.json': [] });
    });

    it('should stop at an irreversible migration', () => {
      const runner = runnerFor(new RenameOldKeyMigration(), new DropLegacyMigration());
      runner.runUp({ silent: true });

      expect(() => runner.runDown({ step: 2, silent: true })).toThrow(IrreversibleMigrationError);

      expect(temp.readJSON('config.json')).toEqual({ old_key: 5 });
      expect(temp.readJSON('config.schema.json')).toEqual({ new_key: 5 });
      expect(temp.readLedger('schema')).toEqual({ 'config.schema.json': ['1700000001'] });
    });

    it('should report nothing to roll back on a fresh project', () => {
      const summary = runnerFor(new AddFlagMigration()).runDown({ silent: true });
      expect(summary).toEqual({ total: 0, applied: 0, skipped: 0, rolledBack: 0 });
    });
  });
});
