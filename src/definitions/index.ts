/**
 * Registered migrations
 *
 * Every definition file in this directory must be listed here to run.
 * Order does not matter; the registry sorts by version.
 */

import { MigrationRegistry, type ConfigMigration } from '../migrations/index.js';
import { NestPregameWeatherMigration } from './1764053783_nest_pregame_weather.js';
import { DeriveSyncDelayMigration } from './1764056138_derive_sync_delay.js';

export function createMigrations(): ConfigMigration[] {
  return [
    new NestPregameWeatherMigration(),
    new DeriveSyncDelayMigration()
  ];
}

export function createRegistry(): MigrationRegistry {
  return new MigrationRegistry(createMigrations());
}
