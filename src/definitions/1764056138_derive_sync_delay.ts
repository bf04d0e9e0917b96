import { ConfigMigration, type MigrationContext, type Transaction } from '../migrations/index.js';
import { ConfigFormatError } from '../utils/errors.js';
import { SCHEMA_AND_CUSTOM } from './scopes.js';

const CONFIG = 'config.schema.json';

/**
 * sync_delay_seconds = api_refresh_rate * preferred_game_delay_multiplier
 *
 * The multiplier is deleted, so down() keeps the default IRREVERSIBLE.
 */
export class DeriveSyncDelayMigration extends ConfigMigration {
  readonly version = '1764056138';
  readonly name = 'derive_sync_delay';
  readonly description = 'Replace preferred_game_delay_multiplier with sync_delay_seconds';

  up(_txn: Transaction, ctx: MigrationContext): void {
    for (const scope of SCHEMA_AND_CUSTOM) {
      for (const file of ctx.configs(CONFIG, scope)) {
        ctx.loadForUpdate(file, content => {
          const refreshRate = content.api_refresh_rate;
          const multiplier = content.preferred_game_delay_multiplier;

          if (typeof refreshRate !== 'number' || typeof multiplier !== 'number') {
            throw new ConfigFormatError(file, 'api_refresh_rate and preferred_game_delay_multiplier must be numbers');
          }

          content.sync_delay_seconds = refreshRate * multiplier;
          delete content.preferred_game_delay_multiplier;
        });
      }
    }
  }
}
