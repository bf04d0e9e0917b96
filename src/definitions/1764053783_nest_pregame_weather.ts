import { ConfigMigration, type MigrationContext, type Transaction } from '../migrations/index.js';
import { SCHEMA_AND_CUSTOM } from './scopes.js';

const CONFIG = 'config.schema.json';

export class NestPregameWeatherMigration extends ConfigMigration {
  readonly version = '1764053783';
  readonly name = 'nest_pregame_weather';
  readonly description = 'Move pregame_weather under the weather section';

  up(_txn: Transaction, ctx: MigrationContext): void {
    for (const scope of SCHEMA_AND_CUSTOM) {
      ctx.moveKey(CONFIG, 'pregame_weather', 'weather.pregame', scope);
    }
  }

  down(_txn: Transaction, ctx: MigrationContext): void {
    for (const scope of SCHEMA_AND_CUSTOM) {
      ctx.moveKey(CONFIG, 'weather.pregame', 'pregame_weather', scope);
    }
  }
}
