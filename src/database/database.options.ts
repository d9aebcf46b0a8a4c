import type { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { EvolutionInstance } from '../instance/entities/evolution-instance.entity';
import { EvolutionMessage } from '../message/entities/evolution-message.entity';
import { FailedMessage } from '../failed-message/entities/failed-message.entity';
import { WebhookLog } from '../webhook-log/entities/webhook-log.entity';
import { EvolutionSchema1760800000000 } from '../migrations/1760800000000-EvolutionSchema';

export const ENTITIES = [EvolutionInstance, EvolutionMessage, FailedMessage, WebhookLog];
export const MIGRATIONS = [EvolutionSchema1760800000000];

type ReadSetting = (key: string) => string | undefined;

/**
 * Opciones de Postgres compartidas por la app, el CLI y `typeorm.config.ts`.
 */
export function postgresOptions(read: ReadSetting): PostgresConnectionOptions {
  const port = parseInt(read('DB_PORT') ?? '5432', 10);

  return {
    type: 'postgres',
    host: read('DB_HOST') ?? 'localhost',
    port: Number.isNaN(port) ? 5432 : port,
    username: read('DB_USERNAME'),
    password: read('DB_PASSWORD'),
    database: read('DB_NAME'),
    entities: ENTITIES,
    migrations: MIGRATIONS,
    synchronize: false,
    migrationsRun: false,
    ssl:
      read('DB_SSL') === 'true'
        ? { rejectUnauthorized: read('NODE_ENV') === 'production' }
        : false,
  };
}
