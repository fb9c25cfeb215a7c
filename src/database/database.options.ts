import * as fs from 'fs';
import * as path from 'path';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { RECORD_ENTITIES } from './entities';
import { CreateRecordTables1717200000000 } from './migrations/1717200000000-CreateRecordTables';

export const IN_MEMORY_DATABASE = ':memory:';

export interface DatabaseSettings {
  /** File path, or `:memory:`. */
  databasePath: string;
  production: boolean;
  logging?: boolean;
}

/**
 * SQLite (sql.js) options for the record store. A file database is loaded
 * from `databasePath` and written back after every change. Outside
 * production the schema is synchronized from the entities; in production
 * the migrations run instead.
 */
export function buildDatabaseOptions(settings: DatabaseSettings): TypeOrmModuleOptions {
  const file = settings.databasePath === IN_MEMORY_DATABASE ? {} : { location: settings.databasePath, autoSave: true };

  return {
    type: 'sqljs',
    ...file,
    entities: RECORD_ENTITIES,
    migrations: [CreateRecordTables1717200000000],
    synchronize: !settings.production,
    migrationsRun: settings.production,
    logging: settings.logging ?? false,
  };
}

/**
 * Creates the directory a file database is saved into.
 */
export async function ensureDatabaseDirectory(databasePath: string): Promise<void> {
  if (databasePath === IN_MEMORY_DATABASE) {
    return;
  }
  await fs.promises.mkdir(path.dirname(path.resolve(databasePath)), { recursive: true });
}
