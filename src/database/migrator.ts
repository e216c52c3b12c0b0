import { Migrator, type Kysely, type Migration, type MigrationProvider } from 'kysely';

import { logger } from '../observability/logger';
import * as initialSchema from './migrations/001_initial_schema';
import type { DatabaseSchema } from './schema';

const log = logger.child({ component: 'migrator' });

/** Migrations are bundled with the code so the compiled output needs no directory scan */
const provider: MigrationProvider = {
  async getMigrations(): Promise<Record<string, Migration>> {
    return {
      '001_initial_schema': initialSchema,
    };
  },
};

export async function runMigrations(db: Kysely<DatabaseSchema>): Promise<void> {
  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      log.info({ migration: result.migrationName }, 'Migration applied');
    } else if (result.status === 'Error') {
      log.error({ migration: result.migrationName }, 'Migration failed');
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}
