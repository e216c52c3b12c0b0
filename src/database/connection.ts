import * as fs from 'fs';
import * as path from 'path';

import Database from 'better-sqlite3';
import { Kysely, PostgresDialect, SqliteDialect } from 'kysely';
import { Pool } from 'pg';

import { logger } from '../observability/logger';
import type { DatabaseSchema } from './schema';

const log = logger.child({ component: 'database' });

export interface DatabaseOptions {
  url: string;
  poolMax?: number;
  ssl?: boolean;
}

export function isPostgresUrl(url: string): boolean {
  return url.startsWith('postgres://') || url.startsWith('postgresql://');
}

/**
 * Create a Kysely instance for the configured backing store.
 * A postgres:// URL gets a pg pool; anything else is a SQLite file (or :memory:).
 */
export function createDatabase(options: DatabaseOptions): Kysely<DatabaseSchema> {
  if (isPostgresUrl(options.url)) {
    const pool = new Pool({
      connectionString: options.url,
      max: options.poolMax ?? 10,
      ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
    });
    pool.on('error', (err) => log.error({ err }, 'Idle PostgreSQL client error'));
    log.info({ poolMax: options.poolMax ?? 10 }, 'Using PostgreSQL');
    return new Kysely<DatabaseSchema>({ dialect: new PostgresDialect({ pool }) });
  }

  const dbPath = options.url;
  if (dbPath !== ':memory:') {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqliteDb = new Database(dbPath);
  sqliteDb.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
  }

  log.debug({ dbPath }, 'Using SQLite');
  return new Kysely<DatabaseSchema>({ dialect: new SqliteDialect({ database: sqliteDb }) });
}
