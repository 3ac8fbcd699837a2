/**
 * Storage entry point: picks the backend for the configured dialect.
 */

import { isAbsolute, resolve } from 'path';
import { PROJECT_ROOT, type AppConfig } from './config.js';
import { IN_MEMORY_PATH } from './db-schema.js';
import { createSqliteBackend } from './db-sqlite.js';
import { createPostgresBackend } from './db-postgres.js';
import type { DbBackend } from './db-backend.js';

export type { DbBackend } from './db-backend.js';

export function resolveSqlitePath(path: string): string {
  if (path === IN_MEMORY_PATH || isAbsolute(path)) return path;
  return resolve(PROJECT_ROOT, path);
}

export async function createBackend(
  config: Pick<AppConfig, 'DB_DIALECT' | 'SQLITE_PATH' | 'DATABASE_URL' | 'POSTGRES_SSL' | 'POSTGRES_POOL_MAX'>,
): Promise<DbBackend> {
  if (config.DB_DIALECT === 'postgres') {
    if (!config.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when DB_DIALECT=postgres');
    }
    return createPostgresBackend({
      connectionString: config.DATABASE_URL,
      ssl: config.POSTGRES_SSL,
      poolMax: config.POSTGRES_POOL_MAX,
    });
  }

  return createSqliteBackend(resolveSqlitePath(config.SQLITE_PATH));
}
