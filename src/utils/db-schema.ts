/**
 * SQLite handle creation and schema.
 *
 * This module owns every CREATE TABLE statement for the SQLite dialect;
 * `db-sqlite.ts` prepares its statements against the handle returned here.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type SqliteHandle = InstanceType<typeof Database>;

export const IN_MEMORY_PATH = ':memory:';

export function openSqliteDatabase(path: string): SqliteHandle {
  if (path !== IN_MEMORY_PATH) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteHandle = new Database(path, { timeout: 5000 });

  // busy_timeout must be set before switching journal mode.
  db.pragma('busy_timeout = 5000');
  if (path !== IN_MEMORY_PATH) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  applySchema(db);
  logger.info({ path }, 'SQLite database opened');
  return db;
}

// ── Schema ──────────────────────────────────────────────────────────

function applySchema(db: SqliteHandle): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS feed_messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      subsystem TEXT NOT NULL,
      message_id_header TEXT NOT NULL UNIQUE,
      message_id TEXT,
      subject TEXT NOT NULL,
      author TEXT NOT NULL,
      author_email TEXT,
      in_reply_to_header TEXT,
      content TEXT,
      url TEXT,
      received_at INTEGER NOT NULL,
      is_patch INTEGER NOT NULL DEFAULT 0,
      is_reply INTEGER NOT NULL DEFAULT 0,
      is_series_patch INTEGER NOT NULL DEFAULT 0,
      is_cover_letter INTEGER NOT NULL DEFAULT 0,
      patch_version INTEGER,
      patch_index INTEGER,
      patch_total INTEGER,
      series_message_id TEXT,
      processed_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_feed_messages_in_reply_to
      ON feed_messages (in_reply_to_header);

    CREATE INDEX IF NOT EXISTS idx_feed_messages_series
      ON feed_messages (series_message_id, patch_index);

    CREATE TABLE IF NOT EXISTS patch_cards (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id_header TEXT NOT NULL UNIQUE,
      subsystem TEXT NOT NULL,
      subject TEXT NOT NULL,
      author TEXT NOT NULL,
      url TEXT,
      platform_message_id TEXT,
      platform_channel_id TEXT,
      expires_at INTEGER NOT NULL,
      is_series_patch INTEGER NOT NULL DEFAULT 0,
      series_message_id TEXT,
      patch_version INTEGER,
      patch_index INTEGER,
      patch_total INTEGER,
      has_thread INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_patch_cards_series
      ON patch_cards (series_message_id, created_at);

    CREATE INDEX IF NOT EXISTS idx_patch_cards_expiry
      ON patch_cards (has_thread, expires_at);

    CREATE TABLE IF NOT EXISTS patch_threads (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      card_message_id_header TEXT NOT NULL UNIQUE,
      thread_id TEXT NOT NULL UNIQUE,
      thread_name TEXT NOT NULL,
      is_active INTEGER NOT NULL DEFAULT 1,
      overview_message_id TEXT,
      sub_patch_messages TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL,
      archived_at INTEGER
    );

    CREATE TABLE IF NOT EXISTS filter_rules (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      enabled INTEGER NOT NULL DEFAULT 1,
      exclusive INTEGER NOT NULL DEFAULT 0,
      conditions TEXT NOT NULL,
      description TEXT,
      created_by TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS subsystems (
      name TEXT PRIMARY KEY,
      subscribed INTEGER NOT NULL DEFAULT 1,
      updated_at INTEGER NOT NULL
    );
  `);

  addMissingColumn(db, 'feed_messages', 'processed_at', 'INTEGER');
}

/** Columns added after a table first shipped; CREATE TABLE IF NOT EXISTS leaves old files untouched. */
function addMissingColumn(db: SqliteHandle, table: string, column: string, type: string): void {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  if (columns.some((info) => info.name === column)) return;
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`);
  logger.info({ table, column }, 'SQLite column added');
}
