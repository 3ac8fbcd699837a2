import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import pg from 'pg';
import type { Pool, PoolConfig } from 'pg';

import { logger } from '../middleware/logger.js';
import { PROJECT_ROOT } from './config.js';
import {
  AUTO_WATCH_SETTING,
  DEFAULT_REPLY_LOOKUP_LIMIT,
  escapeLike,
  mapFeedMessage,
  mapFilterRule,
  mapFilterRules,
  mapPatchCard,
  mapPatchThread,
  toNumber,
  type BigintLike,
  type FeedMessageRow,
  type FilterRuleRow,
  type PatchCardRow,
  type PatchThreadRow,
} from './db-rows.js';
import type { DbBackend } from './db-backend.js';
import type {
  CreateResult,
  FeedMessage,
  FilterRule,
  FilterRuleInput,
  NewPatchCard,
  NewPatchThread,
  PatchCard,
  PatchCardDetails,
  PatchThread,
  SubPatchMessageMap,
} from './db-types.js';

const REQUIRED_CORE_TABLES = [
  'feed_messages',
  'patch_cards',
  'patch_threads',
  'filter_rules',
  'settings',
  'subsystems',
] as const;

export interface PostgresBackendOptions {
  connectionString: string;
  ssl?: boolean;
  poolMax?: number;
}

function resolveSchemaPath(): string | undefined {
  const candidates = [
    resolve(PROJECT_ROOT, 'src', 'utils', 'postgres-schema.sql'),
    resolve(PROJECT_ROOT, 'dist', 'utils', 'postgres-schema.sql'),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) return candidate;
  }

  return undefined;
}

async function validateCoreTables(pool: Pool): Promise<void> {
  const res = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = 'public' AND table_name = ANY($1::text[])`,
    [Array.from(REQUIRED_CORE_TABLES)],
  );

  const available = new Set(res.rows.map((row) => row.table_name));
  const missing = REQUIRED_CORE_TABLES.filter((table) => !available.has(table));
  if (missing.length > 0) {
    throw new Error(
      `Postgres schema is incomplete; missing tables: ${missing.join(', ')}. `
      + 'Ensure postgres-schema.sql is bundled in the runtime image.',
    );
  }
}

function messageValues(message: FeedMessage): unknown[] {
  return [
    message.subsystem,
    message.messageIdHeader,
    message.messageId,
    message.subject,
    message.author,
    message.authorEmail,
    message.inReplyToHeader,
    message.content,
    message.url,
    message.receivedAt,
    message.isPatch,
    message.isReply,
    message.isSeriesPatch,
    message.isCoverLetter,
    message.patchVersion,
    message.patchIndex,
    message.patchTotal,
    message.seriesMessageId,
  ];
}

export async function createPostgresBackend(options: PostgresBackendOptions): Promise<DbBackend> {
  const poolConfig: PoolConfig = {
    connectionString: options.connectionString,
    max: options.poolMax ?? 10,
  };
  if (options.ssl) {
    poolConfig.ssl = { rejectUnauthorized: true };
  }

  const pool = new pg.Pool(poolConfig);
  pool.on('error', (err) => {
    logger.error({ err }, 'Idle Postgres client error');
  });

  const schemaPath = resolveSchemaPath();
  if (schemaPath) {
    const schemaSql = readFileSync(schemaPath, 'utf-8');
    await pool.query(schemaSql);
  } else {
    logger.warn('postgres-schema.sql not found in runtime filesystem; relying on existing DB tables');
  }

  await validateCoreTables(pool);
  logger.info('Postgres database pool ready');

  async function selectCard(messageIdHeader: string): Promise<PatchCard | undefined> {
    const res = await pool.query<PatchCardRow>('SELECT * FROM patch_cards WHERE message_id_header = $1', [messageIdHeader]);
    const row = res.rows[0];
    return row ? mapPatchCard(row) : undefined;
  }

  async function selectThreadByCard(cardMessageIdHeader: string): Promise<PatchThread | undefined> {
    const res = await pool.query<PatchThreadRow>(
      'SELECT * FROM patch_threads WHERE card_message_id_header = $1',
      [cardMessageIdHeader],
    );
    const row = res.rows[0];
    return row ? mapPatchThread(row) : undefined;
  }

  async function selectThreadById(threadId: string): Promise<PatchThread | undefined> {
    const res = await pool.query<PatchThreadRow>('SELECT * FROM patch_threads WHERE thread_id = $1', [threadId]);
    const row = res.rows[0];
    return row ? mapPatchThread(row) : undefined;
  }

  async function selectRule(name: string): Promise<FilterRule | undefined> {
    const res = await pool.query<FilterRuleRow>('SELECT * FROM filter_rules WHERE name = $1', [name]);
    const row = res.rows[0];
    return row ? mapFilterRule(row) ?? undefined : undefined;
  }

  return {
    dialect: 'postgres',

    messages: {
      async findByHeader(messageIdHeader: string): Promise<FeedMessage | undefined> {
        const res = await pool.query<FeedMessageRow>(
          'SELECT * FROM feed_messages WHERE message_id_header = $1',
          [messageIdHeader],
        );
        const row = res.rows[0];
        return row ? mapFeedMessage(row) : undefined;
      },

      async create(message: FeedMessage): Promise<CreateResult<FeedMessage>> {
        const values = messageValues(message);
        const inserted = await pool.query<FeedMessageRow>(
          `INSERT INTO feed_messages (
             subsystem, message_id_header, message_id, subject, author, author_email,
             in_reply_to_header, content, url, received_at, is_patch, is_reply,
             is_series_patch, is_cover_letter, patch_version, patch_index, patch_total,
             series_message_id
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
           ON CONFLICT (message_id_header) DO NOTHING
           RETURNING *`,
          values,
        );
        const created = inserted.rows[0];
        if (created) return { status: 'created', record: mapFeedMessage(created) };

        const backfilled = await pool.query<FeedMessageRow>(
          `UPDATE feed_messages SET
             is_patch = $2,
             is_reply = $3,
             is_series_patch = $4,
             is_cover_letter = $5,
             patch_version = COALESCE($6, patch_version),
             patch_index = COALESCE($7, patch_index),
             patch_total = COALESCE($8, patch_total),
             series_message_id = COALESCE($9, series_message_id)
           WHERE message_id_header = $1
           RETURNING *`,
          [
            message.messageIdHeader,
            message.isPatch,
            message.isReply,
            message.isSeriesPatch,
            message.isCoverLetter,
            message.patchVersion,
            message.patchIndex,
            message.patchTotal,
            message.seriesMessageId,
          ],
        );
        const existing = backfilled.rows[0];
        if (!existing) throw new Error(`feed message ${message.messageIdHeader} vanished after insert`);
        return { status: 'exists', record: mapFeedMessage(existing) };
      },

      async findRepliesTo(messageIdHeader: string, limit: number = DEFAULT_REPLY_LOOKUP_LIMIT): Promise<FeedMessage[]> {
        const res = await pool.query<FeedMessageRow>(
          `SELECT * FROM feed_messages
           WHERE in_reply_to_header = $1 OR in_reply_to_header LIKE $2 ESCAPE '\\'
           ORDER BY received_at ASC, id ASC
           LIMIT $3`,
          [messageIdHeader, `%${escapeLike(messageIdHeader)}%`, limit],
        );
        return res.rows.map(mapFeedMessage);
      },

      async findBySeriesId(seriesMessageId: string): Promise<FeedMessage[]> {
        const res = await pool.query<FeedMessageRow>(
          `SELECT * FROM feed_messages
           WHERE series_message_id = $1
           ORDER BY patch_index ASC NULLS LAST, received_at ASC`,
          [seriesMessageId],
        );
        return res.rows.map(mapFeedMessage);
      },

      async markProcessed(messageIdHeader: string, processedAt: number): Promise<boolean> {
        const res = await pool.query(
          'UPDATE feed_messages SET processed_at = $1 WHERE message_id_header = $2 AND processed_at IS NULL',
          [processedAt, messageIdHeader],
        );
        return (res.rowCount ?? 0) > 0;
      },
    },

    cards: {
      findByHeader: selectCard,

      async create(card: NewPatchCard, now: number = Date.now()): Promise<CreateResult<PatchCard>> {
        const inserted = await pool.query<PatchCardRow>(
          `INSERT INTO patch_cards (
             message_id_header, subsystem, subject, author, url, platform_message_id,
             platform_channel_id, expires_at, is_series_patch, series_message_id,
             patch_version, patch_index, patch_total, has_thread, created_at, updated_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, FALSE, $14, $14)
           ON CONFLICT (message_id_header) DO NOTHING
           RETURNING *`,
          [
            card.messageIdHeader,
            card.subsystem,
            card.subject,
            card.author,
            card.url,
            card.platformMessageId,
            card.platformChannelId,
            card.expiresAt,
            card.isSeriesPatch,
            card.seriesMessageId,
            card.patchVersion,
            card.patchIndex,
            card.patchTotal,
            now,
          ],
        );
        const created = inserted.rows[0];
        if (created) return { status: 'created', record: mapPatchCard(created) };

        const existing = await selectCard(card.messageIdHeader);
        if (!existing) throw new Error(`patch card ${card.messageIdHeader} vanished after insert`);
        return { status: 'exists', record: existing };
      },

      async updateDetails(
        messageIdHeader: string,
        details: PatchCardDetails,
        now: number = Date.now(),
      ): Promise<PatchCard | undefined> {
        const res = await pool.query<PatchCardRow>(
          `UPDATE patch_cards SET
             subject = $2,
             author = $3,
             url = $4,
             expires_at = $5,
             is_series_patch = $6,
             series_message_id = $7,
             patch_version = $8,
             patch_index = $9,
             patch_total = $10,
             updated_at = $11
           WHERE message_id_header = $1
           RETURNING *`,
          [
            messageIdHeader,
            details.subject,
            details.author,
            details.url,
            details.expiresAt,
            details.isSeriesPatch,
            details.seriesMessageId,
            details.patchVersion,
            details.patchIndex,
            details.patchTotal,
            now,
          ],
        );
        const row = res.rows[0];
        return row ? mapPatchCard(row) : undefined;
      },

      async markHasThread(messageIdHeader: string, now: number = Date.now()): Promise<boolean> {
        const res = await pool.query(
          'UPDATE patch_cards SET has_thread = TRUE, updated_at = $1 WHERE message_id_header = $2 AND has_thread = FALSE',
          [now, messageIdHeader],
        );
        return (res.rowCount ?? 0) > 0;
      },

      async findBySeriesId(seriesMessageId: string, requirePlatformIdentity: boolean): Promise<PatchCard | undefined> {
        const identityClause = requirePlatformIdentity
          ? "AND platform_message_id IS NOT NULL AND platform_message_id <> ''"
          : '';
        const res = await pool.query<PatchCardRow>(
          `SELECT * FROM patch_cards
           WHERE series_message_id = $1 ${identityClause}
           ORDER BY created_at ASC, id ASC
           LIMIT 1`,
          [seriesMessageId],
        );
        const row = res.rows[0];
        return row ? mapPatchCard(row) : undefined;
      },

      async deleteExpiredWithoutThread(now: number): Promise<number> {
        const res = await pool.query(
          'DELETE FROM patch_cards WHERE has_thread = FALSE AND expires_at <= $1',
          [now],
        );
        return res.rowCount ?? 0;
      },
    },

    threads: {
      findByHeader: selectThreadByCard,
      findByThreadId: selectThreadById,

      async create(thread: NewPatchThread, now: number = Date.now()): Promise<CreateResult<PatchThread>> {
        const inserted = await pool.query<PatchThreadRow>(
          `INSERT INTO patch_threads (
             card_message_id_header, thread_id, thread_name, overview_message_id,
             sub_patch_messages, is_active, created_at
           ) VALUES ($1, $2, $3, $4, $5::jsonb, TRUE, $6)
           ON CONFLICT DO NOTHING
           RETURNING *`,
          [
            thread.cardMessageIdHeader,
            thread.threadId,
            thread.threadName,
            thread.overviewMessageId,
            JSON.stringify(thread.subPatchMessages),
            now,
          ],
        );
        const created = inserted.rows[0];
        if (created) return { status: 'created', record: mapPatchThread(created) };

        const existing = await selectThreadByCard(thread.cardMessageIdHeader) ?? await selectThreadById(thread.threadId);
        if (!existing) throw new Error(`patch thread for ${thread.cardMessageIdHeader} vanished after insert`);
        return { status: 'exists', record: existing };
      },

      async archive(threadId: string, archivedAt: number): Promise<boolean> {
        const res = await pool.query(
          'UPDATE patch_threads SET is_active = FALSE, archived_at = $1 WHERE thread_id = $2 AND is_active = TRUE',
          [archivedAt, threadId],
        );
        return (res.rowCount ?? 0) > 0;
      },

      async updateSubPatchMessageMap(threadId: string, messages: SubPatchMessageMap): Promise<boolean> {
        const res = await pool.query(
          'UPDATE patch_threads SET sub_patch_messages = $1::jsonb WHERE thread_id = $2',
          [JSON.stringify(messages), threadId],
        );
        return (res.rowCount ?? 0) > 0;
      },

      async countActive(): Promise<number> {
        const res = await pool.query<{ count: BigintLike }>(
          'SELECT COUNT(*) AS count FROM patch_threads WHERE is_active = TRUE',
        );
        return toNumber(res.rows[0]?.count);
      },
    },

    filters: {
      async listEnabled(): Promise<FilterRule[]> {
        const res = await pool.query<FilterRuleRow>(
          'SELECT * FROM filter_rules WHERE enabled = TRUE ORDER BY exclusive DESC, name ASC',
        );
        return mapFilterRules(res.rows);
      },

      async listAll(): Promise<FilterRule[]> {
        const res = await pool.query<FilterRuleRow>('SELECT * FROM filter_rules ORDER BY name ASC');
        return mapFilterRules(res.rows);
      },

      findByName: selectRule,

      async save(input: FilterRuleInput): Promise<FilterRule> {
        const now = Date.now();
        await pool.query(
          `INSERT INTO filter_rules (name, enabled, exclusive, conditions, description, created_by, created_at, updated_at)
           VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $7)
           ON CONFLICT (name) DO UPDATE SET
             enabled = EXCLUDED.enabled,
             exclusive = EXCLUDED.exclusive,
             conditions = EXCLUDED.conditions,
             description = EXCLUDED.description,
             updated_at = EXCLUDED.updated_at`,
          [
            input.name,
            input.enabled ?? true,
            input.exclusive ?? false,
            JSON.stringify(input.conditions),
            input.description ?? null,
            input.createdBy ?? null,
            now,
          ],
        );
        const rule = await selectRule(input.name);
        if (!rule) throw new Error(`filter rule ${input.name} could not be read back after save`);
        return rule;
      },

      async delete(name: string): Promise<boolean> {
        const res = await pool.query('DELETE FROM filter_rules WHERE name = $1', [name]);
        return (res.rowCount ?? 0) > 0;
      },

      async setEnabled(name: string, enabled: boolean): Promise<boolean> {
        const res = await pool.query(
          'UPDATE filter_rules SET enabled = $1, updated_at = $2 WHERE name = $3',
          [enabled, Date.now(), name],
        );
        return (res.rowCount ?? 0) > 0;
      },

      async getAutoWatchEnabled(): Promise<boolean> {
        const res = await pool.query<{ value: string }>('SELECT value FROM settings WHERE key = $1', [AUTO_WATCH_SETTING]);
        return res.rows[0]?.value === 'true';
      },

      async setAutoWatchEnabled(enabled: boolean): Promise<void> {
        await pool.query(
          `INSERT INTO settings (key, value) VALUES ($1, $2)
           ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
          [AUTO_WATCH_SETTING, String(enabled)],
        );
      },
    },

    subsystems: {
      async listSubscribed(): Promise<string[]> {
        const res = await pool.query<{ name: string }>(
          'SELECT name FROM subsystems WHERE subscribed = TRUE ORDER BY name ASC',
        );
        return res.rows.map((row) => row.name);
      },

      async setSubscribed(name: string, subscribed: boolean): Promise<void> {
        await pool.query(
          `INSERT INTO subsystems (name, subscribed, updated_at) VALUES ($1, $2, $3)
           ON CONFLICT (name) DO UPDATE SET subscribed = EXCLUDED.subscribed, updated_at = EXCLUDED.updated_at`,
          [name, subscribed, Date.now()],
        );
      },
    },

    async close(): Promise<void> {
      await pool.end();
      logger.info('Postgres database pool closed');
    },
  };
}
