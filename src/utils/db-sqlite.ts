/**
 * SQLite storage backend. better-sqlite3 is synchronous; every method is
 * exposed as async so callers treat both dialects alike.
 */

import { openSqliteDatabase, type SqliteHandle } from './db-schema.js';
import { logger } from '../middleware/logger.js';
import {
  AUTO_WATCH_SETTING,
  DEFAULT_REPLY_LOOKUP_LIMIT,
  escapeLike,
  fromBool,
  mapFeedMessage,
  mapFilterRule,
  mapFilterRules,
  mapPatchCard,
  mapPatchThread,
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

interface FeedMessageParams {
  subsystem: string;
  message_id_header: string;
  message_id: string | null;
  subject: string;
  author: string;
  author_email: string | null;
  in_reply_to_header: string | null;
  content: string | null;
  url: string | null;
  received_at: number;
  is_patch: number;
  is_reply: number;
  is_series_patch: number;
  is_cover_letter: number;
  patch_version: number | null;
  patch_index: number | null;
  patch_total: number | null;
  series_message_id: string | null;
}

interface PatchCardParams {
  message_id_header: string;
  subsystem: string;
  subject: string;
  author: string;
  url: string | null;
  platform_message_id: string | null;
  platform_channel_id: string | null;
  expires_at: number;
  is_series_patch: number;
  series_message_id: string | null;
  patch_version: number | null;
  patch_index: number | null;
  patch_total: number | null;
  now: number;
}

interface FilterRuleParams {
  name: string;
  enabled: number;
  exclusive: number;
  conditions: string;
  description: string | null;
  created_by: string | null;
  now: number;
}

function toMessageParams(message: FeedMessage): FeedMessageParams {
  return {
    subsystem: message.subsystem,
    message_id_header: message.messageIdHeader,
    message_id: message.messageId,
    subject: message.subject,
    author: message.author,
    author_email: message.authorEmail,
    in_reply_to_header: message.inReplyToHeader,
    content: message.content,
    url: message.url,
    received_at: message.receivedAt,
    is_patch: fromBool(message.isPatch),
    is_reply: fromBool(message.isReply),
    is_series_patch: fromBool(message.isSeriesPatch),
    is_cover_letter: fromBool(message.isCoverLetter),
    patch_version: message.patchVersion,
    patch_index: message.patchIndex,
    patch_total: message.patchTotal,
    series_message_id: message.seriesMessageId,
  };
}

export function createSqliteBackend(path: string): DbBackend {
  const db: SqliteHandle = openSqliteDatabase(path);

  // ── Prepared statements ───────────────────────────────────────────

  const selectMessage = db.prepare<[string], FeedMessageRow>(
    'SELECT * FROM feed_messages WHERE message_id_header = ?',
  );
  const insertMessage = db.prepare<FeedMessageParams>(
    `INSERT INTO feed_messages (
       subsystem, message_id_header, message_id, subject, author, author_email,
       in_reply_to_header, content, url, received_at, is_patch, is_reply,
       is_series_patch, is_cover_letter, patch_version, patch_index, patch_total,
       series_message_id
     ) VALUES (
       @subsystem, @message_id_header, @message_id, @subject, @author, @author_email,
       @in_reply_to_header, @content, @url, @received_at, @is_patch, @is_reply,
       @is_series_patch, @is_cover_letter, @patch_version, @patch_index, @patch_total,
       @series_message_id
     )
     ON CONFLICT (message_id_header) DO NOTHING`,
  );
  const backfillMessage = db.prepare<FeedMessageParams>(
    `UPDATE feed_messages SET
       is_patch = @is_patch,
       is_reply = @is_reply,
       is_series_patch = @is_series_patch,
       is_cover_letter = @is_cover_letter,
       patch_version = COALESCE(@patch_version, patch_version),
       patch_index = COALESCE(@patch_index, patch_index),
       patch_total = COALESCE(@patch_total, patch_total),
       series_message_id = COALESCE(@series_message_id, series_message_id)
     WHERE message_id_header = @message_id_header`,
  );
  const selectRepliesTo = db.prepare<[string, string, number], FeedMessageRow>(
    `SELECT * FROM feed_messages
     WHERE in_reply_to_header = ? OR in_reply_to_header LIKE ? ESCAPE '\\'
     ORDER BY received_at ASC, id ASC
     LIMIT ?`,
  );
  const selectMessagesBySeries = db.prepare<[string], FeedMessageRow>(
    `SELECT * FROM feed_messages
     WHERE series_message_id = ?
     ORDER BY patch_index ASC, received_at ASC`,
  );

  const markMessageProcessed = db.prepare<[number, string]>(
    'UPDATE feed_messages SET processed_at = ? WHERE message_id_header = ? AND processed_at IS NULL',
  );

  const selectCard = db.prepare<[string], PatchCardRow>(
    'SELECT * FROM patch_cards WHERE message_id_header = ?',
  );
  const insertCard = db.prepare<PatchCardParams>(
    `INSERT INTO patch_cards (
       message_id_header, subsystem, subject, author, url, platform_message_id,
       platform_channel_id, expires_at, is_series_patch, series_message_id,
       patch_version, patch_index, patch_total, has_thread, created_at, updated_at
     ) VALUES (
       @message_id_header, @subsystem, @subject, @author, @url, @platform_message_id,
       @platform_channel_id, @expires_at, @is_series_patch, @series_message_id,
       @patch_version, @patch_index, @patch_total, 0, @now, @now
     )
     ON CONFLICT (message_id_header) DO NOTHING`,
  );
  const updateCardDetails = db.prepare<Omit<PatchCardParams, 'subsystem' | 'platform_message_id' | 'platform_channel_id'>>(
    `UPDATE patch_cards SET
       subject = @subject,
       author = @author,
       url = @url,
       expires_at = @expires_at,
       is_series_patch = @is_series_patch,
       series_message_id = @series_message_id,
       patch_version = @patch_version,
       patch_index = @patch_index,
       patch_total = @patch_total,
       updated_at = @now
     WHERE message_id_header = @message_id_header`,
  );
  const markCardThreaded = db.prepare<[number, string]>(
    'UPDATE patch_cards SET has_thread = 1, updated_at = ? WHERE message_id_header = ? AND has_thread = 0',
  );
  const selectCardBySeries = db.prepare<[string], PatchCardRow>(
    `SELECT * FROM patch_cards
     WHERE series_message_id = ?
     ORDER BY created_at ASC, id ASC
     LIMIT 1`,
  );
  const selectPostedCardBySeries = db.prepare<[string], PatchCardRow>(
    `SELECT * FROM patch_cards
     WHERE series_message_id = ? AND platform_message_id IS NOT NULL AND platform_message_id <> ''
     ORDER BY created_at ASC, id ASC
     LIMIT 1`,
  );
  const deleteExpiredCards = db.prepare<[number]>(
    'DELETE FROM patch_cards WHERE has_thread = 0 AND expires_at <= ?',
  );

  const selectThreadByCard = db.prepare<[string], PatchThreadRow>(
    'SELECT * FROM patch_threads WHERE card_message_id_header = ?',
  );
  const selectThreadById = db.prepare<[string], PatchThreadRow>(
    'SELECT * FROM patch_threads WHERE thread_id = ?',
  );
  const insertThread = db.prepare<[string, string, string, string | null, string, number]>(
    `INSERT INTO patch_threads (
       card_message_id_header, thread_id, thread_name, overview_message_id,
       sub_patch_messages, is_active, created_at
     ) VALUES (?, ?, ?, ?, ?, 1, ?)
     ON CONFLICT DO NOTHING`,
  );
  const archiveThread = db.prepare<[number, string]>(
    'UPDATE patch_threads SET is_active = 0, archived_at = ? WHERE thread_id = ? AND is_active = 1',
  );
  const updateThreadMessages = db.prepare<[string, string]>(
    'UPDATE patch_threads SET sub_patch_messages = ? WHERE thread_id = ?',
  );
  const countActiveThreads = db.prepare<[], { count: number }>(
    'SELECT COUNT(*) AS count FROM patch_threads WHERE is_active = 1',
  );

  const selectEnabledRules = db.prepare<[], FilterRuleRow>(
    'SELECT * FROM filter_rules WHERE enabled = 1 ORDER BY exclusive DESC, name ASC',
  );
  const selectAllRules = db.prepare<[], FilterRuleRow>(
    'SELECT * FROM filter_rules ORDER BY name ASC',
  );
  const selectRuleByName = db.prepare<[string], FilterRuleRow>(
    'SELECT * FROM filter_rules WHERE name = ?',
  );
  const upsertRule = db.prepare<FilterRuleParams>(
    `INSERT INTO filter_rules (name, enabled, exclusive, conditions, description, created_by, created_at, updated_at)
     VALUES (@name, @enabled, @exclusive, @conditions, @description, @created_by, @now, @now)
     ON CONFLICT (name) DO UPDATE SET
       enabled = excluded.enabled,
       exclusive = excluded.exclusive,
       conditions = excluded.conditions,
       description = excluded.description,
       updated_at = excluded.updated_at`,
  );
  const deleteRule = db.prepare<[string]>('DELETE FROM filter_rules WHERE name = ?');
  const setRuleEnabled = db.prepare<[number, number, string]>(
    'UPDATE filter_rules SET enabled = ?, updated_at = ? WHERE name = ?',
  );

  const selectSetting = db.prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?');
  const upsertSetting = db.prepare<[string, string]>(
    'INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT (key) DO UPDATE SET value = excluded.value',
  );

  const selectSubscribed = db.prepare<[], { name: string }>(
    'SELECT name FROM subsystems WHERE subscribed = 1 ORDER BY name ASC',
  );
  const upsertSubsystem = db.prepare<[string, number, number]>(
    `INSERT INTO subsystems (name, subscribed, updated_at) VALUES (?, ?, ?)
     ON CONFLICT (name) DO UPDATE SET subscribed = excluded.subscribed, updated_at = excluded.updated_at`,
  );

  // ── Transactions ──────────────────────────────────────────────────

  const createMessageTx = db.transaction((message: FeedMessage): CreateResult<FeedMessage> => {
    const params = toMessageParams(message);
    const inserted = insertMessage.run(params).changes > 0;
    if (!inserted) backfillMessage.run(params);

    const row = selectMessage.get(message.messageIdHeader);
    if (!row) throw new Error(`feed message ${message.messageIdHeader} vanished after insert`);
    return { status: inserted ? 'created' : 'exists', record: mapFeedMessage(row) };
  });

  const createCardTx = db.transaction((card: NewPatchCard, now: number): CreateResult<PatchCard> => {
    const inserted = insertCard.run({
      message_id_header: card.messageIdHeader,
      subsystem: card.subsystem,
      subject: card.subject,
      author: card.author,
      url: card.url,
      platform_message_id: card.platformMessageId,
      platform_channel_id: card.platformChannelId,
      expires_at: card.expiresAt,
      is_series_patch: fromBool(card.isSeriesPatch),
      series_message_id: card.seriesMessageId,
      patch_version: card.patchVersion,
      patch_index: card.patchIndex,
      patch_total: card.patchTotal,
      now,
    }).changes > 0;

    const row = selectCard.get(card.messageIdHeader);
    if (!row) throw new Error(`patch card ${card.messageIdHeader} vanished after insert`);
    return { status: inserted ? 'created' : 'exists', record: mapPatchCard(row) };
  });

  const createThreadTx = db.transaction((thread: NewPatchThread, now: number): CreateResult<PatchThread> => {
    const inserted = insertThread.run(
      thread.cardMessageIdHeader,
      thread.threadId,
      thread.threadName,
      thread.overviewMessageId,
      JSON.stringify(thread.subPatchMessages),
      now,
    ).changes > 0;

    const row = selectThreadByCard.get(thread.cardMessageIdHeader) ?? selectThreadById.get(thread.threadId);
    if (!row) throw new Error(`patch thread for ${thread.cardMessageIdHeader} vanished after insert`);
    return { status: inserted ? 'created' : 'exists', record: mapPatchThread(row) };
  });

  // ── Repositories ──────────────────────────────────────────────────

  return {
    dialect: 'sqlite',

    messages: {
      async findByHeader(messageIdHeader: string): Promise<FeedMessage | undefined> {
        const row = selectMessage.get(messageIdHeader);
        return row ? mapFeedMessage(row) : undefined;
      },

      async create(message: FeedMessage): Promise<CreateResult<FeedMessage>> {
        return createMessageTx(message);
      },

      async findRepliesTo(messageIdHeader: string, limit: number = DEFAULT_REPLY_LOOKUP_LIMIT): Promise<FeedMessage[]> {
        return selectRepliesTo
          .all(messageIdHeader, `%${escapeLike(messageIdHeader)}%`, limit)
          .map(mapFeedMessage);
      },

      async findBySeriesId(seriesMessageId: string): Promise<FeedMessage[]> {
        return selectMessagesBySeries.all(seriesMessageId).map(mapFeedMessage);
      },

      async markProcessed(messageIdHeader: string, processedAt: number): Promise<boolean> {
        return markMessageProcessed.run(processedAt, messageIdHeader).changes > 0;
      },
    },

    cards: {
      async findByHeader(messageIdHeader: string): Promise<PatchCard | undefined> {
        const row = selectCard.get(messageIdHeader);
        return row ? mapPatchCard(row) : undefined;
      },

      async create(card: NewPatchCard, now: number = Date.now()): Promise<CreateResult<PatchCard>> {
        return createCardTx(card, now);
      },

      async updateDetails(
        messageIdHeader: string,
        details: PatchCardDetails,
        now: number = Date.now(),
      ): Promise<PatchCard | undefined> {
        updateCardDetails.run({
          message_id_header: messageIdHeader,
          subject: details.subject,
          author: details.author,
          url: details.url,
          expires_at: details.expiresAt,
          is_series_patch: fromBool(details.isSeriesPatch),
          series_message_id: details.seriesMessageId,
          patch_version: details.patchVersion,
          patch_index: details.patchIndex,
          patch_total: details.patchTotal,
          now,
        });
        const row = selectCard.get(messageIdHeader);
        return row ? mapPatchCard(row) : undefined;
      },

      async markHasThread(messageIdHeader: string, now: number = Date.now()): Promise<boolean> {
        return markCardThreaded.run(now, messageIdHeader).changes > 0;
      },

      async findBySeriesId(seriesMessageId: string, requirePlatformIdentity: boolean): Promise<PatchCard | undefined> {
        const row = requirePlatformIdentity
          ? selectPostedCardBySeries.get(seriesMessageId)
          : selectCardBySeries.get(seriesMessageId);
        return row ? mapPatchCard(row) : undefined;
      },

      async deleteExpiredWithoutThread(now: number): Promise<number> {
        return deleteExpiredCards.run(now).changes;
      },
    },

    threads: {
      async findByHeader(cardMessageIdHeader: string): Promise<PatchThread | undefined> {
        const row = selectThreadByCard.get(cardMessageIdHeader);
        return row ? mapPatchThread(row) : undefined;
      },

      async findByThreadId(threadId: string): Promise<PatchThread | undefined> {
        const row = selectThreadById.get(threadId);
        return row ? mapPatchThread(row) : undefined;
      },

      async create(thread: NewPatchThread, now: number = Date.now()): Promise<CreateResult<PatchThread>> {
        return createThreadTx(thread, now);
      },

      async archive(threadId: string, archivedAt: number): Promise<boolean> {
        return archiveThread.run(archivedAt, threadId).changes > 0;
      },

      async updateSubPatchMessageMap(threadId: string, messages: SubPatchMessageMap): Promise<boolean> {
        return updateThreadMessages.run(JSON.stringify(messages), threadId).changes > 0;
      },

      async countActive(): Promise<number> {
        return countActiveThreads.get()?.count ?? 0;
      },
    },

    filters: {
      async listEnabled(): Promise<FilterRule[]> {
        return mapFilterRules(selectEnabledRules.all());
      },

      async listAll(): Promise<FilterRule[]> {
        return mapFilterRules(selectAllRules.all());
      },

      async findByName(name: string): Promise<FilterRule | undefined> {
        const row = selectRuleByName.get(name);
        return row ? mapFilterRule(row) ?? undefined : undefined;
      },

      async save(input: FilterRuleInput): Promise<FilterRule> {
        upsertRule.run({
          name: input.name,
          enabled: fromBool(input.enabled ?? true),
          exclusive: fromBool(input.exclusive ?? false),
          conditions: JSON.stringify(input.conditions),
          description: input.description ?? null,
          created_by: input.createdBy ?? null,
          now: Date.now(),
        });
        const row = selectRuleByName.get(input.name);
        const rule = row ? mapFilterRule(row) : null;
        if (!rule) throw new Error(`filter rule ${input.name} could not be read back after save`);
        return rule;
      },

      async delete(name: string): Promise<boolean> {
        return deleteRule.run(name).changes > 0;
      },

      async setEnabled(name: string, enabled: boolean): Promise<boolean> {
        return setRuleEnabled.run(fromBool(enabled), Date.now(), name).changes > 0;
      },

      async getAutoWatchEnabled(): Promise<boolean> {
        return selectSetting.get(AUTO_WATCH_SETTING)?.value === 'true';
      },

      async setAutoWatchEnabled(enabled: boolean): Promise<void> {
        upsertSetting.run(AUTO_WATCH_SETTING, String(enabled));
      },
    },

    subsystems: {
      async listSubscribed(): Promise<string[]> {
        return selectSubscribed.all().map((row) => row.name);
      },

      async setSubscribed(name: string, subscribed: boolean): Promise<void> {
        upsertSubsystem.run(name, fromBool(subscribed), Date.now());
      },
    },

    async close(): Promise<void> {
      db.close();
      logger.info({ path }, 'SQLite database closed');
    },
  };
}
