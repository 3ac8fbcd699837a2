/**
 * Row shapes shared by both SQL dialects and their mapping to entity types.
 * SQLite hands back integers for flags and counters; Postgres hands back
 * booleans and BIGINT strings, so every numeric column goes through
 * `toNumber` and every flag through `toBool`.
 */

import { logger } from '../middleware/logger.js';
import { parseFilterConditions } from './filter-conditions.js';
import type { FeedMessage, FilterRule, PatchCard, PatchThread, SubPatchMessageMap } from './db-types.js';

export type BigintLike = string | number;
export type BoolLike = boolean | number;

export interface FeedMessageRow {
  subsystem: string;
  message_id_header: string;
  message_id: string | null;
  subject: string;
  author: string;
  author_email: string | null;
  in_reply_to_header: string | null;
  content: string | null;
  url: string | null;
  received_at: BigintLike;
  is_patch: BoolLike;
  is_reply: BoolLike;
  is_series_patch: BoolLike;
  is_cover_letter: BoolLike;
  patch_version: BigintLike | null;
  patch_index: BigintLike | null;
  patch_total: BigintLike | null;
  series_message_id: string | null;
  processed_at: BigintLike | null;
}

export interface PatchCardRow {
  message_id_header: string;
  subsystem: string;
  subject: string;
  author: string;
  url: string | null;
  platform_message_id: string | null;
  platform_channel_id: string | null;
  expires_at: BigintLike;
  is_series_patch: BoolLike;
  series_message_id: string | null;
  patch_version: BigintLike | null;
  patch_index: BigintLike | null;
  patch_total: BigintLike | null;
  has_thread: BoolLike;
  created_at: BigintLike;
  updated_at: BigintLike;
}

export interface PatchThreadRow {
  card_message_id_header: string;
  thread_id: string;
  thread_name: string;
  is_active: BoolLike;
  overview_message_id: string | null;
  sub_patch_messages: unknown;
  created_at: BigintLike;
  archived_at: BigintLike | null;
}

export interface FilterRuleRow {
  id: BigintLike;
  name: string;
  enabled: BoolLike;
  exclusive: BoolLike;
  conditions: unknown;
  description: string | null;
  created_by: string | null;
  created_at: BigintLike;
  updated_at: BigintLike;
}

export function toNumber(value: BigintLike | null | undefined): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function toNullableNumber(value: BigintLike | null): number | null {
  return value === null ? null : toNumber(value);
}

export function toBool(value: BoolLike): boolean {
  return typeof value === 'boolean' ? value : value !== 0;
}

export function fromBool(value: boolean): number {
  return value ? 1 : 0;
}

export function mapFeedMessage(row: FeedMessageRow): FeedMessage {
  return {
    subsystem: row.subsystem,
    messageIdHeader: row.message_id_header,
    messageId: row.message_id,
    subject: row.subject,
    author: row.author,
    authorEmail: row.author_email,
    inReplyToHeader: row.in_reply_to_header,
    content: row.content,
    url: row.url,
    receivedAt: toNumber(row.received_at),
    isPatch: toBool(row.is_patch),
    isReply: toBool(row.is_reply),
    isSeriesPatch: toBool(row.is_series_patch),
    isCoverLetter: toBool(row.is_cover_letter),
    patchVersion: toNullableNumber(row.patch_version),
    patchIndex: toNullableNumber(row.patch_index),
    patchTotal: toNullableNumber(row.patch_total),
    seriesMessageId: row.series_message_id,
    processedAt: toNullableNumber(row.processed_at),
  };
}

export function mapPatchCard(row: PatchCardRow): PatchCard {
  return {
    messageIdHeader: row.message_id_header,
    subsystem: row.subsystem,
    subject: row.subject,
    author: row.author,
    url: row.url,
    platformMessageId: row.platform_message_id,
    platformChannelId: row.platform_channel_id,
    expiresAt: toNumber(row.expires_at),
    isSeriesPatch: toBool(row.is_series_patch),
    seriesMessageId: row.series_message_id,
    patchVersion: toNullableNumber(row.patch_version),
    patchIndex: toNullableNumber(row.patch_index),
    patchTotal: toNullableNumber(row.patch_total),
    hasThread: toBool(row.has_thread),
    createdAt: toNumber(row.created_at),
    updatedAt: toNumber(row.updated_at),
  };
}

/** Accepts the JSON text SQLite stores or the object a jsonb column yields. */
export function parseSubPatchMessages(value: unknown): SubPatchMessageMap {
  let source = value;
  if (typeof value === 'string') {
    try {
      source = JSON.parse(value);
    } catch {
      return {};
    }
  }
  if (typeof source !== 'object' || source === null || Array.isArray(source)) return {};

  const result: SubPatchMessageMap = {};
  for (const [key, messageId] of Object.entries(source)) {
    const index = Number.parseInt(key, 10);
    if (Number.isInteger(index) && index >= 0 && typeof messageId === 'string') {
      result[index] = messageId;
    }
  }
  return result;
}

export function mapPatchThread(row: PatchThreadRow): PatchThread {
  return {
    cardMessageIdHeader: row.card_message_id_header,
    threadId: row.thread_id,
    threadName: row.thread_name,
    isActive: toBool(row.is_active),
    overviewMessageId: row.overview_message_id,
    subPatchMessages: parseSubPatchMessages(row.sub_patch_messages),
    createdAt: toNumber(row.created_at),
    archivedAt: toNullableNumber(row.archived_at),
  };
}

/** Rules whose stored conditions no longer validate are dropped with a warning. */
export function mapFilterRule(row: FilterRuleRow): FilterRule | null {
  const parsed = parseFilterConditions(row.conditions);
  if (!parsed.ok) {
    logger.warn({ rule: row.name, error: parsed.error }, 'Ignoring filter rule with invalid conditions');
    return null;
  }

  return {
    id: toNumber(row.id),
    name: row.name,
    enabled: toBool(row.enabled),
    exclusive: toBool(row.exclusive),
    conditions: parsed.value,
    description: row.description,
    createdBy: row.created_by,
    createdAt: toNumber(row.created_at),
    updatedAt: toNumber(row.updated_at),
  };
}

export function mapFilterRules(rows: FilterRuleRow[]): FilterRule[] {
  const rules: FilterRule[] = [];
  for (const row of rows) {
    const rule = mapFilterRule(row);
    if (rule) rules.push(rule);
  }
  return rules;
}

/** Escape LIKE wildcards so a message id is matched literally (ESCAPE '\'). */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export const AUTO_WATCH_SETTING = 'auto_watch_enabled';
export const DEFAULT_REPLY_LOOKUP_LIMIT = 100;
