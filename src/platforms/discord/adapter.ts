import { z } from 'zod';
import { logger } from '../../middleware/logger.js';
import { truncate } from '../../utils/formatting.js';
import {
  renderCardEmbed,
  renderReplyNotification,
  renderThreadOverview,
  renderThreadUpdateNotification,
} from './render.js';
import type {
  CardSender,
  CreatedThread,
  RenderableCard,
  ReplyNotice,
  SentCard,
  ThreadOverview,
  ThreadSender,
} from '../../core/senders.js';

const DISCORD_API_BASE = 'https://discord.com/api/v10';
const MAX_ATTEMPTS = 3;
const REQUEST_TIMEOUT_MS = 15_000;
const THREAD_NAME_MAX = 100;
/** One week; the longest auto-archive Discord accepts. */
const DEFAULT_AUTO_ARCHIVE_MINUTES = 10_080;

export type DiscordSenders = CardSender & ThreadSender;

export interface DiscordSenderOptions {
  token: string;
  channelId: string;
  autoArchiveMinutes?: number;
}

export interface DiscordDemoOutboxEntry {
  type: 'card' | 'reply-notification' | 'thread' | 'thread-overview-update' | 'thread-notification';
  channelId: string;
  payload: unknown;
}

const messageSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
}).passthrough();

const channelSchema = z.object({
  id: z.string(),
}).passthrough();

const rateLimitSchema = z.object({
  retry_after: z.number().nonnegative(),
}).passthrough();

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Seconds to wait before retrying a 429, from the body or the Retry-After header. */
async function retryAfterMs(response: Response): Promise<number> {
  const body: unknown = await response.json().catch(() => null);
  const parsed = rateLimitSchema.safeParse(body);
  if (parsed.success) return Math.ceil(parsed.data.retry_after * 1000);

  const header = Number(response.headers.get('retry-after'));
  return Number.isFinite(header) && header >= 0 ? Math.ceil(header * 1000) : 1000;
}

export async function discordApiRequest<T>(
  token: string,
  path: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    const response = await fetch(`${DISCORD_API_BASE}${path}`, {
      ...init,
      headers: {
        authorization: `Bot ${token}`,
        'content-type': 'application/json; charset=utf-8',
        ...(init.headers ?? {}),
      },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (response.status === 429 && attempt < MAX_ATTEMPTS) {
      const waitMs = await retryAfterMs(response);
      logger.warn({ path, attempt, waitMs }, 'Discord rate limited; retrying');
      await sleep(waitMs);
      continue;
    }

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Discord API ${path} failed (${response.status}): ${text}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Discord API ${path} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }
}

/** Message reference that does not fail when the card was deleted. */
function replyTo(messageId: string | null): Record<string, unknown> {
  return messageId ? { message_reference: { message_id: messageId, fail_if_not_exists: false } } : {};
}

const NO_MENTIONS = { allowed_mentions: { parse: [] } };

export function createDiscordSenders(options: DiscordSenderOptions): DiscordSenders {
  const { token, channelId } = options;
  const autoArchive = options.autoArchiveMinutes ?? DEFAULT_AUTO_ARCHIVE_MINUTES;

  const postMessage = (targetChannelId: string, body: Record<string, unknown>) =>
    discordApiRequest(token, `/channels/${targetChannelId}/messages`, {
      method: 'POST',
      body: JSON.stringify({ ...NO_MENTIONS, ...body }),
    }, messageSchema);

  return {
    async send(card: RenderableCard): Promise<SentCard | null> {
      const sent = await postMessage(channelId, { embeds: [renderCardEmbed(card)] });
      return { messageId: sent.id, channelId: sent.channel_id };
    },

    async sendReplyNotification(notice: ReplyNotice): Promise<boolean> {
      await postMessage(notice.cardChannelId ?? channelId, {
        content: renderReplyNotification(notice),
        ...replyTo(notice.cardMessageId),
      });
      return true;
    },

    async createThreadAndSendOverview(
      name: string,
      anchorMessageId: string,
      overview: ThreadOverview,
    ): Promise<CreatedThread | null> {
      const thread = await discordApiRequest(token, `/channels/${channelId}/messages/${anchorMessageId}/threads`, {
        method: 'POST',
        body: JSON.stringify({ name: truncate(name, THREAD_NAME_MAX), auto_archive_duration: autoArchive }),
      }, channelSchema);

      let first: z.infer<typeof messageSchema>;
      try {
        first = await postMessage(thread.id, { content: renderThreadOverview(overview) });
      } catch (err) {
        // The anchor message can start only one thread; drop the empty one so a later watch can retry.
        await discordApiRequest(token, `/channels/${thread.id}`, { method: 'DELETE' }, channelSchema).catch((cleanupErr: unknown) => {
          logger.warn({ err: cleanupErr, threadId: thread.id }, 'Could not delete thread after overview failure');
        });
        throw err;
      }
      return { threadId: thread.id, subPatchMessages: { 0: first.id } };
    },

    async updateThreadOverview(threadId: string, messageId: string, overview: ThreadOverview): Promise<boolean> {
      await discordApiRequest(token, `/channels/${threadId}/messages/${messageId}`, {
        method: 'PATCH',
        body: JSON.stringify({ content: renderThreadOverview(overview) }),
      }, messageSchema);
      return true;
    },

    async sendThreadUpdateNotification(targetChannelId: string | null, threadId: string, messageId: string): Promise<boolean> {
      await postMessage(targetChannelId ?? channelId, {
        content: renderThreadUpdateNotification(threadId),
        ...replyTo(messageId),
      });
      return true;
    },
  };
}

/**
 * Offline senders: every call is rendered, recorded in `outbox` and logged,
 * and ids are handed out from a counter.
 */
export function createDiscordDemoSenders(outbox: DiscordDemoOutboxEntry[], channelId: string = 'demo-channel'): DiscordSenders {
  let sequence = 0;
  const nextId = (): string => `discord-demo-${++sequence}`;

  const record = (entry: DiscordDemoOutboxEntry): void => {
    outbox.push(entry);
    logger.info({ type: entry.type, channelId: entry.channelId }, 'Discord demo send');
  };

  return {
    async send(card: RenderableCard): Promise<SentCard | null> {
      const messageId = nextId();
      record({ type: 'card', channelId, payload: { messageId, embed: renderCardEmbed(card) } });
      return { messageId, channelId };
    },

    async sendReplyNotification(notice: ReplyNotice): Promise<boolean> {
      record({
        type: 'reply-notification',
        channelId: notice.cardChannelId ?? channelId,
        payload: { content: renderReplyNotification(notice), replyToId: notice.cardMessageId },
      });
      return true;
    },

    async createThreadAndSendOverview(name: string, anchorMessageId: string, overview: ThreadOverview): Promise<CreatedThread | null> {
      const threadId = nextId();
      const overviewId = nextId();
      record({
        type: 'thread',
        channelId,
        payload: {
          threadId,
          name: truncate(name, THREAD_NAME_MAX),
          anchorMessageId,
          overviewMessageId: overviewId,
          content: renderThreadOverview(overview),
        },
      });
      return { threadId, subPatchMessages: { 0: overviewId } };
    },

    async updateThreadOverview(threadId: string, messageId: string, overview: ThreadOverview): Promise<boolean> {
      record({ type: 'thread-overview-update', channelId: threadId, payload: { messageId, content: renderThreadOverview(overview) } });
      return true;
    },

    async sendThreadUpdateNotification(targetChannelId: string | null, threadId: string, messageId: string): Promise<boolean> {
      record({
        type: 'thread-notification',
        channelId: targetChannelId ?? channelId,
        payload: { content: renderThreadUpdateNotification(threadId), replyToId: messageId },
      });
      return true;
    },
  };
}
