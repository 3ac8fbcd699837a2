/**
 * Thread lifecycle: a card gains at most one discussion thread
 * (`created → threaded`), the thread's overview follows every correlated
 * reply while active, and archival is one-way.
 */

import { logger } from '../middleware/logger.js';
import { recordEvent } from '../middleware/stats.js';
import { truncate } from '../utils/formatting.js';
import { createKeyedLock, type KeyedLock } from '../utils/keyed-lock.js';
import { primaryReference } from './message-id.js';
import { walkReplyChain } from './reply-resolver.js';
import { selectSubPatches, seriesRootId, toSeriesPatchInfo, type SeriesPatchInfo } from './series-resolver.js';
import { buildThreadTree, collectConversation, countReplies } from './thread-tree.js';
import { toRenderableCard } from './patch-card-lifecycle.js';
import type { CreatedThread, ThreadOverview, ThreadSender } from './senders.js';
import type { FeedMessageRepository, PatchCardRepository, PatchThreadRepository } from '../utils/db-backend.js';
import type { FeedMessage, PatchCard, PatchThread, SubPatchMessageMap } from '../utils/db-types.js';

export const THREAD_NAME_MAX_LENGTH = 100;

export type WatchSkipReason =
  | 'no-sender'
  | 'no-card'
  | 'no-platform-identity'
  | 'archived'
  | 'overview-unavailable'
  | 'send-failed';

export type WatchOutcome =
  | { status: 'created'; thread: PatchThread }
  | { status: 'existing'; thread: PatchThread }
  | { status: 'skipped'; reason: WatchSkipReason };

export type ThreadReplyOutcome =
  | { status: 'updated'; thread: PatchThread; targetIndex: number | null; notified: boolean }
  | { status: 'update-failed'; thread: PatchThread }
  | { status: 'no-active-thread' };

export interface PatchThreadServiceDeps {
  messages: Pick<FeedMessageRepository, 'findByHeader' | 'findBySeriesId' | 'findRepliesTo'>;
  cards: PatchCardRepository;
  threads: PatchThreadRepository;
  /** Null when the platform cannot host threads; watching is then a no-op. */
  sender: ThreadSender | null;
  lock?: KeyedLock;
  now?: () => number;
}

export interface PatchThreadService {
  /** Open the card's thread, or reuse the active one. */
  watch(card: PatchCard): Promise<WatchOutcome>;
  /** Operator "watch" on a card by its root Message-ID. */
  watchByHeader(messageIdHeader: string): Promise<WatchOutcome>;
  /** Fold a correlated reply into the card's active thread, if any. */
  handleReply(reply: FeedMessage, card: PatchCard): Promise<ThreadReplyOutcome>;
  /** Re-render the overview of the card's active thread. */
  refresh(card: PatchCard): Promise<boolean>;
  archive(threadId: string): Promise<boolean>;
  prepareOverview(card: PatchCard): Promise<ThreadOverview | null>;
  /** Patch index a reply answers: the card root, or a sub-patch of its series. */
  findReplyTargetIndex(reply: FeedMessage, card: PatchCard, seriesPatches: readonly SeriesPatchInfo[]): Promise<number | null>;
}

export function threadLockKey(cardMessageIdHeader: string): string {
  return `thread:${cardMessageIdHeader}`;
}

/** Lowest-index rendered message; the overview when the map has index 0. */
export function firstRenderedMessageId(messages: SubPatchMessageMap): string | null {
  const indexes = Object.keys(messages)
    .map((key) => Number.parseInt(key, 10))
    .filter((index) => Number.isInteger(index))
    .sort((a, b) => a - b);
  const first = indexes[0];
  return first === undefined ? null : messages[first] ?? null;
}

function rootPatchIndex(card: PatchCard): number {
  return card.patchIndex ?? (card.isSeriesPatch ? 0 : 1);
}

export function createPatchThreadService(deps: PatchThreadServiceDeps): PatchThreadService {
  const { messages, cards, threads, sender } = deps;
  const lock = deps.lock ?? createKeyedLock();
  const now = deps.now ?? Date.now;

  async function prepareOverview(card: PatchCard): Promise<ThreadOverview | null> {
    const root = await messages.findByHeader(card.messageIdHeader);
    if (!root) {
      logger.warn({ messageId: card.messageIdHeader }, 'Card root message missing; cannot build overview');
      return null;
    }

    const seriesId = seriesRootId(root);
    const subPatches = seriesId
      ? selectSubPatches(await messages.findBySeriesId(seriesId), root.messageIdHeader)
      : [];
    const conversation = await collectConversation(messages, root, subPatches);
    const tree = buildThreadTree(root, conversation, new Set(subPatches.map((patch) => patch.messageIdHeader)));

    return {
      card: toRenderableCard(root, subPatches.map(toSeriesPatchInfo), []),
      tree,
      replyCount: countReplies(tree),
    };
  }

  async function findReplyTargetIndex(
    reply: FeedMessage,
    card: PatchCard,
    seriesPatches: readonly SeriesPatchInfo[],
  ): Promise<number | null> {
    const indexById = new Map<string, number>(seriesPatches.map((patch) => [patch.messageIdHeader, patch.patchIndex]));
    indexById.set(card.messageIdHeader, rootPatchIndex(card));

    const direct = primaryReference(reply.inReplyToHeader);
    const directIndex = direct === null ? undefined : indexById.get(direct);
    if (directIndex !== undefined) return directIndex;

    const viaChain = await walkReplyChain(messages, reply.inReplyToHeader, (ancestor) => {
      const parent = primaryReference(ancestor.inReplyToHeader);
      return parent === null ? undefined : indexById.get(parent);
    });
    return viaChain ?? null;
  }

  async function updateOverview(
    threadSender: ThreadSender,
    thread: PatchThread,
    overview: ThreadOverview,
    targetIndex: number | null,
  ): Promise<boolean> {
    const targeted = targetIndex === null ? undefined : thread.subPatchMessages[targetIndex];
    const messageId = targeted ?? firstRenderedMessageId(thread.subPatchMessages) ?? thread.overviewMessageId;
    if (!messageId) {
      logger.warn({ threadId: thread.threadId }, 'Thread has no rendered overview message to update');
      return false;
    }

    try {
      return await threadSender.updateThreadOverview(thread.threadId, messageId, overview);
    } catch (err) {
      logger.error({ err, threadId: thread.threadId }, 'Thread overview update failed');
      return false;
    }
  }

  async function watch(card: PatchCard): Promise<WatchOutcome> {
    if (!sender) return { status: 'skipped', reason: 'no-sender' };
    const anchorMessageId = card.platformMessageId;
    if (!anchorMessageId) {
      logger.warn({ messageId: card.messageIdHeader }, 'Card has no platform message; cannot open a thread');
      return { status: 'skipped', reason: 'no-platform-identity' };
    }

    return lock.runExclusive<WatchOutcome>(threadLockKey(card.messageIdHeader), async () => {
      const existing = await threads.findByHeader(card.messageIdHeader);
      if (existing) {
        if (!existing.isActive) return { status: 'skipped', reason: 'archived' };
        if (!card.hasThread) {
          await cards.markHasThread(card.messageIdHeader, now());
          logger.info({ messageId: card.messageIdHeader }, 'Backfilled stale has_thread flag');
        }
        return { status: 'existing', thread: existing };
      }

      const overview = await prepareOverview(card);
      if (!overview) return { status: 'skipped', reason: 'overview-unavailable' };

      const name = truncate(card.subject, THREAD_NAME_MAX_LENGTH);
      let created: CreatedThread | null = null;
      try {
        created = await sender.createThreadAndSendOverview(name, anchorMessageId, overview);
      } catch (err) {
        logger.error({ err, messageId: card.messageIdHeader }, 'Thread creation failed');
      }
      if (!created || !created.threadId) return { status: 'skipped', reason: 'send-failed' };

      const result = await threads.create({
        cardMessageIdHeader: card.messageIdHeader,
        threadId: created.threadId,
        threadName: name,
        overviewMessageId: firstRenderedMessageId(created.subPatchMessages),
        subPatchMessages: {},
      }, now());
      if (result.status === 'exists') {
        logger.warn({ messageId: card.messageIdHeader, threadId: result.record.threadId }, 'Thread row already existed; keeping it');
        return { status: 'existing', thread: result.record };
      }

      await threads.updateSubPatchMessageMap(created.threadId, created.subPatchMessages);
      await cards.markHasThread(card.messageIdHeader, now());
      recordEvent(card.subsystem, 'threadsCreated');
      logger.info({
        subsystem: card.subsystem,
        messageId: card.messageIdHeader,
        threadId: created.threadId,
        replies: overview.replyCount,
      }, 'Patch thread created');

      return {
        status: 'created',
        thread: { ...result.record, subPatchMessages: created.subPatchMessages },
      };
    });
  }

  return {
    watch,

    async watchByHeader(messageIdHeader: string): Promise<WatchOutcome> {
      const card = await cards.findByHeader(messageIdHeader);
      if (!card) return { status: 'skipped', reason: 'no-card' };
      return watch(card);
    },

    async handleReply(reply: FeedMessage, card: PatchCard): Promise<ThreadReplyOutcome> {
      const thread = await threads.findByHeader(card.messageIdHeader);
      if (!thread || !thread.isActive) return { status: 'no-active-thread' };
      if (!sender) return { status: 'update-failed', thread };

      const overview = await prepareOverview(card);
      if (!overview) return { status: 'update-failed', thread };

      const targetIndex = await findReplyTargetIndex(reply, card, overview.card.seriesPatches);
      const updated = await updateOverview(sender, thread, overview, targetIndex);
      if (!updated) return { status: 'update-failed', thread };
      recordEvent(card.subsystem, 'threadUpdates');

      let notified = false;
      if (card.platformMessageId) {
        try {
          notified = await sender.sendThreadUpdateNotification(card.platformChannelId, thread.threadId, card.platformMessageId);
        } catch (err) {
          logger.warn({ err, threadId: thread.threadId }, 'Thread update notification failed');
        }
      }

      logger.info({
        messageId: reply.messageIdHeader,
        threadId: thread.threadId,
        targetIndex,
        replies: overview.replyCount,
      }, 'Thread overview updated with reply');
      return { status: 'updated', thread, targetIndex, notified };
    },

    async refresh(card: PatchCard): Promise<boolean> {
      const thread = await threads.findByHeader(card.messageIdHeader);
      if (!thread || !thread.isActive || !sender) return false;

      const overview = await prepareOverview(card);
      if (!overview) return false;

      const updated = await updateOverview(sender, thread, overview, null);
      if (updated) recordEvent(card.subsystem, 'threadUpdates');
      return updated;
    },

    async archive(threadId: string): Promise<boolean> {
      const archived = await threads.archive(threadId, now());
      if (archived) logger.info({ threadId }, 'Patch thread archived');
      return archived;
    },

    prepareOverview,
    findReplyTargetIndex,
  };
}
