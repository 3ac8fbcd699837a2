import { logger } from '../middleware/logger.js';
import { recordEvent } from '../middleware/stats.js';
import { applyClassification, type MessageClassification } from './message-classifier.js';
import { normalizeMessageId, primaryReference } from './message-id.js';
import { isSeriesSubPatch, resolveReplyTarget } from './reply-resolver.js';
import type { CardOutcome, PatchCardService, ReplyPerspectiveOutcome } from './patch-card-lifecycle.js';
import type { PatchThreadService, ThreadReplyOutcome, WatchOutcome } from './thread-lifecycle.js';
import type { FilterService } from './filter-service.js';
import type { FeedMessageRepository } from '../utils/db-backend.js';
import type { FeedMessage } from '../utils/db-types.js';

export type ProcessOutcome =
  | { kind: 'ignored'; reason: 'missing-id' | 'not-patch-or-reply' | 'duplicate-reply' }
  | { kind: 'patch'; card: CardOutcome; refreshedThread: boolean; watch: WatchOutcome | null }
  | {
    kind: 'reply';
    targetMessageId: string | null;
    thread: ThreadReplyOutcome | null;
    perspective: ReplyPerspectiveOutcome | null;
    watch: WatchOutcome | null;
  }
  | { kind: 'failed'; error: string };

export interface FeedMessageProcessorDeps {
  messages: FeedMessageRepository;
  cards: PatchCardService;
  threads: PatchThreadService;
  filters: FilterService;
  now?: () => number;
}

export interface FeedMessageProcessor {
  /**
   * Store one classified message and drive the card/thread lifecycles.
   * Never throws: failures are logged and reported as `failed`.
   */
  processMessage(message: FeedMessage, classification: MessageClassification): Promise<ProcessOutcome>;
}

/**
 * Core feed message processing.
 *
 * Pipeline steps:
 * - id normalization + classification
 * - series id inheritance from the stored parent
 * - idempotent persistence (re-ingest backfills classification)
 * - patch path: card lifecycle, thread refresh for late sub-patches
 * - reply path: thread update, or reply perspective + auto-watch
 */
export function createFeedMessageProcessor(deps: FeedMessageProcessorDeps): FeedMessageProcessor {
  const { messages, cards, threads, filters } = deps;
  const now = deps.now ?? Date.now;

  /** Deep-threaded series and replies take their series id from the stored parent. */
  async function inheritSeriesId(message: FeedMessage): Promise<FeedMessage> {
    if (message.isPatch && isSeriesSubPatch(message) && message.seriesMessageId) {
      const parent = await messages.findByHeader(message.seriesMessageId);
      if (parent && isSeriesSubPatch(parent) && parent.seriesMessageId && parent.seriesMessageId !== message.seriesMessageId) {
        return { ...message, seriesMessageId: parent.seriesMessageId };
      }
      return message;
    }

    if (!message.isPatch && !message.seriesMessageId) {
      const parentId = primaryReference(message.inReplyToHeader);
      const parent = parentId ? await messages.findByHeader(parentId) : undefined;
      if (parent?.seriesMessageId) return { ...message, seriesMessageId: parent.seriesMessageId };
    }

    return message;
  }

  async function processPatch(message: FeedMessage, firstSeen: boolean): Promise<ProcessOutcome> {
    const card = await cards.handlePatch(message);

    let refreshedThread = false;
    if (card.status === 'skipped' && card.reason === 'series-sub-patch' && firstSeen) {
      const seriesCard = await cards.findCardForMessage(message);
      if (seriesCard?.hasThread) refreshedThread = await threads.refresh(seriesCard);
    }

    let watch: WatchOutcome | null = null;
    if (card.status !== 'skipped' && !card.card.hasThread && await filters.shouldAutoWatch(card.matched)) {
      watch = await threads.watch(card.card);
    }

    return { kind: 'patch', card, refreshedThread, watch };
  }

  async function processReply(reply: FeedMessage): Promise<ProcessOutcome> {
    const target = await resolveReplyTarget(messages, reply);
    if (!target) {
      logger.debug({ messageId: reply.messageIdHeader, inReplyTo: reply.inReplyToHeader }, 'Reply did not correlate to a stored patch');
      return { kind: 'reply', targetMessageId: null, thread: null, perspective: null, watch: null };
    }

    const card = await cards.findCardForMessage(target);
    if (card) {
      const thread = await threads.handleReply(reply, card);
      if (thread.status !== 'no-active-thread') {
        return { kind: 'reply', targetMessageId: target.messageIdHeader, thread, perspective: null, watch: null };
      }
    }

    const perspective = await cards.handleReplyPerspective(reply, target);
    let watch: WatchOutcome | null = null;
    if (perspective.status === 'notified' && await filters.shouldAutoWatch(perspective.matched)) {
      watch = await threads.watch(perspective.card);
    }

    return { kind: 'reply', targetMessageId: target.messageIdHeader, thread: null, perspective, watch };
  }

  return {
    async processMessage(message: FeedMessage, classification: MessageClassification): Promise<ProcessOutcome> {
      const messageIdHeader = normalizeMessageId(message.messageIdHeader);
      if (!messageIdHeader) {
        logger.warn({ subsystem: message.subsystem, subject: message.subject }, 'Feed message without a Message-ID; skipping');
        return { kind: 'ignored', reason: 'missing-id' };
      }

      try {
        const classified = await inheritSeriesId(
          applyClassification({ ...message, messageIdHeader }, classification),
        );
        const stored = await messages.create(classified);
        recordEvent(message.subsystem, 'messagesProcessed');

        if (stored.record.isPatch) {
          return await processPatch(stored.record, stored.status === 'created');
        }
        if (stored.record.isReply) {
          // A reply is retried on every delivery until it correlates and finishes once.
          if (stored.record.processedAt !== null) return { kind: 'ignored', reason: 'duplicate-reply' };
          const outcome = await processReply(stored.record);
          if (outcome.kind === 'reply' && outcome.targetMessageId !== null) {
            await messages.markProcessed(stored.record.messageIdHeader, now());
          }
          return outcome;
        }
        return { kind: 'ignored', reason: 'not-patch-or-reply' };
      } catch (err) {
        recordEvent(message.subsystem, 'errors');
        logger.error({ err, subsystem: message.subsystem, messageId: messageIdHeader }, 'Feed message processing failed');
        return { kind: 'failed', error: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}
