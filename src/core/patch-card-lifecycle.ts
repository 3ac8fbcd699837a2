/**
 * Patch-card lifecycle: absent → created.
 *
 * A card is posted to the platform first and persisted second, so a stored
 * card always has a platform identity. The `created → threaded` step lives
 * in `thread-lifecycle.ts`.
 */

import { logger } from '../middleware/logger.js';
import { recordEvent } from '../middleware/stats.js';
import { createKeyedLock, type KeyedLock } from '../utils/keyed-lock.js';
import { isSeriesSubPatch } from './reply-resolver.js';
import { listSeriesPatches, seriesRootId, type SeriesPatchInfo } from './series-resolver.js';
import type { FilterService } from './filter-service.js';
import type { CardSender, RenderableCard, ReplyNotice, SentCard } from './senders.js';
import type { FeedMessageRepository, PatchCardRepository } from '../utils/db-backend.js';
import type { FeedMessage, PatchCard, PatchCardDetails } from '../utils/db-types.js';

export type CardSkipReason =
  | 'series-sub-patch'
  | 'filtered'
  | 'no-filter-match'
  | 'send-failed'
  | 'threaded';

export type CardOutcome =
  | { status: 'created'; card: PatchCard; matched: string[] }
  | { status: 'existing'; card: PatchCard; matched: string[] }
  | { status: 'skipped'; reason: CardSkipReason };

export type ReplyPerspectiveOutcome =
  | { status: 'notified'; card: PatchCard; matched: string[]; created: boolean; delivered: boolean }
  | { status: 'skipped'; reason: CardSkipReason };

export interface PatchCardServiceDeps {
  messages: Pick<FeedMessageRepository, 'findBySeriesId'>;
  cards: PatchCardRepository;
  filters: FilterService;
  sender: CardSender;
  cardTtlMs: number;
  /** Shared with the thread lifecycle so both serialize on the same keys. */
  lock?: KeyedLock;
  now?: () => number;
}

export interface PatchCardService {
  /** Patch or cover-letter arrival. */
  handlePatch(message: FeedMessage): Promise<CardOutcome>;
  /** Post and persist a card for `target` unless one exists. */
  createCard(target: FeedMessage, matched: string[]): Promise<CardOutcome>;
  /** The card for a message itself, or for the series it belongs to. */
  findCardForMessage(target: FeedMessage): Promise<PatchCard | undefined>;
  /** A reply arrived for `target` and no active thread took it. */
  handleReplyPerspective(reply: FeedMessage, target: FeedMessage): Promise<ReplyPerspectiveOutcome>;
  /** Drop expired cards that never gained a thread. */
  expireStaleCards(): Promise<number>;
}

export function cardLockKey(messageIdHeader: string): string {
  return `card:${messageIdHeader}`;
}

export function toRenderableCard(
  message: FeedMessage,
  seriesPatches: SeriesPatchInfo[],
  matchedFilters: string[],
): RenderableCard {
  return {
    messageIdHeader: message.messageIdHeader,
    subsystem: message.subsystem,
    subject: message.subject,
    author: message.author,
    url: message.url,
    receivedAt: message.receivedAt,
    patchVersion: message.patchVersion,
    patchIndex: message.patchIndex,
    patchTotal: message.patchTotal,
    isSeriesPatch: message.isSeriesPatch,
    isCoverLetter: message.isCoverLetter,
    seriesMessageId: message.seriesMessageId,
    seriesPatches,
    matchedFilters,
  };
}

function cardDetails(message: FeedMessage, expiresAt: number): PatchCardDetails {
  return {
    subject: message.subject,
    author: message.author,
    url: message.url,
    expiresAt,
    isSeriesPatch: message.isSeriesPatch,
    seriesMessageId: message.seriesMessageId,
    patchVersion: message.patchVersion,
    patchIndex: message.patchIndex,
    patchTotal: message.patchTotal,
  };
}

export function createPatchCardService(deps: PatchCardServiceDeps): PatchCardService {
  const { messages, cards, filters, sender, cardTtlMs } = deps;
  const lock = deps.lock ?? createKeyedLock();
  const now = deps.now ?? Date.now;

  async function sendCard(card: RenderableCard): Promise<SentCard | null> {
    try {
      return await sender.send(card);
    } catch (err) {
      logger.error({ err, messageId: card.messageIdHeader }, 'Card send failed');
      return null;
    }
  }

  async function createCard(target: FeedMessage, matched: string[]): Promise<CardOutcome> {
    return lock.runExclusive<CardOutcome>(cardLockKey(target.messageIdHeader), async () => {
      const existing = await cards.findByHeader(target.messageIdHeader);
      if (existing) return { status: 'existing', card: existing, matched };

      const seriesId = seriesRootId(target);
      const seriesPatches = seriesId
        ? await listSeriesPatches(messages, seriesId, target.messageIdHeader)
        : [];

      const sent = await sendCard(toRenderableCard(target, seriesPatches, matched));
      if (!sent || !sent.messageId) {
        logger.warn({ messageId: target.messageIdHeader }, 'Card send returned no platform identity; not persisting');
        return { status: 'skipped', reason: 'send-failed' };
      }

      const stampedAt = now();
      const details = cardDetails(target, stampedAt + cardTtlMs);
      const result = await cards.create({
        ...details,
        messageIdHeader: target.messageIdHeader,
        subsystem: target.subsystem,
        platformMessageId: sent.messageId,
        platformChannelId: sent.channelId,
      }, stampedAt);

      if (result.status === 'created') {
        recordEvent(target.subsystem, 'cardsCreated');
        logger.info({
          subsystem: target.subsystem,
          messageId: target.messageIdHeader,
          platformMessageId: sent.messageId,
          seriesPatches: seriesPatches.length,
          matched,
        }, 'Patch card created');
        return { status: 'created', card: result.record, matched };
      }

      // Another writer stored the card first; its platform identity stands.
      logger.warn({
        messageId: target.messageIdHeader,
        keptPlatformMessageId: result.record.platformMessageId,
        droppedPlatformMessageId: sent.messageId,
      }, 'Card insert lost a uniqueness race; refreshing the stored card');
      const updated = await cards.updateDetails(target.messageIdHeader, details, stampedAt);
      return { status: 'existing', card: updated ?? result.record, matched };
    });
  }

  async function findCardForMessage(target: FeedMessage): Promise<PatchCard | undefined> {
    const direct = await cards.findByHeader(target.messageIdHeader);
    if (direct) return direct;
    if (!target.seriesMessageId) return undefined;
    return cards.findBySeriesId(target.seriesMessageId, true);
  }

  return {
    async handlePatch(message: FeedMessage): Promise<CardOutcome> {
      if (isSeriesSubPatch(message)) {
        logger.debug({ messageId: message.messageIdHeader, series: message.seriesMessageId }, 'Series sub-patch stored without a card');
        return { status: 'skipped', reason: 'series-sub-patch' };
      }

      const existing = await cards.findByHeader(message.messageIdHeader);
      if (existing) return { status: 'existing', card: existing, matched: [] };

      const decision = await filters.evaluate(message);
      if (!decision.allow) {
        recordEvent(message.subsystem, 'filteredOut');
        logger.debug({ messageId: message.messageIdHeader }, 'Patch rejected by exclusive filters');
        return { status: 'skipped', reason: 'filtered' };
      }

      return createCard(message, decision.matched);
    },

    createCard,
    findCardForMessage,

    async handleReplyPerspective(reply: FeedMessage, target: FeedMessage): Promise<ReplyPerspectiveOutcome> {
      const decision = await filters.evaluate(reply);
      if (!decision.allow || decision.matched.length === 0) {
        return { status: 'skipped', reason: 'no-filter-match' };
      }

      let card = await findCardForMessage(target);
      if (card?.hasThread) return { status: 'skipped', reason: 'threaded' };

      let created = false;
      if (!card) {
        if (isSeriesSubPatch(target)) return { status: 'skipped', reason: 'series-sub-patch' };
        const outcome = await createCard(target, decision.matched);
        if (outcome.status === 'skipped') return outcome;
        card = outcome.card;
        created = outcome.status === 'created';
      }

      const notice: ReplyNotice = {
        replyAuthor: reply.author,
        replySubject: reply.subject,
        replyUrl: reply.url,
        replySubsystem: reply.subsystem,
        replyDate: reply.receivedAt,
        rootSubject: target.subject,
        rootUrl: target.url,
        cardChannelId: card.platformChannelId,
        cardMessageId: card.platformMessageId,
      };

      let delivered = false;
      try {
        delivered = await sender.sendReplyNotification(notice);
      } catch (err) {
        logger.warn({ err, messageId: reply.messageIdHeader }, 'Reply notification failed');
      }
      if (delivered) recordEvent(reply.subsystem, 'replyNotifications');

      return { status: 'notified', card, matched: decision.matched, created, delivered };
    },

    async expireStaleCards(): Promise<number> {
      const removed = await cards.deleteExpiredWithoutThread(now());
      if (removed > 0) logger.info({ removed }, 'Expired patch cards removed');
      return removed;
    },
  };
}
