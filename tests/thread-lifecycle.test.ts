import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createPatchCardService, type PatchCardService } from '../src/core/patch-card-lifecycle.js';
import { createPatchThreadService, type PatchThreadService } from '../src/core/thread-lifecycle.js';
import { createFilterService } from '../src/core/filter-service.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';
import { createKeyedLock } from '../src/utils/keyed-lock.js';
import { createFakeSenders, message, MINUTE, T0 } from './fixtures.js';
import type { DbBackend } from '../src/utils/db-backend.js';
import type { PatchCard } from '../src/utils/db-types.js';

const cover = message({ id: 'c@x', subject: '[PATCH 0/2] net: series', at: T0 });
const p1 = message({ id: 'p1@x', subject: '[PATCH 1/2] net: one', inReplyTo: '<c@x>', at: T0 + MINUTE });
const p2 = message({ id: 'p2@x', subject: '[PATCH 2/2] net: two', inReplyTo: '<c@x>', at: T0 + 2 * MINUTE });
const r2 = message({ id: 'r2@x', subject: 'Re: [PATCH 1/2] net: one', inReplyTo: '<p1@x>', at: T0 + 3 * MINUTE });
const r3 = message({ id: 'r3@x', subject: 'Re: [PATCH 1/2] net: one', inReplyTo: '<r2@x>', at: T0 + 4 * MINUTE });

describe('Thread lifecycle', () => {
  let backend: DbBackend;
  let senders: ReturnType<typeof createFakeSenders>;
  let cards: PatchCardService;
  let threads: PatchThreadService;

  async function seriesCard(): Promise<PatchCard> {
    for (const msg of [cover, p1, p2]) await backend.messages.create(msg);
    await cards.handlePatch(cover);
    const card = await backend.cards.findByHeader('c@x');
    if (!card) throw new Error('card was not created');
    return card;
  }

  beforeEach(() => {
    backend = createSqliteBackend(':memory:');
    senders = createFakeSenders();
    const lock = createKeyedLock();
    cards = createPatchCardService({
      messages: backend.messages,
      cards: backend.cards,
      filters: createFilterService(backend.filters),
      sender: senders.card,
      cardTtlMs: 60 * MINUTE,
      lock,
      now: () => T0,
    });
    threads = createPatchThreadService({
      messages: backend.messages,
      cards: backend.cards,
      threads: backend.threads,
      sender: senders.thread,
      lock,
      now: () => T0 + 30 * MINUTE,
    });
  });

  afterEach(async () => {
    await backend.close();
  });

  describe('watch', () => {
    it('opens a thread on the card message with the series overview', async () => {
      const card = await seriesCard();

      const outcome = await threads.watch(card);

      expect(outcome.status).toBe('created');
      expect(senders.createThreadAndSendOverview).toHaveBeenCalledTimes(1);
      const [name, anchor, overview] = senders.createThreadAndSendOverview.mock.calls[0] ?? [];
      expect(name).toBe('[PATCH 0/2] net: series');
      expect(anchor).toBe('msg-1');
      expect(overview?.tree.children.map((node) => node.message.messageIdHeader)).toEqual(['p1@x', 'p2@x']);
      expect(overview?.card.seriesPatches.map((patch) => patch.patchIndex)).toEqual([1, 2]);

      const thread = await backend.threads.findByHeader('c@x');
      expect(thread).toMatchObject({
        threadId: 'thread-2',
        overviewMessageId: 'overview-3',
        subPatchMessages: { 0: 'overview-3' },
        isActive: true,
      });
      expect((await backend.cards.findByHeader('c@x'))?.hasThread).toBe(true);
    });

    it('reuses the active thread when watched again', async () => {
      const card = await seriesCard();

      const first = await threads.watch(card);
      const second = await threads.watch(card);

      expect(first.status).toBe('created');
      expect(second.status).toBe('existing');
      expect(senders.createThreadAndSendOverview).toHaveBeenCalledTimes(1);
      expect((await backend.cards.findByHeader('c@x'))?.hasThread).toBe(true);
    });

    it('serializes concurrent watches of one card', async () => {
      const card = await seriesCard();

      const outcomes = await Promise.all([threads.watch(card), threads.watch(card)]);

      expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['created', 'existing']);
      expect(senders.createThreadAndSendOverview).toHaveBeenCalledTimes(1);
    });

    it('backfills a stale has_thread flag', async () => {
      const card = await seriesCard();
      await backend.threads.create({
        cardMessageIdHeader: 'c@x',
        threadId: 'thread-old',
        threadName: 'series',
        overviewMessageId: 'overview-old',
        subPatchMessages: { 0: 'overview-old' },
      });

      const outcome = await threads.watch(card);

      expect(outcome.status).toBe('existing');
      expect((await backend.cards.findByHeader('c@x'))?.hasThread).toBe(true);
      expect(senders.createThreadAndSendOverview).not.toHaveBeenCalled();
    });

    it('never reopens an archived thread', async () => {
      const card = await seriesCard();
      await threads.watch(card);
      expect(await threads.archive('thread-2')).toBe(true);

      expect(await threads.watch(card)).toEqual({ status: 'skipped', reason: 'archived' });
      expect(senders.createThreadAndSendOverview).toHaveBeenCalledTimes(1);
      expect((await backend.threads.findByThreadId('thread-2'))?.archivedAt).toBe(T0 + 30 * MINUTE);
    });

    it('records nothing when thread creation fails', async () => {
      const card = await seriesCard();
      senders.createThreadAndSendOverview.mockRejectedValueOnce(new Error('Missing Permissions'));

      expect(await threads.watch(card)).toEqual({ status: 'skipped', reason: 'send-failed' });
      expect(await backend.threads.findByHeader('c@x')).toBeUndefined();
      expect((await backend.cards.findByHeader('c@x'))?.hasThread).toBe(false);
    });

    it('needs a posted card', async () => {
      const card = await seriesCard();
      expect(await threads.watch({ ...card, platformMessageId: null }))
        .toEqual({ status: 'skipped', reason: 'no-platform-identity' });
    });

    it('looks cards up by Message-ID for operator watches', async () => {
      await seriesCard();
      expect((await threads.watchByHeader('c@x')).status).toBe('created');
      expect(await threads.watchByHeader('unknown@x')).toEqual({ status: 'skipped', reason: 'no-card' });
    });

    it('is a no-op without a thread-capable platform', async () => {
      const card = await seriesCard();
      const headless = createPatchThreadService({
        messages: backend.messages,
        cards: backend.cards,
        threads: backend.threads,
        sender: null,
      });
      expect(await headless.watch(card)).toEqual({ status: 'skipped', reason: 'no-sender' });
    });
  });

  describe('replies', () => {
    it('updates the overview and notifies the card channel', async () => {
      const card = await seriesCard();
      await threads.watch(card);
      await backend.messages.create(r2);

      const outcome = await threads.handleReply(r2, card);

      expect(outcome).toMatchObject({ status: 'updated', targetIndex: 1, notified: true });
      expect(senders.updateThreadOverview).toHaveBeenCalledTimes(1);
      const [threadId, messageId, overview] = senders.updateThreadOverview.mock.calls[0] ?? [];
      expect(threadId).toBe('thread-2');
      expect(messageId).toBe('overview-3');
      expect(overview?.replyCount).toBe(1);
      expect(senders.sendThreadUpdateNotification).toHaveBeenCalledWith('chan-1', 'thread-2', 'msg-1');
    });

    it('reports no active thread before a watch and after archival', async () => {
      const card = await seriesCard();
      expect(await threads.handleReply(r2, card)).toEqual({ status: 'no-active-thread' });

      await threads.watch(card);
      await threads.archive('thread-2');
      expect(await threads.handleReply(r2, card)).toEqual({ status: 'no-active-thread' });
    });

    it('reports a failed overview update', async () => {
      const card = await seriesCard();
      await threads.watch(card);
      senders.updateThreadOverview.mockResolvedValueOnce(false);

      const outcome = await threads.handleReply(r2, card);
      expect(outcome.status).toBe('update-failed');
      expect(senders.sendThreadUpdateNotification).not.toHaveBeenCalled();
    });

    it('refreshes the overview of an active thread', async () => {
      const card = await seriesCard();
      expect(await threads.refresh(card)).toBe(false);

      await threads.watch(card);
      expect(await threads.refresh(card)).toBe(true);
      expect(senders.updateThreadOverview).toHaveBeenCalledWith('thread-2', 'overview-3', expect.anything());
    });
  });

  describe('findReplyTargetIndex', () => {
    it('maps direct and nested replies to the patch they answer', async () => {
      const card = await seriesCard();
      for (const msg of [r2, r3]) await backend.messages.create(msg);
      const overview = await threads.prepareOverview(card);
      const patches = overview?.card.seriesPatches ?? [];

      const onCover = message({ id: 'rc@x', subject: 'Re: [PATCH 0/2] net: series', inReplyTo: '<c@x>' });
      const unrelated = message({ id: 'ru@x', subject: 'Re: other', inReplyTo: '<elsewhere@x>' });

      expect(await threads.findReplyTargetIndex(r2, card, patches)).toBe(1);
      expect(await threads.findReplyTargetIndex(r3, card, patches)).toBe(1);
      expect(await threads.findReplyTargetIndex(onCover, card, patches)).toBe(0);
      expect(await threads.findReplyTargetIndex(unrelated, card, patches)).toBeNull();
    });
  });
});
