import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createPatchCardService, type PatchCardService } from '../src/core/patch-card-lifecycle.js';
import { createFilterService, type FilterService } from '../src/core/filter-service.js';
import { createSqliteBackend } from '../src/utils/db-sqlite.js';
import { createFakeSenders, message, MINUTE, T0 } from './fixtures.js';
import type { DbBackend, PatchCardRepository } from '../src/utils/db-backend.js';

const TTL_MS = 24 * 60 * MINUTE;

describe('Patch card lifecycle', () => {
  let backend: DbBackend;
  let filters: FilterService;
  let senders: ReturnType<typeof createFakeSenders>;
  let service: PatchCardService;

  function serviceWith(cards: PatchCardRepository = backend.cards): PatchCardService {
    return createPatchCardService({
      messages: backend.messages,
      cards,
      filters,
      sender: senders.card,
      cardTtlMs: TTL_MS,
      now: () => T0,
    });
  }

  beforeEach(() => {
    backend = createSqliteBackend(':memory:');
    filters = createFilterService(backend.filters);
    senders = createFakeSenders();
    service = serviceWith();
  });

  afterEach(async () => {
    await backend.close();
  });

  it('posts the card before persisting it with the platform identity', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] net: fix leak' });

    const outcome = await service.handlePatch(patch);

    expect(outcome.status).toBe('created');
    expect(senders.send).toHaveBeenCalledTimes(1);
    expect(senders.send.mock.calls[0]?.[0]).toMatchObject({
      messageIdHeader: 'p@x',
      subject: '[PATCH] net: fix leak',
      seriesPatches: [],
      matchedFilters: [],
    });

    const stored = await backend.cards.findByHeader('p@x');
    expect(stored).toMatchObject({
      platformMessageId: 'msg-1',
      platformChannelId: 'chan-1',
      expiresAt: T0 + TTL_MS,
      hasThread: false,
    });
  });

  it('never creates a second card for the same message', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] net: fix leak' });

    const first = await service.handlePatch(patch);
    const second = await service.handlePatch(patch);

    expect(first.status).toBe('created');
    expect(second.status).toBe('existing');
    expect(senders.send).toHaveBeenCalledTimes(1);
  });

  it('serializes concurrent arrivals of the same patch', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] net: fix leak' });

    const outcomes = await Promise.all([service.createCard(patch, []), service.createCard(patch, [])]);

    expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['created', 'existing']);
    expect(senders.send).toHaveBeenCalledTimes(1);
  });

  it('persists nothing when the send fails', async () => {
    senders.send.mockRejectedValueOnce(new Error('Discord API /channels/chan-1/messages failed (500): oops'));
    const patch = message({ id: 'p@x', subject: '[PATCH] net: fix leak' });

    expect(await service.handlePatch(patch)).toEqual({ status: 'skipped', reason: 'send-failed' });
    expect(await backend.cards.findByHeader('p@x')).toBeUndefined();
  });

  it('persists nothing when the platform returns no identity', async () => {
    senders.send.mockResolvedValueOnce(null);
    const patch = message({ id: 'p@x', subject: '[PATCH] net: fix leak' });

    expect(await service.handlePatch(patch)).toEqual({ status: 'skipped', reason: 'send-failed' });
    expect(await backend.cards.findByHeader('p@x')).toBeUndefined();
  });

  it('turns a lost uniqueness race into an update of the stored card', async () => {
    await backend.cards.create({
      messageIdHeader: 'p@x',
      subsystem: 'netdev',
      subject: 'stale subject',
      author: 'Jane Doe',
      url: null,
      platformMessageId: 'other-writer',
      platformChannelId: 'chan-9',
      expiresAt: T0,
      isSeriesPatch: false,
      seriesMessageId: null,
      patchVersion: null,
      patchIndex: null,
      patchTotal: null,
    });
    // The check-then-create window: this writer does not see the other's row.
    const blind: PatchCardRepository = { ...backend.cards, findByHeader: async () => undefined };
    const racing = serviceWith(blind);

    const outcome = await racing.handlePatch(message({ id: 'p@x', subject: '[PATCH v2] net: fix leak' }));

    expect(outcome.status).toBe('existing');
    const stored = await backend.cards.findByHeader('p@x');
    expect(stored?.platformMessageId).toBe('other-writer');
    expect(stored?.subject).toBe('[PATCH v2] net: fix leak');
    expect(stored?.patchVersion).toBe(2);
    expect(stored?.expiresAt).toBe(T0 + TTL_MS);
  });

  it('keeps series sub-patches cardless until the cover letter arrives', async () => {
    const p1 = message({ id: 'p1@x', subject: '[PATCH 1/2] net: one', inReplyTo: '<c@x>', at: T0 + MINUTE });
    await backend.messages.create(p1);

    expect(await service.handlePatch(p1)).toEqual({ status: 'skipped', reason: 'series-sub-patch' });
    expect(await backend.cards.findByHeader('p1@x')).toBeUndefined();
    expect(senders.send).not.toHaveBeenCalled();

    const cover = message({ id: 'c@x', subject: '[PATCH 0/2] net: series', at: T0 + 2 * MINUTE });
    await backend.messages.create(cover);
    const outcome = await service.handlePatch(cover);

    expect(outcome.status).toBe('created');
    expect(senders.send).toHaveBeenCalledTimes(1);
    expect(senders.send.mock.calls[0]?.[0].seriesPatches.map((patch) => patch.messageIdHeader)).toEqual(['p1@x']);
    expect((await backend.cards.findByHeader('c@x'))?.seriesMessageId).toBe('c@x');
  });

  it('skips patches rejected by exclusive filters', async () => {
    await filters.save({ name: 'maintainer', conditions: { author: 'Xavier' }, exclusive: true });

    const outcome = await service.handlePatch(message({ id: 'p@x', subject: '[PATCH] x', author: 'Someone' }));
    expect(outcome).toEqual({ status: 'skipped', reason: 'filtered' });
    expect(senders.send).not.toHaveBeenCalled();
  });

  it('reports matched filters on created cards', async () => {
    await filters.save({ name: 'bpf', conditions: { subject_keywords: ['bpf'] } });

    const outcome = await service.handlePatch(message({ id: 'p@x', subject: '[PATCH] bpf: verifier' }));
    expect(outcome.status === 'created' ? outcome.matched : null).toEqual(['bpf']);
    expect(senders.send.mock.calls[0]?.[0].matchedFilters).toEqual(['bpf']);
  });

  it('expires stale cards that never gained a thread', async () => {
    let clock = T0;
    const expiring = createPatchCardService({
      messages: backend.messages,
      cards: backend.cards,
      filters,
      sender: senders.card,
      cardTtlMs: MINUTE,
      now: () => clock,
    });
    await expiring.handlePatch(message({ id: 'p@x', subject: '[PATCH] x' }));

    expect(await expiring.expireStaleCards()).toBe(0);
    clock = T0 + 2 * MINUTE;
    expect(await expiring.expireStaleCards()).toBe(1);
    expect(await backend.cards.findByHeader('p@x')).toBeUndefined();
  });

  describe('reply perspective', () => {
    const target = message({ id: 'p@x', subject: '[PATCH] bpf: verifier', at: T0 });
    const reply = message({
      id: 'r@x',
      subject: 'Re: [PATCH] bpf: verifier',
      inReplyTo: '<p@x>',
      author: 'Reviewer One',
      at: T0 + MINUTE,
    });

    it('does nothing without a matching filter', async () => {
      expect(await service.handleReplyPerspective(reply, target)).toEqual({ status: 'skipped', reason: 'no-filter-match' });
      expect(senders.send).not.toHaveBeenCalled();
      expect(senders.sendReplyNotification).not.toHaveBeenCalled();
    });

    it('creates the missing card and sends a reply notice', async () => {
      await filters.save({ name: 'reviewers', conditions: { author: 'Reviewer' } });

      const outcome = await service.handleReplyPerspective(reply, target);

      expect(outcome).toMatchObject({ status: 'notified', matched: ['reviewers'], created: true, delivered: true });
      expect(senders.send).toHaveBeenCalledTimes(1);
      expect(senders.sendReplyNotification).toHaveBeenCalledWith({
        replyAuthor: 'Reviewer One',
        replySubject: 'Re: [PATCH] bpf: verifier',
        replyUrl: 'https://lore.example.org/netdev/r@x/',
        replySubsystem: 'netdev',
        replyDate: T0 + MINUTE,
        rootSubject: '[PATCH] bpf: verifier',
        rootUrl: 'https://lore.example.org/netdev/p@x/',
        cardChannelId: 'chan-1',
        cardMessageId: 'msg-1',
      });
    });

    it('leaves threaded cards to the thread lifecycle', async () => {
      await filters.save({ name: 'reviewers', conditions: { author: 'Reviewer' } });
      await service.handlePatch(target);
      await backend.cards.markHasThread('p@x');

      expect(await service.handleReplyPerspective(reply, target)).toEqual({ status: 'skipped', reason: 'threaded' });
    });

    it('never creates a card for a series sub-patch', async () => {
      await filters.save({ name: 'reviewers', conditions: { author: 'Reviewer' } });
      const p2 = message({ id: 'p2@x', subject: '[PATCH 2/2] two', inReplyTo: '<c@x>' });

      expect(await service.handleReplyPerspective(reply, p2)).toEqual({ status: 'skipped', reason: 'series-sub-patch' });
      expect(senders.send).not.toHaveBeenCalled();
    });
  });
});
