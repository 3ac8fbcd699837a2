import { describe, it, expect } from 'vitest';
import {
  MAX_REPLY_CHAIN_DEPTH,
  isSeriesSubPatch,
  resolveReplyTarget,
  walkReplyChain,
  type MessageLookup,
} from '../src/core/reply-resolver.js';
import { message, MINUTE, T0 } from './fixtures.js';
import type { FeedMessage } from '../src/utils/db-types.js';

function lookupOf(messages: FeedMessage[]): MessageLookup & { calls: number } {
  const byId = new Map(messages.map((msg) => [msg.messageIdHeader, msg]));
  const lookup = {
    calls: 0,
    async findByHeader(id: string): Promise<FeedMessage | undefined> {
      lookup.calls++;
      return byId.get(id);
    },
  };
  return lookup;
}

describe('resolveReplyTarget', () => {
  it('follows only the first id of a multi-id In-Reply-To', async () => {
    const a = message({ id: 'A@x', subject: '[PATCH] alpha' });
    const b = message({ id: 'B@x', subject: '[PATCH] beta' });
    const reply = message({ id: 'r@x', subject: 'Re: [PATCH] beta', inReplyTo: '<A@x> <B@x>' });

    const target = await resolveReplyTarget(lookupOf([a, b]), reply);
    expect(target?.messageIdHeader).toBe('A@x');
  });

  it('climbs through intermediate replies to the patch', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] fix' });
    const chain: FeedMessage[] = [patch];
    let parent = 'p@x';
    for (let i = 1; i <= 5; i++) {
      chain.push(message({ id: `r${i}@x`, subject: 'Re: [PATCH] fix', inReplyTo: `<${parent}>`, at: T0 + i * MINUTE }));
      parent = `r${i}@x`;
    }
    const reply = message({ id: 'r6@x', subject: 'Re: [PATCH] fix', inReplyTo: '<r5@x>' });

    const target = await resolveReplyTarget(lookupOf(chain), reply);
    expect(target?.messageIdHeader).toBe('p@x');
  });

  it('gives up on a chain deeper than the limit', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] fix' });
    const chain: FeedMessage[] = [patch];
    let parent = 'p@x';
    for (let i = 1; i <= 40; i++) {
      chain.push(message({ id: `r${i}@x`, subject: 'Re: [PATCH] fix', inReplyTo: `<${parent}>` }));
      parent = `r${i}@x`;
    }
    const reply = message({ id: 'r41@x', subject: 'Re: [PATCH] fix', inReplyTo: '<r40@x>' });
    const lookup = lookupOf(chain);

    await expect(resolveReplyTarget(lookup, reply)).resolves.toBeNull();
    // depth-limited walk plus the single parent lookup of the fallback
    expect(lookup.calls).toBe(MAX_REPLY_CHAIN_DEPTH + 1);
  });

  it('stops on a reference cycle', async () => {
    const r1 = message({ id: 'r1@x', subject: 'Re: loop', inReplyTo: '<r2@x>' });
    const r2 = message({ id: 'r2@x', subject: 'Re: loop', inReplyTo: '<r1@x>' });
    const reply = message({ id: 'r3@x', subject: 'Re: loop', inReplyTo: '<r1@x>' });

    await expect(resolveReplyTarget(lookupOf([r1, r2]), reply)).resolves.toBeNull();
  });

  it('returns null when the parent was never stored', async () => {
    const reply = message({ id: 'r@x', subject: 'Re: [PATCH] gone', inReplyTo: '<missing@x>' });
    await expect(resolveReplyTarget(lookupOf([]), reply)).resolves.toBeNull();
  });

  it('redirects a reply on a sub-patch to the stored cover letter', async () => {
    const cover = message({ id: 'c@x', subject: '[PATCH 0/2] series' });
    const p1 = message({ id: 'p1@x', subject: '[PATCH 1/2] one', inReplyTo: '<c@x>' });
    const reply = message({ id: 'r@x', subject: 'Re: [PATCH 1/2] one', inReplyTo: '<p1@x>' });

    const target = await resolveReplyTarget(lookupOf([cover, p1]), reply);
    expect(target?.messageIdHeader).toBe('c@x');
  });

  it('keeps the sub-patch when its cover letter is not stored', async () => {
    const p2 = message({ id: 'p2@x', subject: '[PATCH 2/2] two', inReplyTo: '<c@x>' });
    const reply = message({ id: 'r@x', subject: 'Re: [PATCH 2/2] two', inReplyTo: '<p2@x>' });

    const target = await resolveReplyTarget(lookupOf([p2]), reply);
    expect(target?.messageIdHeader).toBe('p2@x');
  });

  it('falls back to the series id when the chain breaks', async () => {
    const cover = message({ id: 'c@x', subject: '[PATCH 0/2] series' });
    const reply = { ...message({ id: 'r@x', subject: 'Re: series', inReplyTo: '<missing@x>' }), seriesMessageId: 'c@x' };

    const target = await resolveReplyTarget(lookupOf([cover]), reply);
    expect(target?.messageIdHeader).toBe('c@x');
  });
});

describe('walkReplyChain', () => {
  it('hands each ancestor and its depth to the visitor', async () => {
    const patch = message({ id: 'p@x', subject: '[PATCH] fix' });
    const r1 = message({ id: 'r1@x', subject: 'Re: fix', inReplyTo: '<p@x>' });
    const seen: Array<[string, number]> = [];

    const result = await walkReplyChain(lookupOf([patch, r1]), '<r1@x>', (msg, depth) => {
      seen.push([msg.messageIdHeader, depth]);
      return undefined;
    });

    expect(result).toBeUndefined();
    expect(seen).toEqual([['r1@x', 0], ['p@x', 1]]);
  });
});

describe('isSeriesSubPatch', () => {
  it('separates sub-patches from cover letters, single patches and replies', () => {
    expect(isSeriesSubPatch(message({ id: 'p1@x', subject: '[PATCH 1/2] one' }))).toBe(true);
    expect(isSeriesSubPatch(message({ id: 'c@x', subject: '[PATCH 0/2] cover' }))).toBe(false);
    expect(isSeriesSubPatch(message({ id: 's@x', subject: '[PATCH] single' }))).toBe(false);
    expect(isSeriesSubPatch(message({ id: 'r@x', subject: 'Re: [PATCH 1/2] one' }))).toBe(false);
  });
});
