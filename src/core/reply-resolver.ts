import { logger } from '../middleware/logger.js';
import { primaryReference } from './message-id.js';
import type { FeedMessage } from '../utils/db-types.js';

/** Replies nested deeper than this are left uncorrelated. */
export const MAX_REPLY_CHAIN_DEPTH = 30;

export interface MessageLookup {
  findByHeader(messageIdHeader: string): Promise<FeedMessage | undefined>;
}

/** A patch or cover letter as posted, not a reply to one. */
export function isRootPatch(message: FeedMessage): boolean {
  return message.isPatch && !message.isReply;
}

/** Patch i/n (i ≥ 1) of a multi-patch series. */
export function isSeriesSubPatch(message: FeedMessage): boolean {
  return isRootPatch(message)
    && message.isSeriesPatch
    && !message.isCoverLetter
    && (message.patchIndex ?? 1) > 0;
}

/**
 * Walk up the In-Reply-To chain starting at `header`, handing each stored
 * ancestor to `visit` until it returns a value. Stops on a missing record,
 * a repeated id or after `maxDepth` lookups.
 */
export async function walkReplyChain<T>(
  lookup: MessageLookup,
  header: string | null,
  visit: (message: FeedMessage, depth: number) => T | undefined,
  maxDepth: number = MAX_REPLY_CHAIN_DEPTH,
): Promise<T | undefined> {
  const visited = new Set<string>();
  let current = primaryReference(header);
  let depth = 0;

  while (current !== null && depth < maxDepth) {
    if (visited.has(current)) {
      logger.debug({ messageId: current }, 'Reply chain cycle detected');
      return undefined;
    }
    visited.add(current);

    const message = await lookup.findByHeader(current);
    if (!message) return undefined;

    const result = visit(message, depth);
    if (result !== undefined) return result;

    current = primaryReference(message.inReplyToHeader);
    depth++;
  }

  if (current !== null) {
    logger.debug({ header, maxDepth }, 'Reply chain exceeded depth limit');
  }
  return undefined;
}

/** Sub-patches stand in for their series: prefer the cover letter when it is stored. */
async function redirectToSeriesRoot(lookup: MessageLookup, patch: FeedMessage): Promise<FeedMessage> {
  const seriesId = patch.seriesMessageId;
  if (!isSeriesSubPatch(patch) || !seriesId || seriesId === patch.messageIdHeader) return patch;

  const root = await lookup.findByHeader(seriesId);
  return root && isRootPatch(root) ? root : patch;
}

/**
 * Find the patch (or series cover letter) a reply ultimately answers.
 * Returns null when nothing correlates.
 */
export async function resolveReplyTarget(
  lookup: MessageLookup,
  reply: FeedMessage,
  maxDepth: number = MAX_REPLY_CHAIN_DEPTH,
): Promise<FeedMessage | null> {
  const ancestor = await walkReplyChain(
    lookup,
    reply.inReplyToHeader,
    (message) => (isRootPatch(message) ? message : undefined),
    maxDepth,
  );
  if (ancestor) return redirectToSeriesRoot(lookup, ancestor);

  let seriesId = reply.seriesMessageId;
  if (!seriesId) {
    const parentId = primaryReference(reply.inReplyToHeader);
    const parent = parentId ? await lookup.findByHeader(parentId) : undefined;
    seriesId = parent?.seriesMessageId ?? null;
  }
  if (!seriesId) return null;

  const root = await lookup.findByHeader(seriesId);
  return root && isRootPatch(root) ? root : null;
}
