/**
 * Conversation tree for a patch or series: gathers every stored reply and
 * arranges the messages parent → children for rendering.
 */

import { primaryReference, referencesMessage } from './message-id.js';
import type { FeedMessageRepository } from '../utils/db-backend.js';
import type { FeedMessage } from '../utils/db-types.js';

/** Cap on breadth-first expansion steps per collected root. */
export const MAX_REPLY_EXPANSION_ITERATIONS = 20;
export const REPLY_LOOKUP_LIMIT = 100;

export type ThreadNodeKind = 'cover_letter' | 'patch' | 'sub_patch' | 'reply';

export interface ThreadNode {
  message: FeedMessage;
  kind: ThreadNodeKind;
  children: ThreadNode[];
}

export interface ReplyHierarchyEntry {
  message: FeedMessage;
  /** Null when the parent is the tree root or unknown. */
  parentId: string | null;
  children: string[];
}

/** Derived view over the non-root messages of a conversation; never stored. */
export interface ReplyHierarchy {
  entries: Map<string, ReplyHierarchyEntry>;
  /** Messages hanging directly off the root, oldest first. */
  roots: string[];
}

export interface FlatThreadEntry {
  message: FeedMessage;
  kind: ThreadNodeKind;
  depth: number;
}

/**
 * Replies to `rootHeader`, direct or transitive, in discovery order.
 * Substring matches from storage are narrowed to real references.
 */
export async function collectReplies(
  messages: Pick<FeedMessageRepository, 'findRepliesTo'>,
  rootHeader: string,
  maxIterations: number = MAX_REPLY_EXPANSION_ITERATIONS,
): Promise<FeedMessage[]> {
  const seen = new Set<string>([rootHeader]);
  const queue: string[] = [rootHeader];
  const replies: FeedMessage[] = [];
  let iterations = 0;

  while (queue.length > 0 && iterations < maxIterations) {
    const current = queue.shift();
    if (current === undefined) break;
    iterations++;

    const found = await messages.findRepliesTo(current, REPLY_LOOKUP_LIMIT);
    for (const reply of found) {
      if (seen.has(reply.messageIdHeader)) continue;
      if (!referencesMessage(reply.inReplyToHeader, current)) continue;
      seen.add(reply.messageIdHeader);
      replies.push(reply);
      queue.push(reply.messageIdHeader);
    }
  }

  return replies;
}

/** Root, the given sub-patches, and every reply to any of them, deduplicated. */
export async function collectConversation(
  messages: Pick<FeedMessageRepository, 'findRepliesTo'>,
  root: FeedMessage,
  subPatches: readonly FeedMessage[] = [],
): Promise<FeedMessage[]> {
  const collected = new Map<string, FeedMessage>();
  collected.set(root.messageIdHeader, root);
  for (const patch of subPatches) collected.set(patch.messageIdHeader, patch);

  for (const anchor of [root, ...subPatches]) {
    for (const reply of await collectReplies(messages, anchor.messageIdHeader)) {
      if (!collected.has(reply.messageIdHeader)) collected.set(reply.messageIdHeader, reply);
    }
  }

  return Array.from(collected.values());
}

function byReceipt(a: FeedMessage, b: FeedMessage): number {
  return a.receivedAt - b.receivedAt || a.messageIdHeader.localeCompare(b.messageIdHeader);
}

/**
 * Parent links for everything except the root. Sub-patches and messages
 * whose parent is not in the set hang off the root; cycles among replies
 * are cut at the member where the walk comes back around.
 */
export function buildReplyHierarchy(
  rootHeader: string,
  messages: readonly FeedMessage[],
  subPatchHeaders: ReadonlySet<string> = new Set(),
): ReplyHierarchy {
  const entries = new Map<string, ReplyHierarchyEntry>();
  for (const message of messages) {
    if (message.messageIdHeader === rootHeader || entries.has(message.messageIdHeader)) continue;
    entries.set(message.messageIdHeader, { message, parentId: null, children: [] });
  }

  for (const [id, entry] of entries) {
    if (subPatchHeaders.has(id)) continue;
    const parentId = primaryReference(entry.message.inReplyToHeader);
    if (parentId !== null && parentId !== id && entries.has(parentId)) {
      entry.parentId = parentId;
    }
  }

  for (const [id, entry] of entries) {
    const path = new Set<string>([id]);
    let cursor = entry.parentId;
    while (cursor !== null) {
      if (path.has(cursor)) {
        entry.parentId = null;
        break;
      }
      path.add(cursor);
      cursor = entries.get(cursor)?.parentId ?? null;
    }
  }

  const roots: FeedMessage[] = [];
  const children = new Map<string, FeedMessage[]>();
  for (const entry of entries.values()) {
    if (entry.parentId === null) {
      roots.push(entry.message);
    } else {
      const siblings = children.get(entry.parentId) ?? [];
      siblings.push(entry.message);
      children.set(entry.parentId, siblings);
    }
  }

  for (const [parentId, list] of children) {
    const parent = entries.get(parentId);
    if (parent) parent.children = list.sort(byReceipt).map((message) => message.messageIdHeader);
  }

  return {
    entries,
    roots: roots.sort(byReceipt).map((message) => message.messageIdHeader),
  };
}

function nodeKind(message: FeedMessage, isRoot: boolean, subPatchHeaders: ReadonlySet<string>): ThreadNodeKind {
  if (isRoot) return message.isCoverLetter ? 'cover_letter' : 'patch';
  return subPatchHeaders.has(message.messageIdHeader) ? 'sub_patch' : 'reply';
}

/** Tree rooted at `root`; siblings are ordered by receipt time. */
export function buildThreadTree(
  root: FeedMessage,
  messages: readonly FeedMessage[],
  subPatchHeaders: ReadonlySet<string> = new Set(),
): ThreadNode {
  const hierarchy = buildReplyHierarchy(root.messageIdHeader, messages, subPatchHeaders);

  const toNode = (id: string): ThreadNode | null => {
    const entry = hierarchy.entries.get(id);
    if (!entry) return null;
    return {
      message: entry.message,
      kind: nodeKind(entry.message, false, subPatchHeaders),
      children: entry.children.map(toNode).filter((node): node is ThreadNode => node !== null),
    };
  };

  return {
    message: root,
    kind: nodeKind(root, true, subPatchHeaders),
    children: hierarchy.roots.map(toNode).filter((node): node is ThreadNode => node !== null),
  };
}

/** Depth-first, pre-order walk; the root has depth 0. */
export function flattenThreadTree(root: ThreadNode): FlatThreadEntry[] {
  const entries: FlatThreadEntry[] = [];
  const visit = (node: ThreadNode, depth: number): void => {
    entries.push({ message: node.message, kind: node.kind, depth });
    for (const child of node.children) visit(child, depth + 1);
  };
  visit(root, 0);
  return entries;
}

/** Replies in the tree, excluding the root and sub-patches. */
export function countReplies(root: ThreadNode): number {
  return flattenThreadTree(root).filter((entry) => entry.kind === 'reply').length;
}
