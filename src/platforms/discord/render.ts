/**
 * Discord rendering for cards, thread overviews and notifications.
 * Pure string/embed builders; the adapter does the sending.
 */

import { bold, codeBlock, formatTimestamp, link, truncate } from '../../utils/formatting.js';
import type { RenderableCard, ReplyNotice, ThreadOverview } from '../../core/senders.js';
import type { ThreadNode } from '../../core/thread-tree.js';

export const MATCHED_CARD_COLOR = 0xffd700;
export const DEFAULT_CARD_COLOR = 0x5865f2;

export const MESSAGE_CONTENT_MAX = 2000;
const EMBED_DESCRIPTION_MAX = 4096;
const CARD_TITLE_SUBJECT_MAX = 200;
const SERIES_SUBJECT_MAX = 80;

export interface DiscordEmbed {
  title: string;
  url?: string;
  description: string;
  color: number;
  footer?: { text: string };
}

/** `Re: [PATCH v2 1/3]` out of a full subject; the whole subject when there is no tag. */
export function subjectTag(subject: string): string {
  const tagged = /^(.*?\])\s/.exec(subject);
  return tagged?.[1] ?? truncate(subject, SERIES_SUBJECT_MAX);
}

/** `Jane Doe (Company)` → `Jane Doe` */
export function displayAuthor(author: string): string {
  return author.split(' (')[0]?.trim() || 'Unknown';
}

function cardDescription(card: RenderableCard): string {
  const facts = [
    `Subsystem: ${card.subsystem}`,
    `Date: ${formatTimestamp(card.receivedAt)}`,
    `Author: ${card.author}`,
  ];
  if (card.isSeriesPatch && card.patchTotal) {
    facts.push(`Total Patches: ${card.patchTotal}`);
    facts.push(`Received: ${card.seriesPatches.length}/${card.patchTotal}`);
  }

  const lines = [codeBlock(facts.join('\n'), 'yaml')];

  if (card.seriesPatches.length > 0) {
    lines.push(bold('Series:'));
    for (const patch of card.seriesPatches) {
      lines.push(link(truncate(patch.subject, SERIES_SUBJECT_MAX), patch.url));
    }
  }

  lines.push('');
  lines.push('Create a dedicated thread to follow replies with:');
  lines.push(codeBlock(`/watch ${card.messageIdHeader}`, 'bash'));

  return lines.join('\n');
}

export function renderCardEmbed(card: RenderableCard): DiscordEmbed {
  const matched = card.matchedFilters.length > 0;
  const prefix = matched ? '⭐' : '📨';

  return {
    title: `${prefix} ${truncate(card.subject, CARD_TITLE_SUBJECT_MAX)}`,
    ...(card.url ? { url: card.url } : {}),
    description: truncate(cardDescription(card), EMBED_DESCRIPTION_MAX),
    color: matched ? MATCHED_CARD_COLOR : DEFAULT_CARD_COLOR,
    ...(matched ? { footer: { text: `Matched: ${card.matchedFilters.join(', ')}` } } : {}),
  };
}

function renderNode(node: ThreadNode, depth: number, lines: string[]): void {
  const { message } = node;
  const indent = '\t'.repeat(depth);
  lines.push(
    `${indent}\\\` ${formatTimestamp(message.receivedAt)} ${link(subjectTag(message.subject), message.url)} ${displayAuthor(message.author)}`,
  );
  for (const child of node.children) renderNode(child, depth + 1, lines);
}

/**
 * Conversation overview posted inside a thread. Children of the root are
 * listed depth-first, one tab per nesting level.
 */
export function renderThreadOverview(overview: ThreadOverview): string {
  const lines = [link(overview.card.subject, overview.card.url), ''];

  if (overview.tree.children.length === 0) {
    lines.push('_(No replies)_');
  } else {
    for (const child of overview.tree.children) renderNode(child, 0, lines);
  }

  return truncate(lines.join('\n'), MESSAGE_CONTENT_MAX);
}

export function renderReplyNotification(notice: ReplyNotice): string {
  const lines = [
    `💬 New reply on ${link(notice.rootSubject, notice.rootUrl)}`,
    `${bold(displayAuthor(notice.replyAuthor))}: ${link(notice.replySubject, notice.replyUrl)}`,
    `${notice.replySubsystem} · ${formatTimestamp(notice.replyDate)}`,
  ];
  return truncate(lines.join('\n'), MESSAGE_CONTENT_MAX);
}

export function renderThreadUpdateNotification(threadId: string): string {
  return `🔄 New activity in <#${threadId}>`;
}
