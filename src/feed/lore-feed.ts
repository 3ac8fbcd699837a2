/**
 * Atom feed source for public-inbox archives (lore.kernel.org and mirrors).
 *
 * Each list publishes its newest messages at `<base>/<list>/new.atom`; the
 * entry link ends in the Message-ID and `thr:in-reply-to` points at the
 * parent message.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { logger } from '../middleware/logger.js';
import { normalizeMessageId } from '../core/message-id.js';
import type { FeedEntry, FeedSource } from './feed-source.js';

const FETCH_TIMEOUT_MS = 30_000;
const MAX_CONTENT_LENGTH = 20_000;
const SUBSYSTEM_PATTERN = /^[A-Za-z0-9][\w.+-]*$/;

export interface LoreFeedOptions {
  baseUrl: string;
  now?: () => number;
}

const atomLinkSchema = z.object({ '@_href': z.string() }).passthrough();

const atomEntrySchema = z.object({
  title: z.unknown().optional(),
  updated: z.string().optional(),
  published: z.string().optional(),
  author: z.object({
    name: z.unknown().optional(),
    email: z.unknown().optional(),
  }).passthrough().optional(),
  link: z.array(atomLinkSchema).default([]),
  'thr:in-reply-to': z.unknown().optional(),
  content: z.unknown().optional(),
}).passthrough();

const atomFeedSchema = z.object({
  feed: z.object({
    entry: z.array(atomEntrySchema).default([]),
  }).passthrough(),
});

type AtomEntry = z.infer<typeof atomEntrySchema>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => name === 'entry' || name === 'link',
});

/** Concatenated character data of a parsed node, attributes excluded. */
export function collectText(node: unknown): string {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) return node.map(collectText).filter(Boolean).join('\n');
  if (typeof node === 'object' && node !== null) {
    return Object.entries(node)
      .filter(([key]) => !key.startsWith('@_'))
      .map(([, value]) => collectText(value))
      .filter(Boolean)
      .join('\n');
  }
  return '';
}

/** Message-ID carried in the last path segment of an archive URL. */
export function messageIdFromArchiveUrl(href: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(href).pathname;
  } catch {
    return null;
  }
  const segment = pathname.split('/').filter(Boolean).pop();
  if (!segment) return null;

  try {
    return normalizeMessageId(decodeURIComponent(segment)) || null;
  } catch {
    return normalizeMessageId(segment) || null;
  }
}

function inReplyToHref(value: unknown): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first !== 'object' || first === null || !('@_href' in first)) return null;
  const href = first['@_href'];
  return typeof href === 'string' ? href : null;
}

function toFeedEntry(entry: AtomEntry, fallbackTime: number): FeedEntry | null {
  const link = entry.link[0]?.['@_href'] ?? null;
  const messageIdHeader = link ? messageIdFromArchiveUrl(link) : null;
  if (!messageIdHeader) return null;

  const parentHref = inReplyToHref(entry['thr:in-reply-to']);
  const timestamp = Date.parse(entry.updated ?? entry.published ?? '');
  const content = collectText(entry.content).trim();

  return {
    messageIdHeader,
    subject: collectText(entry.title).replace(/\s+/g, ' ').trim(),
    author: collectText(entry.author?.name).trim() || 'unknown',
    authorEmail: collectText(entry.author?.email).trim() || null,
    inReplyToHeader: parentHref ? messageIdFromArchiveUrl(parentHref) : null,
    url: link,
    content: content ? content.slice(0, MAX_CONTENT_LENGTH) : null,
    receivedAt: Number.isFinite(timestamp) ? timestamp : fallbackTime,
  };
}

/** Parse an Atom document into feed entries; entries without an id are dropped. */
export function parseAtomFeed(xml: string, fallbackTime: number = Date.now()): FeedEntry[] {
  const parsed = atomFeedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new Error(`Unexpected Atom document: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }

  const entries: FeedEntry[] = [];
  for (const entry of parsed.data.feed.entry) {
    const mapped = toFeedEntry(entry, fallbackTime);
    if (mapped) entries.push(mapped);
  }
  return entries;
}

export function createLoreFeedSource(options: LoreFeedOptions): FeedSource {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const now = options.now ?? Date.now;

  return {
    async fetchEntries(subsystem: string, limit: number): Promise<FeedEntry[]> {
      if (!SUBSYSTEM_PATTERN.test(subsystem)) {
        throw new Error(`Invalid subsystem name: ${subsystem}`);
      }

      const url = `${baseUrl}/${encodeURIComponent(subsystem)}/new.atom`;
      const res = await fetch(url, {
        headers: { accept: 'application/atom+xml' },
        signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
      });

      if (!res.ok) {
        throw new Error(`Feed ${url} failed (${res.status})`);
      }

      const entries = parseAtomFeed(await res.text(), now());
      logger.debug({ subsystem, entries: entries.length }, 'Feed fetched');
      return entries.slice(0, limit);
    },
  };
}
