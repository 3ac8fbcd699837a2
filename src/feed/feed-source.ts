import type { FeedMessage } from '../utils/db-types.js';

/** One entry as a feed publishes it, before classification. */
export interface FeedEntry {
  messageIdHeader: string;
  subject: string;
  author: string;
  authorEmail: string | null;
  inReplyToHeader: string | null;
  url: string | null;
  content: string | null;
  receivedAt: number;
}

/** Pulls the newest entries of a mailing list. */
export interface FeedSource {
  fetchEntries(subsystem: string, limit: number): Promise<FeedEntry[]>;
}

/** Unclassified message record for an entry; classification is applied later. */
export function toFeedMessage(subsystem: string, entry: FeedEntry): FeedMessage {
  return {
    subsystem,
    messageIdHeader: entry.messageIdHeader,
    messageId: null,
    subject: entry.subject,
    author: entry.author,
    authorEmail: entry.authorEmail,
    inReplyToHeader: entry.inReplyToHeader,
    content: entry.content,
    url: entry.url,
    receivedAt: entry.receivedAt,
    isPatch: false,
    isReply: false,
    isSeriesPatch: false,
    isCoverLetter: false,
    patchVersion: null,
    patchIndex: null,
    patchTotal: null,
    seriesMessageId: null,
    processedAt: null,
  };
}
