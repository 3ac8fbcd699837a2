import type { SeriesPatchInfo } from './series-resolver.js';
import type { ThreadNode } from './thread-tree.js';
import type { SubPatchMessageMap } from '../utils/db-types.js';

/**
 * Outbound sender API.
 *
 * The card and thread lifecycles depend only on these interfaces; platform
 * adapters in `src/platforms` implement them.
 */

/** Everything a platform needs to draw a card. */
export interface RenderableCard {
  messageIdHeader: string;
  subsystem: string;
  subject: string;
  author: string;
  url: string | null;
  receivedAt: number;
  patchVersion: number | null;
  patchIndex: number | null;
  patchTotal: number | null;
  isSeriesPatch: boolean;
  isCoverLetter: boolean;
  seriesMessageId: string | null;
  seriesPatches: SeriesPatchInfo[];
  matchedFilters: string[];
}

export interface SentCard {
  messageId: string;
  channelId: string;
}

/** Payload for a standalone "new reply" message in the card channel. */
export interface ReplyNotice {
  replyAuthor: string;
  replySubject: string;
  replyUrl: string | null;
  replySubsystem: string;
  replyDate: number;
  rootSubject: string;
  rootUrl: string | null;
  cardChannelId: string | null;
  cardMessageId: string | null;
}

export interface CardSender {
  /** Post a card; null when the platform gave no message identity back. */
  send(card: RenderableCard): Promise<SentCard | null>;
  sendReplyNotification(notice: ReplyNotice): Promise<boolean>;
}

export interface ThreadOverview {
  card: RenderableCard;
  tree: ThreadNode;
  replyCount: number;
}

export interface CreatedThread {
  threadId: string;
  subPatchMessages: SubPatchMessageMap;
}

export interface ThreadSender {
  createThreadAndSendOverview(
    name: string,
    anchorMessageId: string,
    overview: ThreadOverview,
  ): Promise<CreatedThread | null>;
  updateThreadOverview(threadId: string, messageId: string, overview: ThreadOverview): Promise<boolean>;
  sendThreadUpdateNotification(channelId: string | null, threadId: string, messageId: string): Promise<boolean>;
}
