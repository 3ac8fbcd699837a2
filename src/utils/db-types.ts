/**
 * Backend-agnostic entity types shared by the SQLite and Postgres backends
 * and by the correlation engine in `src/core`.
 *
 * Timestamps are epoch milliseconds.
 */

/** One ingested mailing-list entry, keyed by its Message-ID header. */
export interface FeedMessage {
  subsystem: string;
  /** Bracket-free Message-ID; the dedup key. */
  messageIdHeader: string;
  /** Optional secondary id assigned by the archive. */
  messageId: string | null;
  subject: string;
  author: string;
  authorEmail: string | null;
  /** Raw In-Reply-To value; may carry brackets and several ids. */
  inReplyToHeader: string | null;
  content: string | null;
  url: string | null;
  receivedAt: number;
  isPatch: boolean;
  isReply: boolean;
  isSeriesPatch: boolean;
  isCoverLetter: boolean;
  patchVersion: number | null;
  patchIndex: number | null;
  patchTotal: number | null;
  seriesMessageId: string | null;
  /** Set once a reply's correlation finished; null until then. */
  processedAt: number | null;
}

/** Classification columns that a concurrent re-insert may backfill. */
export type FeedMessageClassification = Pick<
  FeedMessage,
  | 'isPatch'
  | 'isReply'
  | 'isSeriesPatch'
  | 'isCoverLetter'
  | 'patchVersion'
  | 'patchIndex'
  | 'patchTotal'
  | 'seriesMessageId'
>;

/** The visible, platform-rendered unit for one patch or one series. */
export interface PatchCard {
  messageIdHeader: string;
  subsystem: string;
  subject: string;
  author: string;
  url: string | null;
  platformMessageId: string | null;
  platformChannelId: string | null;
  expiresAt: number;
  isSeriesPatch: boolean;
  seriesMessageId: string | null;
  patchVersion: number | null;
  patchIndex: number | null;
  patchTotal: number | null;
  hasThread: boolean;
  createdAt: number;
  updatedAt: number;
}

export type NewPatchCard = Omit<PatchCard, 'hasThread' | 'createdAt' | 'updatedAt'>;

/** Business fields refreshed when a card insert loses the uniqueness race. */
export type PatchCardDetails = Pick<
  PatchCard,
  | 'subject'
  | 'author'
  | 'url'
  | 'expiresAt'
  | 'isSeriesPatch'
  | 'seriesMessageId'
  | 'patchVersion'
  | 'patchIndex'
  | 'patchTotal'
>;

/** Patch index (0 = cover letter / overview) → rendered platform message id. */
export type SubPatchMessageMap = Record<number, string>;

export interface PatchThread {
  cardMessageIdHeader: string;
  threadId: string;
  threadName: string;
  isActive: boolean;
  overviewMessageId: string | null;
  subPatchMessages: SubPatchMessageMap;
  createdAt: number;
  archivedAt: number | null;
}

export type NewPatchThread = Omit<PatchThread, 'isActive' | 'createdAt' | 'archivedAt'>;

/**
 * Conditions are ANDed across the keys present. A string wrapped in slashes
 * (`/^net:/`) is a case-insensitive regex; anything else is a
 * case-insensitive substring. Arrays match when any element matches.
 */
export interface FilterConditions {
  author?: string | string[];
  author_email?: string | string[];
  subject_keywords?: string[];
  subject_regex?: string;
}

export interface FilterRule {
  id: number;
  name: string;
  enabled: boolean;
  exclusive: boolean;
  conditions: FilterConditions;
  description: string | null;
  createdBy: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface FilterRuleInput {
  name: string;
  conditions: FilterConditions;
  exclusive?: boolean;
  enabled?: boolean;
  description?: string | null;
  createdBy?: string | null;
}

/**
 * Outcome of an insert keyed on a unique column. `exists` carries the row
 * that won the race, after any backfill the repository applies.
 */
export type CreateResult<T> =
  | { status: 'created'; record: T }
  | { status: 'exists'; record: T };
