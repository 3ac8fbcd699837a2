import type {
  CreateResult,
  FeedMessage,
  FilterRule,
  FilterRuleInput,
  NewPatchCard,
  NewPatchThread,
  PatchCard,
  PatchCardDetails,
  PatchThread,
  SubPatchMessageMap,
} from './db-types.js';

export interface FeedMessageRepository {
  findByHeader(messageIdHeader: string): Promise<FeedMessage | undefined>;
  /** Insert, or backfill classification columns on an existing row. */
  create(message: FeedMessage): Promise<CreateResult<FeedMessage>>;
  /**
   * Messages whose In-Reply-To equals `messageIdHeader` or contains it,
   * oldest first.
   */
  findRepliesTo(messageIdHeader: string, limit?: number): Promise<FeedMessage[]>;
  findBySeriesId(seriesMessageId: string): Promise<FeedMessage[]>;
  /** Stamp `processed_at` once; false when already stamped or missing. */
  markProcessed(messageIdHeader: string, processedAt: number): Promise<boolean>;
}

export interface PatchCardRepository {
  findByHeader(messageIdHeader: string): Promise<PatchCard | undefined>;
  /** First-writer-wins: on conflict the existing row is returned untouched. */
  create(card: NewPatchCard, now?: number): Promise<CreateResult<PatchCard>>;
  updateDetails(messageIdHeader: string, details: PatchCardDetails, now?: number): Promise<PatchCard | undefined>;
  markHasThread(messageIdHeader: string, now?: number): Promise<boolean>;
  /** Oldest card of a series, optionally only one already posted to the platform. */
  findBySeriesId(seriesMessageId: string, requirePlatformIdentity: boolean): Promise<PatchCard | undefined>;
  deleteExpiredWithoutThread(now: number): Promise<number>;
}

export interface PatchThreadRepository {
  findByHeader(cardMessageIdHeader: string): Promise<PatchThread | undefined>;
  findByThreadId(threadId: string): Promise<PatchThread | undefined>;
  create(thread: NewPatchThread, now?: number): Promise<CreateResult<PatchThread>>;
  archive(threadId: string, archivedAt: number): Promise<boolean>;
  updateSubPatchMessageMap(threadId: string, messages: SubPatchMessageMap): Promise<boolean>;
  countActive(): Promise<number>;
}

export interface FilterRepository {
  listEnabled(): Promise<FilterRule[]>;
  listAll(): Promise<FilterRule[]>;
  findByName(name: string): Promise<FilterRule | undefined>;
  /** Create or replace the rule with the same name. */
  save(input: FilterRuleInput): Promise<FilterRule>;
  delete(name: string): Promise<boolean>;
  setEnabled(name: string, enabled: boolean): Promise<boolean>;
  getAutoWatchEnabled(): Promise<boolean>;
  setAutoWatchEnabled(enabled: boolean): Promise<void>;
}

export interface SubsystemRepository {
  listSubscribed(): Promise<string[]>;
  setSubscribed(name: string, subscribed: boolean): Promise<void>;
}

/**
 * A database backend implements the storage API the correlation engine
 * and the feed monitor depend on.
 */
export interface DbBackend {
  readonly dialect: 'sqlite' | 'postgres';
  messages: FeedMessageRepository;
  cards: PatchCardRepository;
  threads: PatchThreadRepository;
  filters: FilterRepository;
  subsystems: SubsystemRepository;
  close(): Promise<void>;
}
