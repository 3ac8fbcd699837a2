import { createKeyedLock, type KeyedLock } from '../utils/keyed-lock.js';
import { createFilterService, type FilterService } from './filter-service.js';
import { createPatchCardService, type PatchCardService } from './patch-card-lifecycle.js';
import { createPatchThreadService, type PatchThreadService } from './thread-lifecycle.js';
import { createFeedMessageProcessor, type FeedMessageProcessor } from './process-feed-message.js';
import type { CardSender, ThreadSender } from './senders.js';
import type { DbBackend } from '../utils/db-backend.js';

export interface EngineOptions {
  cardSender: CardSender;
  threadSender: ThreadSender | null;
  cardTtlMs: number;
  now?: () => number;
}

/** The correlation engine wired over one storage backend. */
export interface Engine {
  filters: FilterService;
  cards: PatchCardService;
  threads: PatchThreadService;
  processor: FeedMessageProcessor;
  lock: KeyedLock;
}

export function createEngine(backend: DbBackend, options: EngineOptions): Engine {
  // One lock for both lifecycles, so card and thread creation serialize on the same keys.
  const lock = createKeyedLock();
  const filters = createFilterService(backend.filters);

  const cards = createPatchCardService({
    messages: backend.messages,
    cards: backend.cards,
    filters,
    sender: options.cardSender,
    cardTtlMs: options.cardTtlMs,
    lock,
    now: options.now,
  });

  const threads = createPatchThreadService({
    messages: backend.messages,
    cards: backend.cards,
    threads: backend.threads,
    sender: options.threadSender,
    lock,
    now: options.now,
  });

  const processor = createFeedMessageProcessor({
    messages: backend.messages,
    cards,
    threads,
    filters,
    now: options.now,
  });

  return { filters, cards, threads, processor, lock };
}
