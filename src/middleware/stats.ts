/**
 * Daily statistics tracker: in-memory counters that reset at UTC midnight.
 *
 * Tracks per-subsystem pipeline outcomes. Read by the health endpoint.
 */

import { logger } from './logger.js';

export const STAT_COUNTERS = [
  'messagesProcessed',
  'cardsCreated',
  'threadsCreated',
  'threadUpdates',
  'replyNotifications',
  'filteredOut',
  'errors',
] as const;

export type StatCounter = (typeof STAT_COUNTERS)[number];

export type SubsystemStats = Record<StatCounter, number>;

export interface DailyStats {
  /** ISO date string (YYYY-MM-DD, UTC) for this stats period */
  date: string;
  /** Per-subsystem counters keyed by mailing-list name */
  subsystems: Map<string, SubsystemStats>;
}

let current: DailyStats = freshStats();

function freshStats(): DailyStats {
  return {
    date: todayISO(),
    subsystems: new Map(),
  };
}

function todayISO(): string {
  return new Date().toISOString().slice(0, 10);
}

function emptyCounters(): SubsystemStats {
  return {
    messagesProcessed: 0,
    cardsCreated: 0,
    threadsCreated: 0,
    threadUpdates: 0,
    replyNotifications: 0,
    filteredOut: 0,
    errors: 0,
  };
}

function getSubsystemStats(subsystem: string): SubsystemStats {
  let stats = current.subsystems.get(subsystem);
  if (!stats) {
    stats = emptyCounters();
    current.subsystems.set(subsystem, stats);
  }
  return stats;
}

/** Roll over to a new day if needed. Returns the old stats if rolled. */
function maybeRollover(): DailyStats | null {
  const today = todayISO();
  if (current.date !== today) {
    const old = current;
    current = freshStats();
    logger.info({ oldDate: old.date, newDate: today }, 'Daily stats rolled over');
    return old;
  }
  return null;
}

// ── Public recording functions ──────────────────────────────────────

export function recordEvent(subsystem: string, counter: StatCounter, amount: number = 1): void {
  maybeRollover();
  getSubsystemStats(subsystem)[counter] += amount;
}

// ── Public query functions ──────────────────────────────────────────

/** Get current day's stats (triggers rollover if needed) */
export function getCurrentStats(): DailyStats {
  maybeRollover();
  return current;
}

/** Sum every subsystem's counters */
export function totalCounters(stats: DailyStats = getCurrentStats()): SubsystemStats {
  const totals = emptyCounters();
  for (const counters of stats.subsystems.values()) {
    for (const key of STAT_COUNTERS) {
      totals[key] += counters[key];
    }
  }
  return totals;
}

/** Snapshot and reset */
export function snapshotAndReset(): DailyStats {
  const snapshot = current;
  current = freshStats();
  return snapshot;
}
