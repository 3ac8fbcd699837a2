/**
 * One polling pass over every watched mailing list.
 *
 * Subsystems are isolated from each other: a failing feed is logged and
 * counted, and the pass moves on to the next list.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../middleware/logger.js';
import { recordEvent } from '../middleware/stats.js';
import { classifyMessage } from '../core/message-classifier.js';
import { toFeedMessage, type FeedSource } from './feed-source.js';
import type { FeedMessageProcessor, ProcessOutcome } from '../core/process-feed-message.js';
import type { SubsystemRepository } from '../utils/db-backend.js';

export interface SubsystemResult {
  subsystem: string;
  fetched: number;
  processed: number;
  skippedExisting: number;
  errors: number;
  error: string | null;
}

export interface MonitoringResult {
  runId: string;
  subsystems: SubsystemResult[];
  processed: number;
  skippedExisting: number;
  errors: number;
  durationMs: number;
  /** Stopped before every subsystem was visited. */
  interrupted: boolean;
}

export interface RunCycleOptions {
  /** Checked between subsystems and between messages. */
  shouldStop?: () => boolean;
  /** Cycle index for log bindings. */
  cycle?: number;
}

export interface FeedMonitorDeps {
  source: FeedSource;
  processor: FeedMessageProcessor;
  subsystems: SubsystemRepository;
  /** Lists from configuration, merged with stored subscriptions. */
  configuredSubsystems: readonly string[];
  maxEntries: number;
  now?: () => number;
}

export interface FeedMonitor {
  listSubsystems(): Promise<string[]>;
  runCycle(options?: RunCycleOptions): Promise<MonitoringResult>;
}

function isSkippedExisting(outcome: ProcessOutcome): boolean {
  if (outcome.kind === 'ignored') return outcome.reason === 'duplicate-reply';
  return outcome.kind === 'patch' && outcome.card.status === 'existing';
}

export function createFeedMonitor(deps: FeedMonitorDeps): FeedMonitor {
  const now = deps.now ?? Date.now;

  async function listSubsystems(): Promise<string[]> {
    const stored = await deps.subsystems.listSubscribed();
    const merged = new Set<string>();
    for (const name of [...deps.configuredSubsystems, ...stored]) {
      const trimmed = name.trim().toLowerCase();
      if (trimmed) merged.add(trimmed);
    }
    return [...merged].sort();
  }

  return {
    listSubsystems,

    async runCycle(options: RunCycleOptions = {}): Promise<MonitoringResult> {
      const shouldStop = options.shouldStop ?? (() => false);
      const runId = randomUUID();
      const log = logger.child({ runId, cycle: options.cycle ?? 0 });
      const startedAt = now();

      const results: SubsystemResult[] = [];
      let interrupted = false;
      const subsystems = await listSubsystems();
      log.debug({ subsystems }, 'Monitor cycle started');

      for (const subsystem of subsystems) {
        if (shouldStop()) {
          interrupted = true;
          break;
        }

        const result: SubsystemResult = {
          subsystem, fetched: 0, processed: 0, skippedExisting: 0, errors: 0, error: null,
        };
        results.push(result);

        try {
          const entries = await deps.source.fetchEntries(subsystem, deps.maxEntries);
          result.fetched = entries.length;

          // Oldest first, so parents are stored before their replies.
          const ordered = [...entries].sort((a, b) => a.receivedAt - b.receivedAt);
          for (const entry of ordered) {
            if (shouldStop()) {
              interrupted = true;
              break;
            }

            const classification = classifyMessage({
              subject: entry.subject,
              messageIdHeader: entry.messageIdHeader,
              inReplyToHeader: entry.inReplyToHeader,
            });
            const outcome = await deps.processor.processMessage(toFeedMessage(subsystem, entry), classification);

            if (outcome.kind === 'failed') result.errors++;
            else if (isSkippedExisting(outcome)) result.skippedExisting++;
            else result.processed++;
          }
        } catch (err) {
          result.errors++;
          result.error = err instanceof Error ? err.message : String(err);
          recordEvent(subsystem, 'errors');
          log.error({ err, subsystem }, 'Subsystem poll failed');
        }

        if (interrupted) break;
      }

      const summary: MonitoringResult = {
        runId,
        subsystems: results,
        processed: results.reduce((sum, r) => sum + r.processed, 0),
        skippedExisting: results.reduce((sum, r) => sum + r.skippedExisting, 0),
        errors: results.reduce((sum, r) => sum + r.errors, 0),
        durationMs: now() - startedAt,
        interrupted,
      };

      log.info({
        subsystems: results.length,
        processed: summary.processed,
        skippedExisting: summary.skippedExisting,
        errors: summary.errors,
        durationMs: summary.durationMs,
      }, 'Monitor cycle finished');

      return summary;
    },
  };
}
