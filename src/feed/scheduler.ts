/**
 * Polling loop: cycle, expiry sweep, sleep. Stopping is cooperative; the
 * in-flight cycle finishes the message it is on and then returns.
 */

import { logger } from '../middleware/logger.js';
import { markCycleCompleted, markCycleFailed, markCycleStarted, setMonitorInterval } from '../middleware/health.js';
import type { FeedMonitor, MonitoringResult } from './monitor.js';
import type { PatchCardService } from '../core/patch-card-lifecycle.js';

export const DEFAULT_ERROR_BACKOFF_MS = 60_000;

export interface MonitorSchedulerDeps {
  monitor: FeedMonitor;
  cards: Pick<PatchCardService, 'expireStaleCards'>;
  intervalMs: number;
  errorBackoffMs?: number;
}

export interface MonitorScheduler {
  start(): void;
  /** Resolves once the loop has exited. */
  stop(): Promise<void>;
  runOnce(): Promise<MonitoringResult>;
  isRunning(): boolean;
  lastResult(): MonitoringResult | null;
}

export function createMonitorScheduler(deps: MonitorSchedulerDeps): MonitorScheduler {
  const errorBackoffMs = deps.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;

  let running = false;
  let cycle = 0;
  let last: MonitoringResult | null = null;
  let loop: Promise<void> | null = null;
  let wake: (() => void) | null = null;
  let timer: ReturnType<typeof setTimeout> | null = null;

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      wake = resolve;
      timer = setTimeout(resolve, ms);
    });
  }

  function interruptSleep(): void {
    if (timer) clearTimeout(timer);
    timer = null;
    wake?.();
    wake = null;
  }

  async function runOnce(): Promise<MonitoringResult> {
    cycle++;
    markCycleStarted();

    const result = await deps.monitor.runCycle({ shouldStop: () => !running && loop !== null, cycle });
    await deps.cards.expireStaleCards();

    last = result;
    markCycleCompleted({
      subsystems: result.subsystems.length,
      processed: result.processed,
      errors: result.errors,
      durationMs: result.durationMs,
      failedSubsystems: result.subsystems.filter((s) => s.error !== null).map((s) => s.subsystem),
    });
    return result;
  }

  async function runLoop(): Promise<void> {
    while (running) {
      let delay = deps.intervalMs;
      try {
        await runOnce();
      } catch (err) {
        markCycleFailed(err);
        logger.error({ err, cycle, backoffMs: errorBackoffMs }, 'Monitor cycle failed; backing off');
        delay = errorBackoffMs;
      }

      if (!running) break;
      await sleep(delay);
    }
    logger.info({ cycles: cycle }, 'Monitor scheduler stopped');
  }

  return {
    start(): void {
      if (running) return;
      running = true;
      setMonitorInterval(deps.intervalMs);
      logger.info({ intervalMs: deps.intervalMs }, 'Monitor scheduler started');
      loop = runLoop();
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;
      interruptSleep();
      const pending = loop;
      if (pending) await pending;
      loop = null;
    },

    runOnce,

    isRunning: () => running,

    lastResult: () => last,
  };
}
