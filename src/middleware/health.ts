/**
 * Health check HTTP endpoint + monitor cycle state tracker.
 *
 * Exposes a tiny HTTP server that returns JSON with:
 * - Uptime in seconds
 * - Last monitor cycle (start, finish, outcome)
 * - Today's pipeline counters
 * - Memory usage
 *
 * The monitor is considered stale when no cycle has completed for three
 * polling intervals.
 */

import { createServer, type Server } from 'http';
import { logger } from './logger.js';
import { getCurrentStats, totalCounters, type SubsystemStats } from './stats.js';

// ── Cycle state ─────────────────────────────────────────────────────

export interface CycleSummary {
  subsystems: number;
  processed: number;
  errors: number;
  durationMs: number;
  failedSubsystems: string[];
}

interface MonitorState {
  startedAt: number;
  intervalMs: number | null;
  lastCycleStartedAt: number | null;
  lastCycleCompletedAt: number | null;
  lastCycle: CycleSummary | null;
  lastError: string | null;
  consecutiveFailures: number;
  cycles: number;
}

const state: MonitorState = {
  startedAt: Date.now(),
  intervalMs: null,
  lastCycleStartedAt: null,
  lastCycleCompletedAt: null,
  lastCycle: null,
  lastError: null,
  consecutiveFailures: 0,
  cycles: 0,
};

const STALE_INTERVALS = 3;

/** Call once the scheduler knows its polling interval */
export function setMonitorInterval(intervalMs: number): void {
  state.intervalMs = intervalMs;
}

export function markCycleStarted(now: number = Date.now()): void {
  state.lastCycleStartedAt = now;
}

export function markCycleCompleted(summary: CycleSummary, now: number = Date.now()): void {
  state.lastCycleCompletedAt = now;
  state.lastCycle = summary;
  state.lastError = null;
  state.consecutiveFailures = 0;
  state.cycles++;
}

export function markCycleFailed(err: unknown): void {
  state.lastError = err instanceof Error ? err.message : String(err);
  state.consecutiveFailures++;
  state.cycles++;
}

/** True when the scheduler runs but no cycle has finished recently */
export function isMonitorStale(now: number = Date.now()): boolean {
  if (state.intervalMs === null) return false;
  const reference = state.lastCycleCompletedAt ?? state.startedAt;
  return now - reference > state.intervalMs * STALE_INTERVALS;
}

export function getMonitorState(): MonitorState {
  return { ...state };
}

/** Test hook: forget all cycle history */
export function resetMonitorState(now: number = Date.now()): void {
  state.startedAt = now;
  state.intervalMs = null;
  state.lastCycleStartedAt = null;
  state.lastCycleCompletedAt = null;
  state.lastCycle = null;
  state.lastError = null;
  state.consecutiveFailures = 0;
  state.cycles = 0;
  healthRateWindow.clear();
}

// ── Health report ───────────────────────────────────────────────────

export interface HealthReport {
  status: 'ok' | 'degraded';
  stale: boolean;
  uptime: number;
  lastCycle: {
    startedAgo: number | null;
    completedAgo: number | null;
    summary: CycleSummary | null;
    error: string | null;
    consecutiveFailures: number;
  };
  cycles: number;
  counters: SubsystemStats;
  memory: { rss: number; heapUsed: number; heapTotal: number };
}

const secondsSince = (now: number, at: number | null): number | null =>
  at === null ? null : Math.floor((now - at) / 1000);

export function buildHealthReport(now: number = Date.now()): HealthReport {
  const mem = process.memoryUsage();
  const stale = isMonitorStale(now);

  return {
    status: stale || state.consecutiveFailures > 0 ? 'degraded' : 'ok',
    stale,
    uptime: Math.floor((now - state.startedAt) / 1000),
    lastCycle: {
      startedAgo: secondsSince(now, state.lastCycleStartedAt),
      completedAgo: secondsSince(now, state.lastCycleCompletedAt),
      summary: state.lastCycle,
      error: state.lastError,
      consecutiveFailures: state.consecutiveFailures,
    },
    cycles: state.cycles,
    counters: totalCounters(getCurrentStats()),
    memory: {
      rss: Math.round(mem.rss / 1024 / 1024),
      heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
      heapTotal: Math.round(mem.heapTotal / 1024 / 1024),
    },
  };
}

// ── Health HTTP server ──────────────────────────────────────────────

let server: Server | null = null;

const HEALTH_RATE_WINDOW_MS = 60_000;
const HEALTH_RATE_LIMIT = 120;

const healthRateWindow = new Map<string, { windowStart: number; count: number }>();

export function isHealthRequestRateLimited(ip: string, now: number): boolean {
  const existing = healthRateWindow.get(ip);
  if (!existing || now - existing.windowStart >= HEALTH_RATE_WINDOW_MS) {
    healthRateWindow.set(ip, { windowStart: now, count: 1 });
    return false;
  }

  existing.count += 1;
  return existing.count > HEALTH_RATE_LIMIT;
}

/**
 * Start the HTTP health endpoint (`/health`) with lightweight abuse protection.
 */
export function startHealthServer(port: number = 3001, host: string = '127.0.0.1'): Server {
  server = createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      const now = Date.now();
      const ip = req.socket.remoteAddress ?? 'unknown';

      if (isHealthRequestRateLimited(ip, now)) {
        res.writeHead(429, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ error: 'rate_limited', message: 'Too many health requests' }));
        return;
      }

      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(buildHealthReport(now)));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.listen(port, host, () => {
    logger.info({ port, url: `http://${host}:${port}/health` }, 'Health check server started');
  });

  server.on('error', (err) => {
    logger.error({ err, port }, 'Health check server error');
  });

  return server;
}

export function stopHealthServer(): void {
  if (server) {
    server.close();
    server = null;
  }
  healthRateWindow.clear();
}
