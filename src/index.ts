import { createBackend, type DbBackend } from './utils/db.js';
import { createPlatformSenders } from './platforms/index.js';
import { logger, setLogLevel } from './middleware/logger.js';
import { config } from './utils/config.js';
import { startHealthServer, stopHealthServer } from './middleware/health.js';
import { createEngine } from './core/engine.js';
import { createLoreFeedSource } from './feed/lore-feed.js';
import { createFeedMonitor } from './feed/monitor.js';
import { createMonitorScheduler, type MonitorScheduler } from './feed/scheduler.js';

const HOUR_MS = 60 * 60 * 1000;

let backend: DbBackend | null = null;
let scheduler: MonitorScheduler | null = null;

async function main(): Promise<void> {
  setLogLevel(config.LOG_LEVEL);
  logger.info('📬 Patchwatch starting...');

  logger.info({
    dbDialect: config.DB_DIALECT,
    feedBaseUrl: config.FEED_BASE_URL,
    subsystems: config.SUBSYSTEMS,
    intervalSeconds: config.MONITOR_INTERVAL_SECONDS,
    discordDemo: config.DISCORD_DEMO,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  backend = await createBackend(config);
  const senders = createPlatformSenders(config);

  const engine = createEngine(backend, {
    cardSender: senders,
    threadSender: senders,
    cardTtlMs: config.CARD_TTL_HOURS * HOUR_MS,
  });

  const monitor = createFeedMonitor({
    source: createLoreFeedSource({ baseUrl: config.FEED_BASE_URL }),
    processor: engine.processor,
    subsystems: backend.subsystems,
    configuredSubsystems: config.SUBSYSTEMS,
    maxEntries: config.MAX_ENTRIES_PER_FEED,
  });

  const watched = await monitor.listSubsystems();
  if (watched.length === 0) {
    logger.warn('No subsystems configured or subscribed; cycles will be empty until SUBSYSTEMS is set');
  }

  startHealthServer(config.HEALTH_PORT, config.HEALTH_BIND_HOST);

  scheduler = createMonitorScheduler({
    monitor,
    cards: engine.cards,
    intervalMs: config.MONITOR_INTERVAL_SECONDS * 1000,
  });
  scheduler.start();

  logger.info({ subsystems: watched }, '📬 Patchwatch is online and polling');
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error; shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection; shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception; shutting down');
  process.exit(1);
});

// Graceful shutdown
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal; shutting down');
  stopHealthServer();

  try {
    await scheduler?.stop();
    await backend?.close();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to shut down cleanly');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
