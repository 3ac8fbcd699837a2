import { logger } from '../middleware/logger.js';
import { createDiscordDemoSenders, createDiscordSenders, type DiscordDemoOutboxEntry, type DiscordSenders } from './discord/adapter.js';
import type { AppConfig } from '../utils/config.js';

export type PlatformSenders = DiscordSenders;

/** Live Discord senders, or the recording demo senders when DISCORD_DEMO is set. */
export function createPlatformSenders(
  config: Pick<AppConfig, 'DISCORD_DEMO' | 'DISCORD_BOT_TOKEN' | 'DISCORD_CHANNEL_ID'>,
  outbox: DiscordDemoOutboxEntry[] = [],
): PlatformSenders {
  if (config.DISCORD_DEMO) {
    logger.warn('DISCORD_DEMO=true: platform sends are recorded, not delivered');
    return createDiscordDemoSenders(outbox, config.DISCORD_CHANNEL_ID ?? 'demo-channel');
  }

  if (!config.DISCORD_BOT_TOKEN || !config.DISCORD_CHANNEL_ID) {
    throw new Error('DISCORD_BOT_TOKEN and DISCORD_CHANNEL_ID are required unless DISCORD_DEMO=true');
  }

  return createDiscordSenders({ token: config.DISCORD_BOT_TOKEN, channelId: config.DISCORD_CHANNEL_ID });
}
