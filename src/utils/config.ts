import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { LOG_LEVELS } from '../middleware/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const booleanFlag = z.enum(['true', 'false']).default('false').transform((value) => value === 'true');

const envSchema = z.object({
  // Storage
  DB_DIALECT: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/patchwatch.db'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_SSL: booleanFlag,
  POSTGRES_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),

  // Discord
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().optional(),
  DISCORD_DEMO: booleanFlag,

  // Feed monitoring
  FEED_BASE_URL: z.string().url().default('https://lore.kernel.org'),
  // Comma-separated mailing lists, eg: "netdev,linux-mm"
  SUBSYSTEMS: z.string().default(''),
  MONITOR_INTERVAL_SECONDS: z.coerce.number().int().min(60, 'MONITOR_INTERVAL_SECONDS must be at least 60').default(300),
  MAX_ENTRIES_PER_FEED: z.coerce.number().int().min(1).max(500).default(20),
  CARD_TTL_HOURS: z.coerce.number().positive().default(24),

  // Infrastructure
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = Omit<z.infer<typeof envSchema>, 'SUBSYSTEMS'> & {
  SUBSYSTEMS: string[];
};

export type ConfigResult =
  | { ok: true; config: AppConfig }
  | { ok: false; errors: string[] };

/** Validate an environment map. Pure; used by the module below and by tests. */
export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  if (parsed.data.DB_DIALECT === 'postgres' && !parsed.data.DATABASE_URL) {
    return { ok: false, errors: ['DATABASE_URL: required when DB_DIALECT=postgres'] };
  }

  if (!parsed.data.DISCORD_DEMO && (!parsed.data.DISCORD_BOT_TOKEN || !parsed.data.DISCORD_CHANNEL_ID)) {
    return { ok: false, errors: ['DISCORD_BOT_TOKEN, DISCORD_CHANNEL_ID: required unless DISCORD_DEMO=true'] };
  }

  const subsystems = Array.from(new Set(
    parsed.data.SUBSYSTEMS
      .split(',')
      .map((name) => name.trim().toLowerCase())
      .filter(Boolean),
  ));

  return { ok: true, config: { ...parsed.data, SUBSYSTEMS: subsystems } };
}

const result = parseConfig(process.env);

if (!result.ok) {
  console.error('❌ Invalid environment variables:');
  for (const error of result.errors) {
    console.error(`   ${error}`);
  }
  process.exit(1);
}

export const config: Readonly<AppConfig> = Object.freeze(result.config);
export { PROJECT_ROOT };
