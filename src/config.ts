import { z } from 'zod';
import type { Config } from './types.js';

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./data/watch.db'),
  CHANNELS_CONFIG_PATH: z.string().min(1).default('./config/channels.json'),
  WATCHLIST_PATH: z.string().min(1).optional(),
  DISCORD_TOKEN: z.string().min(1).optional(),
  DISCORD_CLIENT_ID: z.string().min(1).optional(),
  DISCORD_GUILD_ID: z.string().optional(),
  ALERT_CHANNEL_ID: z.string().min(1).optional(),
  CYCLE_INTERVAL_MS: z.coerce.number().int().positive().default(300000),
  DEDUP_WINDOW_MS: z.coerce.number().int().positive().default(86400000),
  DEDUP_POLICY: z.enum(['creation-window', 'open-only']).default('creation-window'),
  DEFAULT_GAP_THRESHOLD: z.coerce.number().finite().nonnegative().default(0.1),
  EVALUATION_CONCURRENCY: z.coerce.number().int().positive().default(4),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  BROWSER_HEADLESS: z.enum(['true', 'false']).default('true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);

  const discord =
    parsed.DISCORD_TOKEN && parsed.DISCORD_CLIENT_ID && parsed.ALERT_CHANNEL_ID
      ? {
          token: parsed.DISCORD_TOKEN,
          clientId: parsed.DISCORD_CLIENT_ID,
          guildId: parsed.DISCORD_GUILD_ID,
          alertChannelId: parsed.ALERT_CHANNEL_ID,
        }
      : undefined;

  return {
    databasePath: parsed.DATABASE_PATH,
    channelsConfigPath: parsed.CHANNELS_CONFIG_PATH,
    watchlistPath: parsed.WATCHLIST_PATH,
    discord,
    monitoring: {
      cycleIntervalMs: parsed.CYCLE_INTERVAL_MS,
      dedupWindowMs: parsed.DEDUP_WINDOW_MS,
      dedupPolicy: parsed.DEDUP_POLICY,
      defaultGapThreshold: parsed.DEFAULT_GAP_THRESHOLD,
      evaluationConcurrency: parsed.EVALUATION_CONCURRENCY,
    },
    browser: {
      executablePath: parsed.BROWSER_EXECUTABLE_PATH,
      headless: parsed.BROWSER_HEADLESS === 'true',
    },
    logLevel: parsed.LOG_LEVEL,
  };
}

export function requireDiscordConfig(config: Config): NonNullable<Config['discord']> {
  if (!config.discord) {
    throw new Error('DISCORD_TOKEN, DISCORD_CLIENT_ID and ALERT_CHANNEL_ID must be set to run the bot');
  }
  return config.discord;
}
