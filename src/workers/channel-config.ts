import fs from 'node:fs/promises';
import { z } from 'zod';

const waitUntilSchema = z.enum(['load', 'domcontentloaded', 'networkidle0', 'networkidle2']);

const apiSourceSchema = z.object({
  type: z.literal('api'),
  baseUrl: z.string().url().optional(),
  priceField: z.string().min(1).default('price'),
  stockField: z.string().min(1).optional(),
  currencyField: z.string().min(1).optional(),
  headers: z.record(z.string()).default({}),
  timeoutMs: z.number().int().positive().default(30000),
});

const browserSourceSchema = z.object({
  type: z.literal('browser'),
  priceSelector: z.string().min(1),
  stockSelector: z.string().min(1).optional(),
  waitUntil: waitUntilSchema.default('domcontentloaded'),
  timeoutMs: z.number().int().positive().default(30000),
});

const sourceSchema = z.discriminatedUnion('type', [apiSourceSchema, browserSourceSchema]);

const channelSettingsSchema = z.object({
  currency: z.string().min(1).default('CLP'),
  userAgent: z.string().min(1).default('channel-price-watch/1.0'),
  concurrency: z.number().int().positive().default(2),
  throttleMs: z.number().int().nonnegative().default(1000),
  pollFrequencyMinutes: z.number().int().positive().optional(),
  gapThreshold: z.number().nonnegative().optional(),
  own: sourceSchema.optional(),
  competitor: sourceSchema.optional(),
});

const channelsFileSchema = z.object({
  default: z.record(z.unknown()).default({}),
  channels: z.record(z.record(z.unknown())).default({}),
});

export type ApiSourceSettings = z.infer<typeof apiSourceSchema>;
export type BrowserSourceSettings = z.infer<typeof browserSourceSchema>;
export type SourceSettings = z.infer<typeof sourceSchema>;
export type ChannelSettings = z.infer<typeof channelSettingsSchema>;
export type WaitUntil = z.infer<typeof waitUntilSchema>;

export type ChannelsConfig = Record<string, ChannelSettings>;

/** Each channel's settings are the `default` block overlaid with the channel's own keys. */
export function parseChannelsConfig(raw: unknown): ChannelsConfig {
  const file = channelsFileSchema.parse(raw);
  const channels: ChannelsConfig = {};
  for (const [name, overrides] of Object.entries(file.channels)) {
    const key = name.trim().toLowerCase();
    channels[key] = channelSettingsSchema.parse({ ...file.default, ...overrides });
  }
  return channels;
}

export async function loadChannelsConfig(filePath: string): Promise<ChannelsConfig> {
  const raw = await fs.readFile(filePath, 'utf8');
  return parseChannelsConfig(JSON.parse(raw));
}
