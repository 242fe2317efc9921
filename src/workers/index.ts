import { UnsupportedChannelError } from '../errors.js';
import type { ChannelsConfig } from './channel-config.js';
import { ConfiguredChannelWorker, type ChannelWorker, type ChannelWorkerDeps } from './channel-worker.js';

export type { ChannelWorker, ChannelWorkerDeps, FetchReport } from './channel-worker.js';

export function buildChannelWorker(channel: string, channels: ChannelsConfig, deps: ChannelWorkerDeps): ChannelWorker {
  const key = channel.trim().toLowerCase();
  const settings = channels[key];
  if (!settings) {
    throw new UnsupportedChannelError(channel);
  }
  return new ConfiguredChannelWorker(key, settings, deps);
}
