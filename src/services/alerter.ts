import type { Client, TextChannel } from 'discord.js';
import type { Alert } from '../types.js';
import { createAlertEmbed, formatGap } from '../utils/embed.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Alerter');

/** Human-facing surface that newly created alerts are exported to. */
export interface AlertSink {
  readonly name: string;
  publish(alerts: readonly Alert[]): Promise<number>;
}

export class LogAlertSink implements AlertSink {
  readonly name = 'log';

  async publish(alerts: readonly Alert[]): Promise<number> {
    for (const alert of alerts) {
      log.info(`#${alert.id} ${alert.productGroupKey}/${alert.channel} gap ${formatGap(alert.gapPct)}: ${alert.detail}`);
    }
    return alerts.length;
  }
}

export class DiscordAlertSink implements AlertSink {
  readonly name = 'discord';
  private client: Client;
  private channelId: string;

  constructor(client: Client, channelId: string) {
    this.client = client;
    this.channelId = channelId;
  }

  async publish(alerts: readonly Alert[]): Promise<number> {
    if (alerts.length === 0) return 0;

    const channel = await this.getChannel(this.channelId);
    if (!channel) {
      throw new Error(`Could not find text channel ${this.channelId}`);
    }

    let sent = 0;
    for (const alert of alerts) {
      try {
        await channel.send({ embeds: [createAlertEmbed(alert)] });
        sent++;
        log.info(`Sent alert #${alert.id} for ${alert.productGroupKey} to #${channel.name}`);
      } catch (error) {
        log.error(`Failed to send alert #${alert.id}:`, error);
      }
    }
    return sent;
  }

  private async getChannel(channelId: string): Promise<TextChannel | null> {
    const channel = await this.client.channels.fetch(channelId);
    if (channel?.isTextBased() && 'send' in channel) {
      return channel as TextChannel;
    }
    return null;
  }
}

/** Sends to every sink; a failing sink is logged and does not block the others. */
export async function publishAlerts(sinks: readonly AlertSink[], alerts: readonly Alert[]): Promise<number> {
  let delivered = 0;
  for (const sink of sinks) {
    try {
      delivered += await sink.publish(alerts);
    } catch (error) {
      log.error(`Sink ${sink.name} failed:`, error);
    }
  }
  return delivered;
}
