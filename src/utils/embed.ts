import { EmbedBuilder } from 'discord.js';
import type { Alert } from '../types.js';

const GAP_COLOR = 0xff8800;

export function formatGap(gapPct: number): string {
  return `${gapPct >= 0 ? '+' : ''}${(gapPct * 100).toFixed(1)}%`;
}

export function createAlertEmbed(alert: Alert): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(GAP_COLOR)
    .setTitle(`Price gap: ${alert.productGroupKey}`)
    .setDescription(alert.detail)
    .setTimestamp(alert.createdAt)
    .setFooter({ text: `Alert #${alert.id} · Channel Price Watch` });

  embed.addFields(
    { name: 'Channel', value: alert.channel, inline: true },
    { name: 'Own price', value: alert.ownPrice.toFixed(2), inline: true },
    { name: 'Min competitor', value: alert.minCompetitorPrice.toFixed(2), inline: true },
    { name: 'Gap', value: formatGap(alert.gapPct), inline: true },
    { name: 'Own listing', value: alert.endpointOwn, inline: false },
    { name: 'Cheapest competitor', value: alert.endpointMinCompetitor, inline: false }
  );

  if (/^https?:\/\//i.test(alert.endpointMinCompetitor)) {
    embed.setURL(alert.endpointMinCompetitor);
  }

  return embed;
}
