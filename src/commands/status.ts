import { SlashCommandBuilder, EmbedBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { Database } from '../services/database.js';
import { LAST_CYCLE_STATE_KEY, type CycleSummary } from '../monitors/index.js';

function isCycleSummary(value: unknown): value is CycleSummary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'finishedAt' in value &&
    typeof value.finishedAt === 'string' &&
    'channelFailures' in value &&
    Array.isArray(value.channelFailures)
  );
}

function parseSummary(raw: string | null): CycleSummary | null {
  if (!raw) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isCycleSummary(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export const statusCommandData = new SlashCommandBuilder()
  .setName('status')
  .setDescription('Show watch list size, open alerts and the last cycle');

export function createStatusCommand(db: Database): Command {
  return {
    data: statusCommandData,

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const entities = await db.countWatchEntities();
      const openAlerts = await db.countOpenAlerts();

      const embed = new EmbedBuilder()
        .setColor(0x0099ff)
        .setTitle('Channel Price Watch Status')
        .setTimestamp()
        .addFields(
          { name: 'Entities Tracked', value: String(entities.total), inline: true },
          { name: 'Active', value: String(entities.active), inline: true },
          { name: 'Open Alerts', value: String(openAlerts), inline: true }
        );

      const last = parseSummary(db.getState(LAST_CYCLE_STATE_KEY));
      if (last) {
        embed.addFields(
          { name: 'Last Cycle', value: new Date(last.finishedAt).toLocaleString(), inline: false },
          { name: 'Due', value: String(last.due), inline: true },
          { name: 'New Alerts', value: String(last.alertsCreated), inline: true },
          { name: 'Suppressed', value: String(last.suppressed), inline: true }
        );
        if (last.channelFailures.length > 0) {
          embed.addFields({
            name: 'Channel Failures',
            value: last.channelFailures.map(f => `${f.channel}: ${f.error}`).join('\n').slice(0, 1024),
            inline: false,
          });
        }
      }

      await interaction.reply({ embeds: [embed] });
    },
  };
}
