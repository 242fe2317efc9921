import { SlashCommandBuilder, EmbedBuilder } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import type { Command } from '../bot.js';
import type { Database } from '../services/database.js';
import type { Alert } from '../types.js';
import { formatGap } from '../utils/embed.js';

export function formatAlertLine(alert: Alert): string {
  return (
    `#${alert.id} ${alert.productGroupKey} · ${alert.channel} · ${formatGap(alert.gapPct)} ` +
    `(${alert.ownPrice.toFixed(2)} vs ${alert.minCompetitorPrice.toFixed(2)})`
  );
}

export const alertsCommandData = new SlashCommandBuilder()
  .setName('alerts')
  .setDescription('List or resolve price gap alerts')
  .addSubcommand(sub => sub.setName('list').setDescription('Show open alerts, newest first'))
  .addSubcommand(sub =>
    sub
      .setName('resolve')
      .setDescription('Mark an alert as resolved')
      .addIntegerOption(option => option.setName('id').setDescription('Alert number').setRequired(true).setMinValue(1))
  );

export function createAlertsCommand(db: Database): Command {
  return {
    data: alertsCommandData,

    async execute(interaction: ChatInputCommandInteraction): Promise<void> {
      const subcommand = interaction.options.getSubcommand();

      if (subcommand === 'resolve') {
        const id = interaction.options.getInteger('id', true);
        const resolved = await db.resolveAlert(id);
        await interaction.reply({
          content: resolved ? `✅ Alert #${id} resolved` : `⚠️ Alert #${id} not found or already resolved`,
          ephemeral: true,
        });
        return;
      }

      const alerts = await db.listOpenAlerts();
      if (alerts.length === 0) {
        await interaction.reply('No open alerts.');
        return;
      }

      const embed = new EmbedBuilder()
        .setColor(0xff8800)
        .setTitle(`Open Alerts (${alerts.length})`)
        .setDescription(alerts.map(formatAlertLine).join('\n').slice(0, 4096))
        .setTimestamp()
        .setFooter({ text: 'Resolve with /alerts resolve id:<n>' });

      await interaction.reply({ embeds: [embed] });
    },
  };
}
