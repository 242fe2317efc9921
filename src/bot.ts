import { Client, GatewayIntentBits, Events, Collection } from 'discord.js';
import type { ChatInputCommandInteraction } from 'discord.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Bot');

export interface Command {
  data: {
    name: string;
    description: string;
    toJSON(): unknown;
  };
  execute(interaction: ChatInputCommandInteraction): Promise<void>;
}

export interface BotClient extends Client {
  commands: Collection<string, Command>;
}

export function createClient(): BotClient {
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages],
  }) as BotClient;

  client.commands = new Collection<string, Command>();

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    const command = client.commands.get(interaction.commandName);
    if (!command) {
      log.error(`Unknown command: ${interaction.commandName}`);
      return;
    }

    try {
      await command.execute(interaction);
    } catch (error) {
      log.error('Command error:', error);
      const reply = { content: 'An error occurred while executing this command.', ephemeral: true };
      try {
        if (interaction.replied || interaction.deferred) {
          await interaction.followUp(reply);
        } else {
          await interaction.reply(reply);
        }
      } catch (replyError) {
        log.error('Could not report command error:', replyError);
      }
    }
  });

  return client;
}
