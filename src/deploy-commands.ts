import { REST } from 'discord.js';
import { loadConfig, requireDiscordConfig } from './config.js';
import { commandData, registrationRoute } from './commands/index.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Deploy');

async function deployCommands(): Promise<void> {
  const discord = requireDiscordConfig(loadConfig());
  const body = commandData.map(data => data.toJSON());
  const rest = new REST().setToken(discord.token);

  log.info(`Registering ${body.length} commands...`);
  await rest.put(registrationRoute(discord.clientId, discord.guildId), { body });
  log.info(
    discord.guildId
      ? `Commands registered in guild ${discord.guildId}`
      : 'Commands registered globally (may take up to 1 hour to propagate)'
  );
}

deployCommands().catch(error => {
  log.error('Failed to register commands:', error);
  process.exit(1);
});
