import { Events } from 'discord.js';
import { createClient } from './bot.js';
import { loadConfig, requireDiscordConfig } from './config.js';
import { loadCommands } from './commands/index.js';
import { createRuntime } from './runtime.js';
import { DiscordAlertSink, LogAlertSink } from './services/alerter.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Main');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const discord = requireDiscordConfig(config);
  log.info('Starting Channel Price Watch...');

  const client = createClient();
  const runtime = await createRuntime(config, [
    new LogAlertSink(),
    new DiscordAlertSink(client, discord.alertChannelId),
  ]);
  log.info('Database and channel configuration loaded');

  const commands = loadCommands(runtime.db);
  for (const command of commands) {
    client.commands.set(command.data.name, command);
  }
  log.info(`Loaded ${commands.length} commands`);

  client.once(Events.ClientReady, (readyClient) => {
    log.info(`Logged in as ${readyClient.user.tag}`);

    runtime.orchestrator.start();

    const shutdown = () => {
      log.info('Shutting down...');
      runtime.orchestrator.stop();
      runtime.db.close();
      client
        .destroy()
        .catch((error) => log.error('Discord client did not close cleanly:', error))
        .finally(() => process.exit(0));
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });

  await client.login(discord.token);
}

main().catch((error) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
