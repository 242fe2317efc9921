import { Routes } from 'discord.js';
import type { Command } from '../bot.js';
import type { Database } from '../services/database.js';
import { createStatusCommand, statusCommandData } from './status.js';
import { createAlertsCommand, alertsCommandData } from './alerts.js';

/** Slash command definitions, usable without a store for registration. */
export const commandData = [statusCommandData, alertsCommandData];

export function loadCommands(db: Database): Command[] {
  return [createStatusCommand(db), createAlertsCommand(db)];
}

/** Guild registration applies at once; global registration can take up to an hour. */
export function registrationRoute(clientId: string, guildId?: string): `/${string}` {
  return guildId ? Routes.applicationGuildCommands(clientId, guildId) : Routes.applicationCommands(clientId);
}
