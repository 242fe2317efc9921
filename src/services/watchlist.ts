import fs from 'node:fs/promises';
import { z } from 'zod';
import type { LegacyListing, Role, WatchEntityInput } from '../types.js';
import { migrateLegacyListing } from './scheduler.js';
import type { UpsertResult, WatchlistTarget } from './snapshot-store.js';

export const DEFAULT_POLL_FREQUENCY_MINUTES = 60;
export const DEFAULT_GAP_THRESHOLD = 0.1;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'y', 'si', 'sí']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'n']);

const watchlistFileSchema = z.array(z.record(z.unknown()));

export type WatchlistRow = Record<string, unknown>;

export interface ChannelDefaults {
  pollFrequencyMinutes?: number;
  gapThreshold?: number;
}

export interface RejectedRow {
  row: number;
  reason: string;
}

export interface NormalizedWatchlist {
  entities: WatchEntityInput[];
  rejected: RejectedRow[];
}

export function parseBool(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (value === null || value === undefined) return fallback;
  const normalized = String(value).trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return fallback;
}

export function parsePositiveInt(value: unknown, fallback: number): number {
  if (value === null || value === undefined || value === '') return fallback;
  const parsed = Math.trunc(Number(value));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseFraction(value: unknown, fallback: number): number {
  if (value === null || value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function normalizeChannel(value: unknown): string {
  return text(value).toLowerCase();
}

function text(value: unknown): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

function pick(row: WatchlistRow, ...keys: string[]): unknown {
  for (const key of keys) {
    if (row[key] !== undefined && row[key] !== '') return row[key];
  }
  return undefined;
}

function isLegacyRow(row: WatchlistRow): boolean {
  if (pick(row, 'role') !== undefined) return false;
  return pick(row, 'monitorOwn') !== undefined || pick(row, 'monitorCompetitor') !== undefined;
}

function parseRole(value: unknown): Role | undefined {
  const role = text(value).toLowerCase();
  return role === 'own' || role === 'competitor' ? role : undefined;
}

/**
 * Turns loosely typed watch-list rows into entity inputs. Own rows are read first so a
 * competitor row without its own frequency inherits the frequency of the group's own
 * listing on the same channel.
 *
 * Rows in the older bundled shape (`monitorOwn` / `monitorCompetitor` flags, no `role`)
 * are split into one entity per monitored role.
 */
export function normalizeWatchlistRows(
  rows: readonly WatchlistRow[],
  channelDefaults: (channel: string) => ChannelDefaults = () => ({})
): NormalizedWatchlist {
  const rejected: RejectedRow[] = [];
  const own: WatchEntityInput[] = [];
  const pendingCompetitors: { row: WatchlistRow; base: Omit<WatchEntityInput, 'pollFrequencyMinutes'> }[] = [];
  const migratedCompetitors: WatchEntityInput[] = [];

  rows.forEach((row, index) => {
    const productGroupKey = text(pick(row, 'productGroupKey', 'sku', 'group'));
    const channel = normalizeChannel(pick(row, 'channel'));
    const role = parseRole(pick(row, 'role'));
    const endpointRef = text(pick(row, 'endpointRef', 'url'));

    if (!productGroupKey || !channel || !endpointRef) {
      rejected.push({ row: index, reason: 'missing productGroupKey, channel or endpointRef' });
      return;
    }
    if (isLegacyRow(row)) {
      const defaults = channelDefaults(channel);
      const listing: LegacyListing = {
        productGroupKey,
        channel,
        endpointRef,
        monitorOwn: parseBool(pick(row, 'monitorOwn'), false),
        monitorCompetitor: parseBool(pick(row, 'monitorCompetitor'), false),
        competitorLabel: text(pick(row, 'competitorLabel', 'competitor')) || undefined,
        pollFrequencyMinutes: parsePositiveInt(
          pick(row, 'pollFrequencyMinutes'),
          defaults.pollFrequencyMinutes ?? DEFAULT_POLL_FREQUENCY_MINUTES
        ),
        gapThreshold: parseFraction(pick(row, 'gapThreshold'), defaults.gapThreshold ?? DEFAULT_GAP_THRESHOLD),
        active: parseBool(pick(row, 'active'), true),
      };
      const migrated = migrateLegacyListing(listing);
      if (migrated.length === 0) {
        rejected.push({ row: index, reason: 'legacy row monitors neither own nor competitor' });
        return;
      }
      for (const entity of migrated) {
        (entity.role === 'own' ? own : migratedCompetitors).push(entity);
      }
      return;
    }
    if (!role) {
      rejected.push({ row: index, reason: `unknown role "${text(pick(row, 'role'))}"` });
      return;
    }

    const competitorLabel = text(pick(row, 'competitorLabel', 'competitor')) || undefined;
    if (role === 'competitor' && !competitorLabel) {
      rejected.push({ row: index, reason: 'competitor row without competitorLabel' });
      return;
    }

    const defaults = channelDefaults(channel);
    const base = {
      productGroupKey,
      channel,
      role,
      endpointRef,
      competitorLabel,
      gapThreshold: parseFraction(pick(row, 'gapThreshold'), defaults.gapThreshold ?? DEFAULT_GAP_THRESHOLD),
      active: parseBool(pick(row, 'active'), true),
    };

    if (role === 'competitor') {
      pendingCompetitors.push({ row, base });
      return;
    }

    own.push({
      ...base,
      pollFrequencyMinutes: parsePositiveInt(
        pick(row, 'pollFrequencyMinutes'),
        defaults.pollFrequencyMinutes ?? DEFAULT_POLL_FREQUENCY_MINUTES
      ),
    });
  });

  const ownFrequency = new Map<string, number>();
  for (const entity of own) {
    const key = `${entity.productGroupKey}\u0000${entity.channel}`;
    if (!ownFrequency.has(key)) ownFrequency.set(key, entity.pollFrequencyMinutes);
  }

  const competitors = pendingCompetitors.map(({ row, base }) => {
    const inherited =
      ownFrequency.get(`${base.productGroupKey}\u0000${base.channel}`) ??
      channelDefaults(base.channel).pollFrequencyMinutes ??
      DEFAULT_POLL_FREQUENCY_MINUTES;
    return { ...base, pollFrequencyMinutes: parsePositiveInt(pick(row, 'pollFrequencyMinutes'), inherited) };
  });

  return { entities: [...own, ...competitors, ...migratedCompetitors], rejected };
}

export async function loadWatchlistFile(filePath: string): Promise<WatchlistRow[]> {
  const raw = await fs.readFile(filePath, 'utf8');
  return watchlistFileSchema.parse(JSON.parse(raw));
}

export async function importWatchlist(
  target: WatchlistTarget,
  rows: readonly WatchlistRow[],
  channelDefaults?: (channel: string) => ChannelDefaults
): Promise<UpsertResult & { rejected: RejectedRow[] }> {
  const { entities, rejected } = normalizeWatchlistRows(rows, channelDefaults);
  const result = await target.upsertWatchEntities(entities);
  return { ...result, rejected };
}
