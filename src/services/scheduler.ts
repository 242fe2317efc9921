import { InvalidModeError } from '../errors.js';
import type { LegacyListing, Role, SchedulingMode, WatchEntity, WatchEntityInput } from '../types.js';

const MINUTE_MS = 60_000;
const MODES: readonly SchedulingMode[] = ['own', 'competitor', 'both'];

export type LastSeenLookup = (entity: WatchEntity) => Promise<Date | undefined>;

export function parseSchedulingMode(value: string): SchedulingMode {
  const mode = MODES.find(m => m === value);
  if (!mode) {
    throw new InvalidModeError(value);
  }
  return mode;
}

export function isStale(now: Date, lastSeen: Date | undefined, pollFrequencyMinutes: number): boolean {
  if (!lastSeen) return true;
  return now.getTime() - lastSeen.getTime() >= pollFrequencyMinutes * MINUTE_MS;
}

function roleMatchesMode(role: Role, mode: SchedulingMode): boolean {
  return mode === 'both' || mode === role;
}

/**
 * Returns the active entities whose last observation for their own role is older than
 * their polling frequency. Entities are never mutated; lookups run one at a time so a
 * store failure surfaces before any result is returned.
 */
export async function selectDue(
  now: Date,
  entities: readonly WatchEntity[],
  lastSeen: LastSeenLookup,
  mode: SchedulingMode = 'both'
): Promise<WatchEntity[]> {
  if (!MODES.includes(mode)) {
    throw new InvalidModeError(String(mode));
  }

  const due: WatchEntity[] = [];
  for (const entity of entities) {
    if (!entity.active || !roleMatchesMode(entity.role, mode)) continue;
    const seen = await lastSeen(entity);
    if (isStale(now, seen, entity.pollFrequencyMinutes)) {
      due.push(entity);
    }
  }
  return due;
}

/**
 * Recency rule for listings that still bundle both roles. In `both` mode the listing is
 * due when either schedule is stale.
 */
export function isLegacyListingDue(
  now: Date,
  listing: LegacyListing,
  lastOwn: Date | undefined,
  lastCompetitor: Date | undefined,
  mode: SchedulingMode
): boolean {
  if (!listing.active) return false;

  const ownStale = listing.monitorOwn && isStale(now, lastOwn, listing.pollFrequencyMinutes);
  const competitorStale = listing.monitorCompetitor && isStale(now, lastCompetitor, listing.pollFrequencyMinutes);

  switch (mode) {
    case 'own':
      return ownStale;
    case 'competitor':
      return competitorStale;
    case 'both':
      return ownStale || competitorStale;
    default:
      throw new InvalidModeError(String(mode));
  }
}

/** Splits a bundled listing into one strict entity per monitored role. */
export function migrateLegacyListing(listing: LegacyListing): WatchEntityInput[] {
  const base = {
    productGroupKey: listing.productGroupKey,
    channel: listing.channel.trim().toLowerCase(),
    endpointRef: listing.endpointRef,
    pollFrequencyMinutes: listing.pollFrequencyMinutes,
    gapThreshold: listing.gapThreshold,
    active: listing.active,
  };

  const entities: WatchEntityInput[] = [];
  if (listing.monitorOwn) {
    entities.push({ ...base, role: 'own' });
  }
  if (listing.monitorCompetitor) {
    entities.push({ ...base, role: 'competitor', competitorLabel: listing.competitorLabel ?? listing.channel });
  }
  return entities;
}
