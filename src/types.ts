export type Role = 'own' | 'competitor';

export type SchedulingMode = 'own' | 'competitor' | 'both';

export type AlertKind = 'gap_over_threshold';

export interface WatchEntityInput {
  productGroupKey: string;
  channel: string;
  role: Role;
  endpointRef: string;
  competitorLabel?: string;
  pollFrequencyMinutes: number;
  gapThreshold: number;
  active: boolean;
}

export interface WatchEntity extends WatchEntityInput {
  id: number;
}

/**
 * Older listing shape that bundled own and competitor monitoring into one record.
 * Only read during migration to per-role {@link WatchEntity} rows.
 */
export interface LegacyListing {
  productGroupKey: string;
  channel: string;
  endpointRef: string;
  monitorOwn: boolean;
  monitorCompetitor: boolean;
  competitorLabel?: string;
  pollFrequencyMinutes: number;
  gapThreshold: number;
  active: boolean;
}

export interface NewPriceObservation {
  productGroupKey: string;
  channel: string;
  role: Role;
  endpointRef: string;
  competitorLabel?: string;
  price: number;
  stock?: number;
  currency: string;
  capturedAt: Date;
  rawPayload?: unknown;
}

export interface PriceObservation extends NewPriceObservation {
  id: number;
}

export interface AlertIdentity {
  productGroupKey: string;
  channel: string;
  kind: AlertKind;
}

export interface NewAlert extends AlertIdentity {
  detail: string;
  ownPrice: number;
  minCompetitorPrice: number;
  gapPct: number;
  endpointOwn: string;
  endpointMinCompetitor: string;
  createdAt: Date;
}

export interface Alert extends NewAlert {
  id: number;
  resolved: boolean;
}

export interface GroupChannel {
  productGroupKey: string;
  channel: string;
}

export interface GapEvaluation {
  ownPrice: number;
  minCompetitorPrice: number;
  gapPct: number;
  ownObservation: PriceObservation;
  chosenCompetitorObservation: PriceObservation;
}

export type DedupPolicy = 'creation-window' | 'open-only';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  databasePath: string;
  channelsConfigPath: string;
  watchlistPath?: string;
  discord?: {
    token: string;
    clientId: string;
    guildId?: string;
    alertChannelId: string;
  };
  monitoring: {
    cycleIntervalMs: number;
    dedupWindowMs: number;
    dedupPolicy: DedupPolicy;
    defaultGapThreshold: number;
    evaluationConcurrency: number;
  };
  browser: {
    executablePath?: string;
    headless: boolean;
  };
  logLevel: LogLevel;
}
