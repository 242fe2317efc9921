import type {
  Alert,
  AlertIdentity,
  NewAlert,
  NewPriceObservation,
  PriceObservation,
  Role,
  WatchEntity,
  WatchEntityInput,
} from '../types.js';

/** Check performed atomically with an alert insert. */
export interface AlertGuard {
  since: Date;
  includeResolved: boolean;
}

export interface UpsertResult {
  inserted: number;
  updated: number;
}

/**
 * Read/append access to watch entities, price observations and alerts.
 * Every method rejects with StoreUnavailableError when the backing store fails.
 */
export interface SnapshotStore {
  listActiveWatchEntities(): Promise<WatchEntity[]>;
  lastObservationTimestamp(
    productGroupKey: string,
    channel: string,
    endpointRef: string,
    role: Role
  ): Promise<Date | undefined>;
  latestOwnObservation(productGroupKey: string, channel: string): Promise<PriceObservation | undefined>;
  latestCompetitorObservationsAtMostRecentRound(productGroupKey: string, channel: string): Promise<PriceObservation[]>;
  unresolvedAlertsSince(identity: AlertIdentity, since: Date): Promise<Alert[]>;
  alertsSince(identity: AlertIdentity, since: Date): Promise<Alert[]>;
  /** Rejects with DuplicateAlertError when the guard matches an existing alert. */
  createAlert(alert: NewAlert, guard: AlertGuard): Promise<Alert>;
}

export interface ObservationSink {
  recordObservation(observation: NewPriceObservation): Promise<PriceObservation>;
}

export interface WatchlistTarget {
  upsertWatchEntities(inputs: WatchEntityInput[]): Promise<UpsertResult>;
}
