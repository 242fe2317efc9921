import { DuplicateAlertError } from '../errors.js';
import type { Alert, AlertIdentity, AlertKind, GapEvaluation, GroupChannel, NewAlert, WatchEntity } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { runPool } from '../utils/pool.js';
import type { AlertDeduplicator } from './deduplicator.js';
import type { GapEvaluator } from './gap-evaluator.js';
import type { SnapshotStore } from './snapshot-store.js';

const log = createLogger('Emitter');

export const GAP_ALERT_KIND: AlertKind = 'gap_over_threshold';

export type PairOutcome =
  | { status: 'created'; alert: Alert }
  | { status: 'suppressed'; reason: 'duplicate' | 'concurrent_duplicate' }
  | { status: 'skipped'; reason: 'unevaluable' | 'within_threshold' };

export interface PairFailure extends GroupChannel {
  error: unknown;
}

export interface AlertCycleReport {
  alerts: Alert[];
  evaluated: number;
  suppressed: number;
  skipped: number;
  failures: PairFailure[];
}

interface AlertEmitterConfig {
  defaultGapThreshold: number;
  concurrency: number;
}

export class AlertEmitter {
  private store: SnapshotStore;
  private evaluator: GapEvaluator;
  private deduplicator: AlertDeduplicator;
  private config: AlertEmitterConfig;
  private lock = new KeyedLock();

  constructor(
    store: SnapshotStore,
    evaluator: GapEvaluator,
    deduplicator: AlertDeduplicator,
    config: AlertEmitterConfig
  ) {
    this.store = store;
    this.evaluator = evaluator;
    this.deduplicator = deduplicator;
    this.config = config;
  }

  /**
   * Evaluates every active group/channel pair and persists at most one new alert per
   * pair. A failing pair is reported in `failures` and does not stop the others.
   */
  async run(now: Date = new Date(), pairs?: GroupChannel[]): Promise<AlertCycleReport> {
    const entities = await this.store.listActiveWatchEntities();
    const targets = pairs ?? AlertEmitter.activePairs(entities);

    const results = await runPool(
      targets,
      pair => this.evaluatePair(pair, AlertEmitter.thresholdFor(pair, entities, this.config.defaultGapThreshold), now),
      { concurrency: this.config.concurrency }
    );

    const report: AlertCycleReport = { alerts: [], evaluated: targets.length, suppressed: 0, skipped: 0, failures: [] };
    results.forEach((result, index) => {
      const pair = targets[index];
      if (!pair) return;
      if (result.status === 'rejected') {
        log.error(`Evaluation failed for ${pair.productGroupKey}/${pair.channel}:`, result.reason);
        report.failures.push({ ...pair, error: result.reason });
        return;
      }
      const outcome = result.value;
      if (outcome.status === 'created') report.alerts.push(outcome.alert);
      else if (outcome.status === 'suppressed') report.suppressed++;
      else report.skipped++;
    });

    log.info(
      `Evaluated ${report.evaluated} pairs: ${report.alerts.length} new, ${report.suppressed} suppressed, ` +
        `${report.skipped} skipped, ${report.failures.length} failed`
    );
    return report;
  }

  async evaluatePair(pair: GroupChannel, threshold: number, now: Date): Promise<PairOutcome> {
    const own = await this.store.latestOwnObservation(pair.productGroupKey, pair.channel);
    const round = await this.store.latestCompetitorObservationsAtMostRecentRound(pair.productGroupKey, pair.channel);

    const evaluation = this.evaluator.evaluate(own, round);
    if (!evaluation) {
      log.debug(`No computable gap for ${pair.productGroupKey}/${pair.channel}`);
      return { status: 'skipped', reason: 'unevaluable' };
    }

    if (!this.evaluator.exceedsThreshold(evaluation, threshold)) {
      return { status: 'skipped', reason: 'within_threshold' };
    }

    const identity: AlertIdentity = { ...pair, kind: GAP_ALERT_KIND };
    return this.lock.run(AlertEmitter.identityKey(identity), () => this.emit(identity, evaluation, threshold, now));
  }

  private async emit(
    identity: AlertIdentity,
    evaluation: GapEvaluation,
    threshold: number,
    now: Date
  ): Promise<PairOutcome> {
    const since = this.deduplicator.windowStart(now);
    const recent = this.deduplicator.includesResolved
      ? await this.store.alertsSince(identity, since)
      : await this.store.unresolvedAlertsSince(identity, since);

    if (this.deduplicator.isDuplicate(identity, recent, now)) {
      log.debug(`Suppressing duplicate ${identity.kind} for ${identity.productGroupKey}/${identity.channel}`);
      return { status: 'suppressed', reason: 'duplicate' };
    }

    const draft = AlertEmitter.buildAlert(identity, evaluation, threshold, now);
    try {
      const alert = await this.store.createAlert(draft, {
        since,
        includeResolved: this.deduplicator.includesResolved,
      });
      log.info(`Created alert #${alert.id}: ${alert.detail}`);
      return { status: 'created', alert };
    } catch (error: unknown) {
      if (error instanceof DuplicateAlertError) {
        log.debug(`Concurrent cycle already raised ${identity.kind} for ${identity.productGroupKey}/${identity.channel}`);
        return { status: 'suppressed', reason: 'concurrent_duplicate' };
      }
      throw error;
    }
  }

  static buildAlert(identity: AlertIdentity, evaluation: GapEvaluation, threshold: number, now: Date): NewAlert {
    const competitor = evaluation.chosenCompetitorObservation;
    const label = competitor.competitorLabel ?? competitor.endpointRef;
    const detail =
      `${identity.productGroupKey} on ${identity.channel}: own price ${formatPrice(evaluation.ownPrice)} vs ` +
      `min competitor ${formatPrice(evaluation.minCompetitorPrice)} (${label}), ` +
      `gap ${formatPct(evaluation.gapPct)} over threshold ${formatPct(threshold)}`;

    return {
      ...identity,
      detail,
      ownPrice: evaluation.ownPrice,
      minCompetitorPrice: evaluation.minCompetitorPrice,
      gapPct: evaluation.gapPct,
      endpointOwn: evaluation.ownObservation.endpointRef,
      endpointMinCompetitor: competitor.endpointRef,
      createdAt: now,
    };
  }

  static activePairs(entities: readonly WatchEntity[]): GroupChannel[] {
    const seen = new Map<string, GroupChannel>();
    for (const entity of entities) {
      if (!entity.active) continue;
      const key = `${entity.productGroupKey}\u0000${entity.channel}`;
      if (!seen.has(key)) {
        seen.set(key, { productGroupKey: entity.productGroupKey, channel: entity.channel });
      }
    }
    return [...seen.values()];
  }

  /** Threshold declared on the group's own-role entity for the channel, else the default. */
  static thresholdFor(pair: GroupChannel, entities: readonly WatchEntity[], fallback: number): number {
    const own = entities.find(
      e => e.role === 'own' && e.productGroupKey === pair.productGroupKey && e.channel === pair.channel
    );
    return own?.gapThreshold ?? fallback;
  }

  static identityKey(identity: AlertIdentity): string {
    return [identity.productGroupKey, identity.channel, identity.kind].join('\u0000');
  }
}

function formatPrice(value: number): string {
  return value.toFixed(2);
}

function formatPct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}
