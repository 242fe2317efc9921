import type { SchedulingMode, WatchEntity } from '../types.js';
import type { AlertCycleReport, AlertEmitter } from './alert-emitter.js';
import { selectDue } from './scheduler.js';
import type { SnapshotStore } from './snapshot-store.js';

/**
 * Driver-facing entry points: which entities to poll now, and one alert pass over
 * everything that has been observed. Neither call writes entities or observations.
 */
export class WatchEngine {
  private store: SnapshotStore;
  private emitter: AlertEmitter;

  constructor(store: SnapshotStore, emitter: AlertEmitter) {
    this.store = store;
    this.emitter = emitter;
  }

  async selectDueEntities(now: Date, mode: SchedulingMode = 'both'): Promise<WatchEntity[]> {
    const entities = await this.store.listActiveWatchEntities();
    return selectDue(
      now,
      entities,
      entity => this.store.lastObservationTimestamp(entity.productGroupKey, entity.channel, entity.endpointRef, entity.role),
      mode
    );
  }

  async runAlertCycle(now: Date = new Date()): Promise<AlertCycleReport> {
    return this.emitter.run(now);
  }
}
