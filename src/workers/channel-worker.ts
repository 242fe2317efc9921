import type { ObservationSink } from '../services/snapshot-store.js';
import type { Role, WatchEntity } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { runPool } from '../utils/pool.js';
import type { BrowserSessions } from './browser-session.js';
import type { ChannelSettings, SourceSettings } from './channel-config.js';
import { ApiPriceSource, BrowserPriceSource, type FetchLike, type PriceSource } from './sources.js';

const log = createLogger('Worker');

export interface FetchReport {
  channel: string;
  role: Role;
  recorded: number;
  failed: number;
  skipped: number;
}

/** Per-channel price collection. Each capability records observations for the entities it is handed. */
export interface ChannelWorker {
  readonly channel: string;
  fetchOwnPrices(entities: readonly WatchEntity[]): Promise<FetchReport>;
  fetchCompetitorPrices(entities: readonly WatchEntity[]): Promise<FetchReport>;
}

export interface ChannelWorkerDeps {
  sink: ObservationSink;
  sessions: BrowserSessions;
  fetchImpl?: FetchLike;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
}

export class ConfiguredChannelWorker implements ChannelWorker {
  readonly channel: string;
  private settings: ChannelSettings;
  private deps: ChannelWorkerDeps;

  constructor(channel: string, settings: ChannelSettings, deps: ChannelWorkerDeps) {
    this.channel = channel;
    this.settings = settings;
    this.deps = deps;
  }

  fetchOwnPrices(entities: readonly WatchEntity[]): Promise<FetchReport> {
    return this.collect('own', entities);
  }

  fetchCompetitorPrices(entities: readonly WatchEntity[]): Promise<FetchReport> {
    return this.collect('competitor', entities);
  }

  private createSource(settings: SourceSettings): PriceSource {
    if (settings.type === 'api') {
      return new ApiPriceSource(settings, this.settings.userAgent, this.deps.fetchImpl);
    }
    return new BrowserPriceSource(settings, this.deps.sessions, this.settings.userAgent);
  }

  private async collect(role: Role, entities: readonly WatchEntity[]): Promise<FetchReport> {
    const targets = entities.filter(e => e.role === role && e.channel === this.channel);
    const report: FetchReport = { channel: this.channel, role, recorded: 0, failed: 0, skipped: 0 };
    if (targets.length === 0) return report;

    const sourceSettings = this.settings[role];
    if (!sourceSettings) {
      log.warn(`No ${role} source configured for ${this.channel}; skipping ${targets.length} entities`);
      report.skipped = targets.length;
      return report;
    }

    const source = this.createSource(sourceSettings);
    // One timestamp per call so every competitor scraped together forms a single round.
    const capturedAt = (this.deps.clock ?? (() => new Date()))();

    const results = await runPool(
      targets,
      async entity => {
        const reading = await source.read(entity);
        await this.deps.sink.recordObservation({
          productGroupKey: entity.productGroupKey,
          channel: entity.channel,
          role,
          endpointRef: entity.endpointRef,
          competitorLabel: entity.competitorLabel,
          price: reading.price,
          stock: reading.stock,
          currency: reading.currency ?? this.settings.currency,
          capturedAt,
          rawPayload: reading.rawPayload,
        });
      },
      { concurrency: this.settings.concurrency, throttleMs: this.settings.throttleMs, sleep: this.deps.sleep }
    );

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        report.recorded++;
        return;
      }
      report.failed++;
      log.error(`${this.channel} ${role} fetch failed for ${targets[index]?.endpointRef}:`, result.reason);
    });

    log.info(`${this.channel} ${role}: recorded ${report.recorded}, failed ${report.failed}`);
    return report;
  }
}
