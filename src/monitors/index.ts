import type { AlertSink } from '../services/alerter.js';
import { publishAlerts } from '../services/alerter.js';
import type { Database } from '../services/database.js';
import type { WatchEngine } from '../services/engine.js';
import { importWatchlist, loadWatchlistFile } from '../services/watchlist.js';
import type { SchedulingMode, WatchEntity } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { withBrowserSessions, type BrowserLauncher, type LaunchSettings } from '../workers/browser-session.js';
import type { ChannelsConfig } from '../workers/channel-config.js';
import type { FetchLike } from '../workers/sources.js';
import { buildChannelWorker, type FetchReport } from '../workers/index.js';

const log = createLogger('Monitor');

export const LAST_CYCLE_STATE_KEY = 'last_cycle';

export interface CycleOptions {
  channel?: string;
  mode?: SchedulingMode;
}

export interface CycleSummary {
  startedAt: string;
  finishedAt: string;
  due: number;
  fetches: FetchReport[];
  channelFailures: { channel: string; error: string }[];
  alertsCreated: number;
  suppressed: number;
  skipped: number;
  evaluationFailures: number;
  exported: number;
}

export interface OrchestratorOptions {
  store: Database;
  engine: WatchEngine;
  channels: ChannelsConfig;
  sinks: AlertSink[];
  launcher: BrowserLauncher;
  browser: LaunchSettings;
  cycleIntervalMs: number;
  watchlistPath?: string;
  fetchImpl?: FetchLike;
  clock?: () => Date;
}

export class CycleOrchestrator {
  private options: OrchestratorOptions;
  private intervalId: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  private now(): Date {
    return (this.options.clock ?? (() => new Date()))();
  }

  start(): void {
    log.info(`Starting cycle loop (interval: ${this.options.cycleIntervalMs}ms)`);

    this.tick();
    this.intervalId = setInterval(() => this.tick(), this.options.cycleIntervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      log.info('Stopped cycle loop');
    }
  }

  private tick(): void {
    this.runCycle().catch(error => log.error('Cycle aborted:', error));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Returns null when a previous cycle is still in progress. */
  async runCycle(options: CycleOptions = {}): Promise<CycleSummary | null> {
    if (this.running) {
      log.warn('Previous cycle still running, skipping');
      return null;
    }
    this.running = true;
    try {
      return await this.executeCycle(options);
    } finally {
      this.running = false;
    }
  }

  private async executeCycle(options: CycleOptions): Promise<CycleSummary> {
    const { store, engine, channels } = this.options;
    const startedAt = this.now();
    log.info('Running cycle...');

    await this.refreshWatchlist();

    const due = (await engine.selectDueEntities(startedAt, options.mode)).filter(
      entity => !options.channel || entity.channel === options.channel.trim().toLowerCase()
    );
    log.info(`${due.length} entities due`);

    const byChannel = new Map<string, WatchEntity[]>();
    for (const entity of due) {
      const list = byChannel.get(entity.channel) ?? [];
      list.push(entity);
      byChannel.set(entity.channel, list);
    }

    const fetches: FetchReport[] = [];
    const channelFailures: CycleSummary['channelFailures'] = [];

    if (byChannel.size > 0) {
      await withBrowserSessions(this.options.launcher, this.options.browser, async sessions => {
        const runs = [...byChannel.entries()].map(async ([channel, entities]) => {
          try {
            const worker = buildChannelWorker(channel, channels, {
              sink: store,
              sessions,
              fetchImpl: this.options.fetchImpl,
              clock: () => this.now(),
            });
            fetches.push(await worker.fetchOwnPrices(entities));
            fetches.push(await worker.fetchCompetitorPrices(entities));
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            log.error(`Channel ${channel} failed:`, error);
            channelFailures.push({ channel, error: message });
          }
        });
        await Promise.all(runs);
      });
    }

    const report = await engine.runAlertCycle(this.now());
    const exported = await publishAlerts(this.options.sinks, report.alerts);

    const summary: CycleSummary = {
      startedAt: startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      due: due.length,
      fetches,
      channelFailures,
      alertsCreated: report.alerts.length,
      suppressed: report.suppressed,
      skipped: report.skipped,
      evaluationFailures: report.failures.length,
      exported,
    };
    store.setState(LAST_CYCLE_STATE_KEY, JSON.stringify(summary));

    log.info(`Cycle complete. ${summary.alertsCreated} new alerts, ${summary.suppressed} suppressed.`);
    return summary;
  }

  private async refreshWatchlist(): Promise<void> {
    const { watchlistPath, store, channels } = this.options;
    if (!watchlistPath) return;

    try {
      const rows = await loadWatchlistFile(watchlistPath);
      const result = await importWatchlist(store, rows, channel => channels[channel] ?? {});
      log.info(`Watch list refreshed: ${result.inserted} new, ${result.updated} updated`);
      for (const rejected of result.rejected) {
        log.warn(`Watch list row ${rejected.row} skipped: ${rejected.reason}`);
      }
    } catch (error) {
      log.error(`Could not refresh watch list from ${watchlistPath}, using stored entities:`, error);
    }
  }
}
