import fs from 'node:fs';
import path from 'node:path';
import { CycleOrchestrator } from './monitors/index.js';
import { AlertEmitter } from './services/alert-emitter.js';
import type { AlertSink } from './services/alerter.js';
import { Database } from './services/database.js';
import { AlertDeduplicator } from './services/deduplicator.js';
import { WatchEngine } from './services/engine.js';
import { GapEvaluator } from './services/gap-evaluator.js';
import type { Config } from './types.js';
import { launchChromium, type BrowserLauncher } from './workers/browser-session.js';
import { loadChannelsConfig } from './workers/channel-config.js';

export interface WatchRuntime {
  db: Database;
  engine: WatchEngine;
  orchestrator: CycleOrchestrator;
}

export function openDatabase(databasePath: string): Database {
  if (databasePath !== ':memory:') {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }
  return new Database(databasePath);
}

export function createEngine(db: Database, config: Config): WatchEngine {
  const emitter = new AlertEmitter(
    db,
    new GapEvaluator(),
    new AlertDeduplicator({
      windowMs: config.monitoring.dedupWindowMs,
      policy: config.monitoring.dedupPolicy,
    }),
    {
      defaultGapThreshold: config.monitoring.defaultGapThreshold,
      concurrency: config.monitoring.evaluationConcurrency,
    }
  );
  return new WatchEngine(db, emitter);
}

export async function createRuntime(
  config: Config,
  sinks: AlertSink[],
  launcher: BrowserLauncher = launchChromium
): Promise<WatchRuntime> {
  const channels = await loadChannelsConfig(config.channelsConfigPath);
  const db = openDatabase(config.databasePath);
  const engine = createEngine(db, config);

  const orchestrator = new CycleOrchestrator({
    store: db,
    engine,
    channels,
    sinks,
    launcher,
    browser: config.browser,
    cycleIntervalMs: config.monitoring.cycleIntervalMs,
    watchlistPath: config.watchlistPath,
  });

  return { db, engine, orchestrator };
}
