import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AlertEmitter, GAP_ALERT_KIND } from '../../src/services/alert-emitter.js';
import { Database } from '../../src/services/database.js';
import { AlertDeduplicator } from '../../src/services/deduplicator.js';
import { GapEvaluator } from '../../src/services/gap-evaluator.js';
import type { DedupPolicy, WatchEntityInput } from '../../src/types.js';

const DAY_MS = 86_400_000;
const NOW = new Date('2026-01-01T12:00:00.000Z');
const ROUND = new Date('2026-01-01T11:00:00.000Z');
const later = (ms: number) => new Date(NOW.getTime() + ms);

const entity = (overrides: Partial<WatchEntityInput> = {}): WatchEntityInput => ({
  productGroupKey: 'PAN-28',
  channel: 'marketplace',
  role: 'own',
  endpointRef: 'LST-1',
  pollFrequencyMinutes: 60,
  gapThreshold: 0.1,
  active: true,
  ...overrides,
});

describe('AlertEmitter', () => {
  let db: Database;

  const createEmitter = (policy: DedupPolicy = 'creation-window') =>
    new AlertEmitter(db, new GapEvaluator(), new AlertDeduplicator({ windowMs: DAY_MS, policy }), {
      defaultGapThreshold: 0.1,
      concurrency: 2,
    });

  const seedGroup = async (productGroupKey: string, ownPrice: number, competitorPrice: number, gapThreshold = 0.1) => {
    await db.upsertWatchEntities([
      entity({ productGroupKey, gapThreshold }),
      entity({
        productGroupKey,
        role: 'competitor',
        endpointRef: 'https://rival.example/pan',
        competitorLabel: 'Rival',
        gapThreshold,
      }),
    ]);
    await db.recordObservation({
      productGroupKey,
      channel: 'marketplace',
      role: 'own',
      endpointRef: 'LST-1',
      price: ownPrice,
      currency: 'CLP',
      capturedAt: ROUND,
    });
    await db.recordObservation({
      productGroupKey,
      channel: 'marketplace',
      role: 'competitor',
      endpointRef: 'https://rival.example/pan',
      competitorLabel: 'Rival',
      price: competitorPrice,
      currency: 'CLP',
      capturedAt: ROUND,
    });
  };

  beforeEach(() => {
    db = new Database(':memory:');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  it('creates an alert when the gap exceeds the threshold', async () => {
    await seedGroup('PAN-28', 120, 100);

    const report = await createEmitter().run(NOW);

    expect(report.evaluated).toBe(1);
    expect(report.alerts).toHaveLength(1);
    expect(report.alerts[0]).toMatchObject({
      productGroupKey: 'PAN-28',
      channel: 'marketplace',
      kind: GAP_ALERT_KIND,
      ownPrice: 120,
      minCompetitorPrice: 100,
      endpointOwn: 'LST-1',
      endpointMinCompetitor: 'https://rival.example/pan',
      resolved: false,
    });
    expect(report.alerts[0]?.detail).toBe(
      'PAN-28 on marketplace: own price 120.00 vs min competitor 100.00 (Rival), gap 20.00% over threshold 10.00%'
    );
    expect(report.alerts[0]?.createdAt.toISOString()).toBe(NOW.toISOString());
  });

  it('does not alert on a gap below the threshold', async () => {
    await seedGroup('PAN-28', 100, 95);

    const report = await createEmitter().run(NOW);

    expect(report.alerts).toEqual([]);
    expect(report.skipped).toBe(1);
  });

  it('does not alert when the gap equals the threshold', async () => {
    await seedGroup('PAN-28', 110, 100);

    const report = await createEmitter().run(NOW);

    expect(report.alerts).toEqual([]);
    expect(report.skipped).toBe(1);
  });

  it('compares decimal prices exactly at the threshold boundary', async () => {
    await seedGroup('PAN-28', 1.1, 1, 0.1);
    await seedGroup('PAN-32', 1.08, 1, 0.08);

    const report = await createEmitter().run(NOW);

    expect(report.alerts).toEqual([]);
    expect(report.skipped).toBe(2);
    expect(await db.countOpenAlerts()).toBe(0);
  });

  it('alerts on a decimal price just past the threshold', async () => {
    await seedGroup('PAN-28', 1.11, 1, 0.1);

    const report = await createEmitter().run(NOW);

    expect(report.alerts).toHaveLength(1);
    expect(report.alerts[0]?.ownPrice).toBe(1.11);
  });

  it('uses the threshold declared on the own entity', async () => {
    await seedGroup('PAN-28', 120, 100, 0.25);

    const report = await createEmitter().run(NOW);

    expect(report.alerts).toEqual([]);
    expect(report.skipped).toBe(1);
  });

  it('skips pairs without competitor data', async () => {
    await db.upsertWatchEntities([entity()]);
    await db.recordObservation({
      productGroupKey: 'PAN-28',
      channel: 'marketplace',
      role: 'own',
      endpointRef: 'LST-1',
      price: 120,
      currency: 'CLP',
      capturedAt: ROUND,
    });

    const report = await createEmitter().run(NOW);

    expect(report).toEqual({ alerts: [], evaluated: 1, suppressed: 0, skipped: 1, failures: [] });
  });

  it('emits a single alert across repeated cycles inside the window', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter();

    const first = await emitter.run(NOW);
    const second = await emitter.run(later(60 * 60_000));

    expect(first.alerts).toHaveLength(1);
    expect(second.alerts).toEqual([]);
    expect(second.suppressed).toBe(1);
    expect(await db.countOpenAlerts()).toBe(1);
  });

  it('alerts again once the window has passed', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter();

    await emitter.run(NOW);
    const next = await emitter.run(later(DAY_MS + 1));

    expect(next.alerts).toHaveLength(1);
    expect(next.alerts[0]?.id).toBe(2);
  });

  it('keeps suppressing after a resolution under the creation-window policy', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter('creation-window');

    const first = await emitter.run(NOW);
    await db.resolveAlert(first.alerts[0]?.id ?? 0);
    const second = await emitter.run(later(60_000));

    expect(second.alerts).toEqual([]);
    expect(second.suppressed).toBe(1);
  });

  it('alerts again after a resolution under the open-only policy', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter('open-only');

    const first = await emitter.run(NOW);
    await db.resolveAlert(first.alerts[0]?.id ?? 0);
    const second = await emitter.run(later(60_000));

    expect(second.alerts).toHaveLength(1);
  });

  it('creates one alert when two cycles run at the same time', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter();

    const [a, b] = await Promise.all([emitter.run(NOW), emitter.run(NOW)]);

    expect(a.alerts.length + b.alerts.length).toBe(1);
    expect(a.suppressed + b.suppressed).toBe(1);
    expect(await db.countOpenAlerts()).toBe(1);
  });

  it('treats a store-level duplicate as suppressed', async () => {
    await seedGroup('PAN-28', 120, 100);
    const emitter = createEmitter();
    await emitter.run(NOW);
    vi.spyOn(db, 'alertsSince').mockResolvedValue([]);

    const outcome = await emitter.evaluatePair({ productGroupKey: 'PAN-28', channel: 'marketplace' }, 0.1, later(1000));

    expect(outcome).toEqual({ status: 'suppressed', reason: 'concurrent_duplicate' });
    expect(await db.countOpenAlerts()).toBe(1);
  });

  it('isolates a failing pair from the rest of the cycle', async () => {
    await seedGroup('PAN-28', 120, 100);
    await seedGroup('PAN-32', 130, 100);
    const failure = new Error('read timeout');
    const original = db.latestOwnObservation.bind(db);
    vi.spyOn(db, 'latestOwnObservation').mockImplementation(async (productGroupKey, channel) =>
      productGroupKey === 'PAN-28' ? Promise.reject(failure) : original(productGroupKey, channel)
    );

    const report = await createEmitter().run(NOW);

    expect(report.evaluated).toBe(2);
    expect(report.alerts.map(a => a.productGroupKey)).toEqual(['PAN-32']);
    expect(report.failures).toEqual([{ productGroupKey: 'PAN-28', channel: 'marketplace', error: failure }]);
  });

  it('only evaluates the requested pairs', async () => {
    await seedGroup('PAN-28', 120, 100);
    await seedGroup('PAN-32', 130, 100);

    const report = await createEmitter().run(NOW, [{ productGroupKey: 'PAN-32', channel: 'marketplace' }]);

    expect(report.evaluated).toBe(1);
    expect(report.alerts.map(a => a.productGroupKey)).toEqual(['PAN-32']);
  });

  describe('static helpers', () => {
    it('derives one pair per group and channel from active entities', () => {
      const pairs = AlertEmitter.activePairs([
        { ...entity(), id: 1 },
        { ...entity({ role: 'competitor', competitorLabel: 'Rival' }), id: 2 },
        { ...entity({ channel: 'webstore' }), id: 3 },
        { ...entity({ productGroupKey: 'PAN-32', active: false }), id: 4 },
      ]);

      expect(pairs).toEqual([
        { productGroupKey: 'PAN-28', channel: 'marketplace' },
        { productGroupKey: 'PAN-28', channel: 'webstore' },
      ]);
    });

    it('falls back to the default threshold without an own entity', () => {
      const competitorOnly = [{ ...entity({ role: 'competitor', gapThreshold: 0.3 }), id: 1 }];

      expect(
        AlertEmitter.thresholdFor({ productGroupKey: 'PAN-28', channel: 'marketplace' }, competitorOnly, 0.15)
      ).toBe(0.15);
    });

    it('labels an unnamed competitor by its endpoint', () => {
      const base = {
        id: 1,
        productGroupKey: 'PAN-28',
        channel: 'marketplace',
        currency: 'CLP',
        capturedAt: ROUND,
      };
      const draft = AlertEmitter.buildAlert(
        { productGroupKey: 'PAN-28', channel: 'marketplace', kind: GAP_ALERT_KIND },
        {
          ownPrice: 150,
          minCompetitorPrice: 100,
          gapPct: 0.5,
          ownObservation: { ...base, role: 'own', endpointRef: 'LST-1', price: 150 },
          chosenCompetitorObservation: { ...base, id: 2, role: 'competitor', endpointRef: 'RIVAL-9', price: 100 },
        },
        0.1,
        NOW
      );

      expect(draft.detail).toBe(
        'PAN-28 on marketplace: own price 150.00 vs min competitor 100.00 (RIVAL-9), gap 50.00% over threshold 10.00%'
      );
      expect(draft.endpointMinCompetitor).toBe('RIVAL-9');
    });
  });
});
