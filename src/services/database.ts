import BetterSqlite3 from 'better-sqlite3';
import { DuplicateAlertError, StoreUnavailableError } from '../errors.js';
import type {
  Alert,
  AlertIdentity,
  AlertKind,
  NewAlert,
  NewPriceObservation,
  PriceObservation,
  Role,
  WatchEntity,
  WatchEntityInput,
} from '../types.js';
import type { AlertGuard, ObservationSink, SnapshotStore, UpsertResult, WatchlistTarget } from './snapshot-store.js';

export class Database implements SnapshotStore, ObservationSink, WatchlistTarget {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS watch_entities (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_group_key TEXT NOT NULL,
        channel TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('own', 'competitor')),
        endpoint_ref TEXT NOT NULL,
        competitor_label TEXT,
        poll_frequency_minutes INTEGER NOT NULL,
        gap_threshold REAL NOT NULL,
        active INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(product_group_key, channel, role, endpoint_ref)
      );

      CREATE TABLE IF NOT EXISTS price_observations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_group_key TEXT NOT NULL,
        channel TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('own', 'competitor')),
        endpoint_ref TEXT NOT NULL,
        competitor_label TEXT,
        price REAL NOT NULL,
        stock INTEGER,
        currency TEXT NOT NULL,
        captured_at TEXT NOT NULL,
        raw_payload TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_observations_group_role
        ON price_observations(product_group_key, channel, role, captured_at);
      CREATE INDEX IF NOT EXISTS idx_observations_endpoint
        ON price_observations(product_group_key, channel, endpoint_ref, role, captured_at);

      CREATE TABLE IF NOT EXISTS alerts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        product_group_key TEXT NOT NULL,
        channel TEXT NOT NULL,
        kind TEXT NOT NULL,
        detail TEXT NOT NULL,
        own_price REAL NOT NULL,
        min_competitor_price REAL NOT NULL,
        gap_pct REAL NOT NULL,
        endpoint_own TEXT NOT NULL,
        endpoint_min_competitor TEXT NOT NULL,
        created_at TEXT NOT NULL,
        resolved INTEGER NOT NULL DEFAULT 0,
        resolved_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_alerts_identity ON alerts(product_group_key, channel, kind, created_at);

      CREATE TABLE IF NOT EXISTS engine_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error: unknown) {
      if (error instanceof DuplicateAlertError || error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(operation, error);
    }
  }

  getState(key: string): string | null {
    return this.guard('getState', () => {
      const stmt = this.db.prepare('SELECT value FROM engine_state WHERE key = ?');
      const row = stmt.get(key) as { value: string } | undefined;
      return row?.value ?? null;
    });
  }

  setState(key: string, value: string): void {
    this.guard('setState', () => {
      const stmt = this.db.prepare(`
        INSERT INTO engine_state (key, value, updated_at)
        VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET
          value = excluded.value,
          updated_at = excluded.updated_at
      `);
      stmt.run(key, value, new Date().toISOString());
    });
  }

  async upsertWatchEntities(inputs: WatchEntityInput[]): Promise<UpsertResult> {
    return this.guard('upsertWatchEntities', () => {
      const exists = this.db.prepare(`
        SELECT id FROM watch_entities
        WHERE product_group_key = ? AND channel = ? AND role = ? AND endpoint_ref = ?
      `);
      const upsert = this.db.prepare(`
        INSERT INTO watch_entities (product_group_key, channel, role, endpoint_ref, competitor_label,
                                    poll_frequency_minutes, gap_threshold, active, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(product_group_key, channel, role, endpoint_ref) DO UPDATE SET
          competitor_label = excluded.competitor_label,
          poll_frequency_minutes = excluded.poll_frequency_minutes,
          gap_threshold = excluded.gap_threshold,
          active = excluded.active,
          updated_at = excluded.updated_at
      `);

      const apply = this.db.transaction((rows: WatchEntityInput[]) => {
        const result: UpsertResult = { inserted: 0, updated: 0 };
        const now = new Date().toISOString();
        for (const row of rows) {
          const existing = exists.get(row.productGroupKey, row.channel, row.role, row.endpointRef);
          upsert.run(
            row.productGroupKey,
            row.channel,
            row.role,
            row.endpointRef,
            row.competitorLabel ?? null,
            row.pollFrequencyMinutes,
            row.gapThreshold,
            row.active ? 1 : 0,
            now,
            now
          );
          if (existing) {
            result.updated++;
          } else {
            result.inserted++;
          }
        }
        return result;
      });

      return apply(inputs);
    });
  }

  async listActiveWatchEntities(): Promise<WatchEntity[]> {
    return this.guard('listActiveWatchEntities', () => {
      const stmt = this.db.prepare(`
        SELECT id, product_group_key, channel, role, endpoint_ref, competitor_label,
               poll_frequency_minutes, gap_threshold, active
        FROM watch_entities WHERE active = 1
        ORDER BY id
      `);
      return (stmt.all() as WatchEntityRow[]).map(toWatchEntity);
    });
  }

  async listWatchEntities(): Promise<WatchEntity[]> {
    return this.guard('listWatchEntities', () => {
      const stmt = this.db.prepare(`
        SELECT id, product_group_key, channel, role, endpoint_ref, competitor_label,
               poll_frequency_minutes, gap_threshold, active
        FROM watch_entities ORDER BY id
      `);
      return (stmt.all() as WatchEntityRow[]).map(toWatchEntity);
    });
  }

  async recordObservation(observation: NewPriceObservation): Promise<PriceObservation> {
    return this.guard('recordObservation', () => {
      const stmt = this.db.prepare(`
        INSERT INTO price_observations (product_group_key, channel, role, endpoint_ref, competitor_label,
                                        price, stock, currency, captured_at, raw_payload)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      const result = stmt.run(
        observation.productGroupKey,
        observation.channel,
        observation.role,
        observation.endpointRef,
        observation.competitorLabel ?? null,
        observation.price,
        observation.stock ?? null,
        observation.currency,
        observation.capturedAt.toISOString(),
        observation.rawPayload === undefined ? null : JSON.stringify(observation.rawPayload)
      );
      return { ...observation, id: Number(result.lastInsertRowid) };
    });
  }

  async lastObservationTimestamp(
    productGroupKey: string,
    channel: string,
    endpointRef: string,
    role: Role
  ): Promise<Date | undefined> {
    return this.guard('lastObservationTimestamp', () => {
      const stmt = this.db.prepare(`
        SELECT MAX(captured_at) AS last_seen FROM price_observations
        WHERE product_group_key = ? AND channel = ? AND endpoint_ref = ? AND role = ?
      `);
      const row = stmt.get(productGroupKey, channel, endpointRef, role) as { last_seen: string | null } | undefined;
      return row?.last_seen ? new Date(row.last_seen) : undefined;
    });
  }

  async latestOwnObservation(productGroupKey: string, channel: string): Promise<PriceObservation | undefined> {
    return this.guard('latestOwnObservation', () => {
      const stmt = this.db.prepare(`
        SELECT ${OBSERVATION_COLUMNS} FROM price_observations
        WHERE product_group_key = ? AND channel = ? AND role = 'own'
        ORDER BY captured_at DESC, id DESC LIMIT 1
      `);
      const row = stmt.get(productGroupKey, channel) as ObservationRow | undefined;
      return row ? toObservation(row) : undefined;
    });
  }

  async latestCompetitorObservationsAtMostRecentRound(
    productGroupKey: string,
    channel: string
  ): Promise<PriceObservation[]> {
    return this.guard('latestCompetitorObservationsAtMostRecentRound', () => {
      const stmt = this.db.prepare(`
        SELECT ${OBSERVATION_COLUMNS} FROM price_observations
        WHERE product_group_key = ? AND channel = ? AND role = 'competitor'
          AND captured_at = (
            SELECT MAX(captured_at) FROM price_observations
            WHERE product_group_key = ? AND channel = ? AND role = 'competitor'
          )
        ORDER BY id
      `);
      const rows = stmt.all(productGroupKey, channel, productGroupKey, channel) as ObservationRow[];
      return rows.map(toObservation);
    });
  }

  async unresolvedAlertsSince(identity: AlertIdentity, since: Date): Promise<Alert[]> {
    return this.guard('unresolvedAlertsSince', () => this.selectAlertsSince(identity, since, false));
  }

  async alertsSince(identity: AlertIdentity, since: Date): Promise<Alert[]> {
    return this.guard('alertsSince', () => this.selectAlertsSince(identity, since, true));
  }

  private selectAlertsSince(identity: AlertIdentity, since: Date, includeResolved: boolean): Alert[] {
    const stmt = this.db.prepare(`
      SELECT ${ALERT_COLUMNS} FROM alerts
      WHERE product_group_key = ? AND channel = ? AND kind = ? AND created_at >= ?
        ${includeResolved ? '' : 'AND resolved = 0'}
      ORDER BY created_at DESC, id DESC
    `);
    const rows = stmt.all(
      identity.productGroupKey,
      identity.channel,
      identity.kind,
      since.toISOString()
    ) as AlertRow[];
    return rows.map(toAlert);
  }

  async createAlert(alert: NewAlert, guard: AlertGuard): Promise<Alert> {
    return this.guard('createAlert', () => {
      const insert = this.db.prepare(`
        INSERT INTO alerts (product_group_key, channel, kind, detail, own_price, min_competitor_price,
                            gap_pct, endpoint_own, endpoint_min_competitor, created_at, resolved)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0)
      `);

      const create = this.db.transaction((draft: NewAlert): Alert => {
        if (this.selectAlertsSince(draft, guard.since, guard.includeResolved).length > 0) {
          throw new DuplicateAlertError({
            productGroupKey: draft.productGroupKey,
            channel: draft.channel,
            kind: draft.kind,
          });
        }
        const result = insert.run(
          draft.productGroupKey,
          draft.channel,
          draft.kind,
          draft.detail,
          draft.ownPrice,
          draft.minCompetitorPrice,
          draft.gapPct,
          draft.endpointOwn,
          draft.endpointMinCompetitor,
          draft.createdAt.toISOString()
        );
        return { ...draft, id: Number(result.lastInsertRowid), resolved: false };
      });

      // IMMEDIATE takes the write lock before the duplicate check so two processes cannot both pass it.
      return create.immediate(alert);
    });
  }

  async listOpenAlerts(limit = 25): Promise<Alert[]> {
    return this.guard('listOpenAlerts', () => {
      const stmt = this.db.prepare(`
        SELECT ${ALERT_COLUMNS} FROM alerts WHERE resolved = 0
        ORDER BY created_at DESC, id DESC LIMIT ?
      `);
      return (stmt.all(limit) as AlertRow[]).map(toAlert);
    });
  }

  async countOpenAlerts(): Promise<number> {
    return this.guard('countOpenAlerts', () => {
      const row = this.db.prepare('SELECT COUNT(*) AS count FROM alerts WHERE resolved = 0').get() as { count: number };
      return row.count;
    });
  }

  async resolveAlert(id: number): Promise<boolean> {
    return this.guard('resolveAlert', () => {
      const stmt = this.db.prepare(`
        UPDATE alerts SET resolved = 1, resolved_at = ? WHERE id = ? AND resolved = 0
      `);
      return stmt.run(new Date().toISOString(), id).changes > 0;
    });
  }

  async countWatchEntities(): Promise<{ total: number; active: number }> {
    return this.guard('countWatchEntities', () => {
      const row = this.db
        .prepare('SELECT COUNT(*) AS total, COALESCE(SUM(active), 0) AS active FROM watch_entities')
        .get() as { total: number; active: number };
      return { total: row.total, active: row.active };
    });
  }

  close(): void {
    this.db.close();
  }
}

const OBSERVATION_COLUMNS = `id, product_group_key, channel, role, endpoint_ref, competitor_label,
  price, stock, currency, captured_at, raw_payload`;

const ALERT_COLUMNS = `id, product_group_key, channel, kind, detail, own_price, min_competitor_price,
  gap_pct, endpoint_own, endpoint_min_competitor, created_at, resolved`;

interface WatchEntityRow {
  id: number;
  product_group_key: string;
  channel: string;
  role: Role;
  endpoint_ref: string;
  competitor_label: string | null;
  poll_frequency_minutes: number;
  gap_threshold: number;
  active: number;
}

interface ObservationRow {
  id: number;
  product_group_key: string;
  channel: string;
  role: Role;
  endpoint_ref: string;
  competitor_label: string | null;
  price: number;
  stock: number | null;
  currency: string;
  captured_at: string;
  raw_payload: string | null;
}

interface AlertRow {
  id: number;
  product_group_key: string;
  channel: string;
  kind: AlertKind;
  detail: string;
  own_price: number;
  min_competitor_price: number;
  gap_pct: number;
  endpoint_own: string;
  endpoint_min_competitor: string;
  created_at: string;
  resolved: number;
}

function toWatchEntity(row: WatchEntityRow): WatchEntity {
  return {
    id: row.id,
    productGroupKey: row.product_group_key,
    channel: row.channel,
    role: row.role,
    endpointRef: row.endpoint_ref,
    competitorLabel: row.competitor_label ?? undefined,
    pollFrequencyMinutes: row.poll_frequency_minutes,
    gapThreshold: row.gap_threshold,
    active: Boolean(row.active),
  };
}

function toObservation(row: ObservationRow): PriceObservation {
  return {
    id: row.id,
    productGroupKey: row.product_group_key,
    channel: row.channel,
    role: row.role,
    endpointRef: row.endpoint_ref,
    competitorLabel: row.competitor_label ?? undefined,
    price: row.price,
    stock: row.stock ?? undefined,
    currency: row.currency,
    capturedAt: new Date(row.captured_at),
    rawPayload: row.raw_payload === null ? undefined : JSON.parse(row.raw_payload),
  };
}

function toAlert(row: AlertRow): Alert {
  return {
    id: row.id,
    productGroupKey: row.product_group_key,
    channel: row.channel,
    kind: row.kind,
    detail: row.detail,
    ownPrice: row.own_price,
    minCompetitorPrice: row.min_competitor_price,
    gapPct: row.gap_pct,
    endpointOwn: row.endpoint_own,
    endpointMinCompetitor: row.endpoint_min_competitor,
    createdAt: new Date(row.created_at),
    resolved: Boolean(row.resolved),
  };
}
