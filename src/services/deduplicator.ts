import type { Alert, AlertIdentity, DedupPolicy } from '../types.js';

interface DeduplicatorConfig {
  windowMs: number;
  policy: DedupPolicy;
}

export class AlertDeduplicator {
  private config: DeduplicatorConfig;

  constructor(config: DeduplicatorConfig) {
    this.config = config;
  }

  get windowMs(): number {
    return this.config.windowMs;
  }

  /** Resolved alerts keep suppressing under `creation-window`; `open-only` ignores them. */
  get includesResolved(): boolean {
    return this.config.policy === 'creation-window';
  }

  windowStart(now: Date): Date {
    return new Date(now.getTime() - this.config.windowMs);
  }

  isDuplicate(candidate: AlertIdentity, recentAlerts: readonly Alert[], now: Date): boolean {
    const since = this.windowStart(now).getTime();

    return recentAlerts.some(
      alert =>
        alert.productGroupKey === candidate.productGroupKey &&
        alert.channel === candidate.channel &&
        alert.kind === candidate.kind &&
        alert.createdAt.getTime() >= since &&
        (this.includesResolved || !alert.resolved)
    );
  }
}
