import type { Logger } from '@workspace/logger';

type PoolCounter =
  | 'sessions.created'
  | 'sessions.recycled'
  | 'provisioning.failed'
  | 'teardown.failed'
  | 'pages.served'
  | 'pages.failed'
  | 'acquire.timeout';

type PoolGauge = 'acquire.waiting' | 'sessions.ready' | 'sessions.busy';

type PoolMetricSnapshot = {
  counters: Partial<Record<PoolCounter, number>>;
  gauges: Partial<Record<PoolGauge, number>>;
  provisioning: {
    count: number;
    min: number;
    max: number;
    avg: number;
  };
};

export class PoolMetrics {
  private readonly counters: Map<PoolCounter, number>;
  private readonly gauges: Map<PoolGauge, number>;
  private readonly provisioningDurations: number[];

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.provisioningDurations = [];
  }

  increment(counter: PoolCounter, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  gauge(name: PoolGauge, value: number): void {
    this.gauges.set(name, value);
  }

  recordProvisioning(ms: number): void {
    this.provisioningDurations.push(ms);
  }

  count(counter: PoolCounter): number {
    return this.counters.get(counter) ?? 0;
  }

  snapshot(): PoolMetricSnapshot {
    const counters: Partial<Record<PoolCounter, number>> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const gauges: Partial<Record<PoolGauge, number>> = {};
    for (const [key, value] of this.gauges) {
      gauges[key] = value;
    }

    const count = this.provisioningDurations.length;
    const total = this.provisioningDurations.reduce((sum, value) => sum + value, 0);

    return {
      counters,
      gauges,
      provisioning: {
        count,
        min: count > 0 ? Math.min(...this.provisioningDurations) : 0,
        max: count > 0 ? Math.max(...this.provisioningDurations) : 0,
        avg: count > 0 ? total / count : 0,
      },
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('Pool metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.provisioningDurations.length = 0;
  }
}

export type { PoolCounter, PoolGauge, PoolMetricSnapshot };
