import type { Logger } from '@workspace/logger';

type CrawlCounter =
  | 'requests.total'
  | 'requests.success'
  | 'requests.rateLimited'
  | 'requests.serverError'
  | 'requests.networkError'
  | 'requests.malformed'
  | 'requests.clientError'
  | 'prefixes.explored'
  | 'prefixes.skipped'
  | 'prefixes.abandoned'
  | 'names.discovered';

type CrawlGauge = 'frontier.size' | 'delay.ms';

type MetricSnapshot = {
  counters: Partial<Record<CrawlCounter, number>>;
  gauges: Partial<Record<CrawlGauge, number>>;
  durations: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

export class CrawlMetrics {
  private readonly counters: Map<CrawlCounter, number>;
  private readonly gauges: Map<CrawlGauge, number>;
  private readonly durations: { count: number; min: number; max: number; total: number };

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durations = { count: 0, min: 0, max: 0, total: 0 };
  }

  increment(counter: CrawlCounter, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: CrawlCounter): number {
    return this.counters.get(counter) ?? 0;
  }

  gauge(name: CrawlGauge, value: number): void {
    this.gauges.set(name, value);
  }

  // Running aggregates only: a crawl issues far too many requests to keep samples
  recordDuration(ms: number): void {
    const durations = this.durations;
    durations.min = durations.count === 0 ? ms : Math.min(durations.min, ms);
    durations.max = durations.count === 0 ? ms : Math.max(durations.max, ms);
    durations.count += 1;
    durations.total += ms;
  }

  perMinute(counter: CrawlCounter, elapsedMs: number): number {
    const minutes = Math.max(elapsedMs / 60_000, 0.01);
    return this.count(counter) / minutes;
  }

  snapshot(): MetricSnapshot {
    const counters: Partial<Record<CrawlCounter, number>> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const gauges: Partial<Record<CrawlGauge, number>> = {};
    for (const [key, value] of this.gauges) {
      gauges[key] = value;
    }

    const { count, min, max, total } = this.durations;

    return {
      counters,
      gauges,
      durations: { count, min, max, avg: count > 0 ? total / count : 0, total },
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('[Metrics]', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durations.count = 0;
    this.durations.min = 0;
    this.durations.max = 0;
    this.durations.total = 0;
  }
}

export type { CrawlCounter, CrawlGauge, MetricSnapshot };
