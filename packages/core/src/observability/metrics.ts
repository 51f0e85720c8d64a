/**
 * In-process metrics
 *
 * Prometheus-compatible counters, gauges and histograms for the job cache
 * and broadcast hub. Each container owns its own registry.
 */

type Labels = Record<string, string>;

// ============================================================================
// LABELLED SERIES
// ============================================================================

abstract class LabeledMetric {
  constructor(
    public readonly name: string,
    public readonly help: string,
    public readonly labels: string[] = []
  ) {}

  protected labelsToKey(labels: Labels): string {
    return this.labels.map((l) => labels[l] ?? '').join('\u0000');
  }

  protected keyToLabels(key: string): Labels {
    const values = key.split('\u0000');
    return Object.fromEntries(this.labels.map((l, i) => [l, values[i] ?? '']));
  }
}

// ============================================================================
// COUNTER
// ============================================================================

export class Counter extends LabeledMetric {
  private values = new Map<string, number>();

  inc(labels: Labels = {}, amount = 1): void {
    const key = this.labelsToKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  get(labels: Labels = {}): number {
    return this.values.get(this.labelsToKey(labels)) ?? 0;
  }

  reset(): void {
    this.values.clear();
  }

  getAll(): { labels: Labels; value: number }[] {
    return Array.from(this.values.entries()).map(([key, value]) => ({
      labels: this.keyToLabels(key),
      value,
    }));
  }
}

// ============================================================================
// GAUGE
// ============================================================================

export class Gauge extends LabeledMetric {
  private values = new Map<string, number>();

  set(value: number, labels: Labels = {}): void {
    this.values.set(this.labelsToKey(labels), value);
  }

  inc(labels: Labels = {}, amount = 1): void {
    const key = this.labelsToKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  dec(labels: Labels = {}, amount = 1): void {
    this.inc(labels, -amount);
  }

  get(labels: Labels = {}): number {
    return this.values.get(this.labelsToKey(labels)) ?? 0;
  }

  reset(): void {
    this.values.clear();
  }

  getAll(): { labels: Labels; value: number }[] {
    return Array.from(this.values.entries()).map(([key, value]) => ({
      labels: this.keyToLabels(key),
      value,
    }));
  }
}

// ============================================================================
// HISTOGRAM
// ============================================================================

interface HistogramSeries {
  bucketCounts: number[];
  sum: number;
  count: number;
}

export class Histogram extends LabeledMetric {
  private readonly buckets: number[];
  private series = new Map<string, HistogramSeries>();

  constructor(
    name: string,
    help: string,
    labels: string[] = [],
    buckets: number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60]
  ) {
    super(name, help, labels);
    this.buckets = [...buckets].sort((a, b) => a - b);
  }

  observe(value: number, labels: Labels = {}): void {
    const key = this.labelsToKey(labels);
    let series = this.series.get(key);
    if (!series) {
      series = { bucketCounts: this.buckets.map(() => 0), sum: 0, count: 0 };
      this.series.set(key, series);
    }

    series.bucketCounts = series.bucketCounts.map((count, i) => {
      const le = this.buckets[i] ?? Number.POSITIVE_INFINITY;
      return value <= le ? count + 1 : count;
    });
    series.sum += value;
    series.count++;
  }

  /**
   * Timer helper - returns a function to call when done, observing seconds
   */
  startTimer(labels: Labels = {}): (extraLabels?: Labels) => number {
    const start = performance.now();
    return (extraLabels: Labels = {}) => {
      const duration = (performance.now() - start) / 1000;
      this.observe(duration, { ...labels, ...extraLabels });
      return duration;
    };
  }

  reset(): void {
    this.series.clear();
  }

  getAll(): {
    labels: Labels;
    buckets: { le: number; count: number }[];
    sum: number;
    count: number;
  }[] {
    return Array.from(this.series.entries()).map(([key, series]) => ({
      labels: this.keyToLabels(key),
      buckets: this.buckets.map((le, i) => ({ le, count: series.bucketCounts[i] ?? 0 })),
      sum: series.sum,
      count: series.count,
    }));
  }
}

// ============================================================================
// METRICS REGISTRY
// ============================================================================

export class MetricsRegistry {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();
  private collectors = new Set<() => void>();

  /**
   * Register a callback that refreshes derived values before each export
   */
  addCollector(collector: () => void): () => void {
    this.collectors.add(collector);
    return () => {
      this.collectors.delete(collector);
    };
  }

  counter(name: string, help: string, labels: string[] = []): Counter {
    const existing = this.counters.get(name);
    if (existing) return existing;
    const counter = new Counter(name, help, labels);
    this.counters.set(name, counter);
    return counter;
  }

  gauge(name: string, help: string, labels: string[] = []): Gauge {
    const existing = this.gauges.get(name);
    if (existing) return existing;
    const gauge = new Gauge(name, help, labels);
    this.gauges.set(name, gauge);
    return gauge;
  }

  histogram(name: string, help: string, labels: string[] = [], buckets?: number[]): Histogram {
    const existing = this.histograms.get(name);
    if (existing) return existing;
    const histogram = new Histogram(name, help, labels, buckets);
    this.histograms.set(name, histogram);
    return histogram;
  }

  /**
   * Export all metrics in Prometheus text format
   */
  toPrometheusText(): string {
    for (const collect of this.collectors) {
      collect();
    }
    const lines: string[] = [];

    for (const counter of this.counters.values()) {
      lines.push(`# HELP ${counter.name} ${counter.help}`);
      lines.push(`# TYPE ${counter.name} counter`);
      for (const { labels, value } of counter.getAll()) {
        lines.push(`${counter.name}${this.formatLabels(labels)} ${value}`);
      }
    }

    for (const gauge of this.gauges.values()) {
      lines.push(`# HELP ${gauge.name} ${gauge.help}`);
      lines.push(`# TYPE ${gauge.name} gauge`);
      for (const { labels, value } of gauge.getAll()) {
        lines.push(`${gauge.name}${this.formatLabels(labels)} ${value}`);
      }
    }

    for (const histogram of this.histograms.values()) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`);
      lines.push(`# TYPE ${histogram.name} histogram`);
      for (const { labels, buckets, sum, count } of histogram.getAll()) {
        for (const { le, count: bucketCount } of buckets) {
          const labelStr = this.formatLabels({ ...labels, le: String(le) });
          lines.push(`${histogram.name}_bucket${labelStr} ${bucketCount}`);
        }
        const infLabels = this.formatLabels({ ...labels, le: '+Inf' });
        lines.push(`${histogram.name}_bucket${infLabels} ${count}`);
        lines.push(`${histogram.name}_sum${this.formatLabels(labels)} ${sum}`);
        lines.push(`${histogram.name}_count${this.formatLabels(labels)} ${count}`);
      }
    }

    return lines.join('\n');
  }

  private formatLabels(labels: Labels): string {
    const entries = Object.entries(labels).filter(([, v]) => v !== '');
    if (entries.length === 0) return '';
    return `{${entries.map(([k, v]) => `${k}="${v}"`).join(',')}}`;
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    for (const counter of this.counters.values()) counter.reset();
    for (const gauge of this.gauges.values()) gauge.reset();
    for (const histogram of this.histograms.values()) histogram.reset();
  }
}

// ============================================================================
// ORCHESTRATION METRICS
// ============================================================================

export interface OrchestrationMetrics {
  registry: MetricsRegistry;
  /** Cache lookups by outcome: hit, miss, join, negative_hit */
  cacheLookups: Counter;
  /** Cache entries by state */
  cacheEntries: Gauge;
  /** Compute duration in seconds by outcome: success, failure */
  computeDuration: Histogram;
  /** Entries removed by reason: expired, evicted, invalidated */
  cacheRemovals: Counter;
  /** Caller waits abandoned at the deadline */
  waitTimeouts: Counter;
  /** Events published by type */
  eventsPublished: Counter;
  /** Events handed to subscriber queues */
  eventsDelivered: Counter;
  /** Events dropped by drop-oldest backpressure */
  eventsDropped: Counter;
  /** Registered subscribers */
  subscribers: Gauge;
}

/**
 * Register the orchestration metrics on a registry
 */
export function createOrchestrationMetrics(
  registry: MetricsRegistry = new MetricsRegistry()
): OrchestrationMetrics {
  return {
    registry,
    cacheLookups: registry.counter(
      'carelens_analysis_cache_lookups_total',
      'Analysis cache lookups by outcome',
      ['outcome']
    ),
    cacheEntries: registry.gauge(
      'carelens_analysis_cache_entries',
      'Analysis cache entries by state',
      ['state']
    ),
    computeDuration: registry.histogram(
      'carelens_analysis_compute_duration_seconds',
      'Duration of analysis computations',
      ['outcome']
    ),
    cacheRemovals: registry.counter(
      'carelens_analysis_cache_removals_total',
      'Analysis cache entries removed by reason',
      ['reason']
    ),
    waitTimeouts: registry.counter(
      'carelens_analysis_wait_timeouts_total',
      'Callers that stopped waiting at their deadline'
    ),
    eventsPublished: registry.counter(
      'carelens_broadcast_events_published_total',
      'Broadcast events published by type',
      ['type']
    ),
    eventsDelivered: registry.counter(
      'carelens_broadcast_events_delivered_total',
      'Broadcast events queued for subscribers'
    ),
    eventsDropped: registry.counter(
      'carelens_broadcast_events_dropped_total',
      'Broadcast events dropped by backpressure'
    ),
    subscribers: registry.gauge('carelens_broadcast_subscribers', 'Registered broadcast subscribers'),
  };
}
