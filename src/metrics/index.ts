import type { EventRecord } from '../types.js';
import { renderGauge, renderHistogram, type GaugeSample, type Labels, type RenderOptions } from './prometheus.js';

type CounterMap = Record<string, number>;

type HistogramSnapshot = Record<string, number>;

type PrometheusHistogramOptions = RenderOptions & { metricName?: string };

type PrometheusGaugeOptions = PrometheusHistogramOptions;

type PrometheusLogLevelOptions = {
  labels?: Labels;
  levelMetricName?: string;
  levelHelp?: string;
  stateMetricName?: string;
  stateHelp?: string;
};

export type TestVerdict = 'passed' | 'failed' | 'skipped' | 'error';

type WindowCounts = { matched: number; missed: number };

type MetricsSnapshot = {
  events: {
    total: number;
    lastEventAt: string | null;
    byDetector: CounterMap;
    bySeverity: CounterMap;
  };
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  verification: {
    verdicts: Record<string, CounterMap>;
    failures: CounterMap;
    pagesReceived: number;
    windows: Record<string, WindowCounts>;
    elapsedMs: Record<string, HistogramSnapshot>;
  };
};

/** Pino levels in severity order; always exported, zero when unused. */
const LOG_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

/** Upper bounds in milliseconds for time spent capturing one combination. */
const ELAPSED_BUCKETS_MS = [50, 100, 250, 500, 1000, 1500, 2000, 5000] as const;

class Counter {
  private readonly counts = new Map<string, number>();

  add(key: string, by = 1) {
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  keys() {
    return this.counts.keys();
  }

  entries() {
    return this.counts.entries();
  }

  toJSON(): CounterMap {
    return Object.fromEntries([...this.counts].sort(([a], [b]) => a.localeCompare(b)));
  }
}

class Histogram {
  /** One slot per bound plus the overflow slot. */
  private readonly counts: number[];
  private sum = 0;

  constructor(private readonly buckets: readonly number[]) {
    this.counts = new Array<number>(buckets.length + 1).fill(0);
  }

  observe(value: number) {
    const slot = this.buckets.findIndex(bound => value < bound);
    this.counts[slot === -1 ? this.buckets.length : slot] += 1;
    if (Number.isFinite(value)) {
      this.sum += value;
    }
  }

  /** Non-empty buckets keyed `<50`, `50-100`, ..., `5000+`. */
  toJSON(): HistogramSnapshot {
    const snapshot: HistogramSnapshot = {};
    this.counts.forEach((count, slot) => {
      if (count > 0) {
        snapshot[this.label(slot)] = count;
      }
    });
    return snapshot;
  }

  toPrometheus(name: string, options: RenderOptions): string {
    return renderHistogram(name, { buckets: this.buckets, counts: this.counts, sum: this.sum }, options);
  }

  private label(slot: number): string {
    const upper = this.buckets[slot];
    const lower = this.buckets[slot - 1];
    if (upper === undefined) {
      return `${lower ?? 0}+`;
    }
    return lower === undefined ? `<${upper}` : `${lower}-${upper}`;
  }
}

function isoOrNull(ts: number | null): string | null {
  return ts ? new Date(ts).toISOString() : null;
}

class MetricsRegistry {
  private logLevels = new Counter();
  private levelChanges = new Counter();
  private currentLogLevel = 'info';
  private lastLevelChangeAt: number | null = null;
  private lastError: { at: number; message: string | null } | null = null;

  private totalEvents = 0;
  private eventsByDetector = new Counter();
  private eventsBySeverity = new Counter();
  private lastEventAt: number | null = null;

  private verdicts = new Map<string, Counter>();
  private failures = new Counter();
  private windows = new Map<string, WindowCounts>();
  private pagesReceived = 0;
  private histograms = new Map<string, Histogram>();

  private readonly resetListeners = new Set<() => void>();

  reset() {
    this.logLevels = new Counter();
    this.levelChanges = new Counter();
    this.currentLogLevel = 'info';
    this.lastLevelChangeAt = null;
    this.lastError = null;
    this.totalEvents = 0;
    this.eventsByDetector = new Counter();
    this.eventsBySeverity = new Counter();
    this.lastEventAt = null;
    this.verdicts = new Map();
    this.failures = new Counter();
    this.windows = new Map();
    this.pagesReceived = 0;
    this.histograms = new Map();
    this.resetListeners.forEach(listener => listener());
  }

  /** Lets owners of external state (the logger's level) re-seed it after a reset. */
  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevels.add(normalized);
    if (normalized === 'error' || normalized === 'fatal') {
      this.lastError = { at: Date.now(), message: context?.message || (this.lastError?.message ?? null) };
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    this.currentLogLevel = normalized;
    if (!previous || previous.toLowerCase() === normalized) {
      return;
    }
    this.lastLevelChangeAt = Date.now();
    this.levelChanges.add(normalized);
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventAt = event.ts;
    this.eventsByDetector.add(event.detector);
    this.eventsBySeverity.add(event.severity);
  }

  recordVerdict(test: string, verdict: TestVerdict, failures: readonly string[] = []) {
    let byVerdict = this.verdicts.get(test);
    if (!byVerdict) {
      byVerdict = new Counter();
      this.verdicts.set(test, byVerdict);
    }
    byVerdict.add(verdict);
    failures.forEach(failure => this.failures.add(failure));
  }

  recordPageReceived(count = 1) {
    this.pagesReceived += count;
  }

  recordWindow(test: string, matched: boolean) {
    const counts = this.windows.get(test) ?? { matched: 0, missed: 0 };
    counts[matched ? 'matched' : 'missed'] += 1;
    this.windows.set(test, counts);
  }

  observeElapsed(test: string, elapsedMs: number) {
    this.observeHistogram(`audio.${test}.elapsed_ms`, elapsedMs);
  }

  observeHistogram(metric: string, value: number) {
    let histogram = this.histograms.get(metric);
    if (!histogram) {
      histogram = new Histogram(ELAPSED_BUCKETS_MS);
      this.histograms.set(metric, histogram);
    }
    histogram.observe(value);
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const { metricName, ...render } = options;
    return this.histograms.get(metric)?.toPrometheus(metricName ?? `loopback_${metric}`, render) ?? '';
  }

  exportLogLevelMetrics() {
    return {
      byLevel: this.logLevelTotals(),
      lastErrorAt: isoOrNull(this.lastError?.at ?? null),
      lastErrorMessage: this.lastError?.message ?? null,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: isoOrNull(this.lastLevelChangeAt),
      levelChanges: this.levelChanges.toJSON()
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const labels = options.labels ?? {};
    const levelSamples: GaugeSample[] = Object.entries(this.logLevelTotals()).map(([level, value], rank) => ({
      value,
      labels: { level },
      rank
    }));
    return [
      renderGauge(options.levelMetricName ?? 'loopback_log_level_total', levelSamples, {
        help: options.levelHelp ?? 'Total log events grouped by Pino level',
        labels
      }),
      renderGauge(
        options.stateMetricName ?? 'loopback_log_level_state',
        [{ value: 1, labels: { level: this.currentLogLevel } }],
        { help: options.stateHelp ?? 'Current active Pino log level', labels }
      )
    ]
      .filter(Boolean)
      .join('\n');
  }

  exportVerdictCountersForPrometheus(options: PrometheusGaugeOptions = {}) {
    const { metricName, ...render } = options;
    const samples = [...this.verdicts].flatMap(([test, byVerdict]) =>
      [...byVerdict.entries()].map(([verdict, value]) => ({ value, labels: { test, verdict } }))
    );
    return renderGauge(metricName ?? 'loopback_audio_verdicts_total', samples, {
      help: 'Audio test verdicts grouped by test and outcome',
      ...render
    });
  }

  snapshot(): MetricsSnapshot {
    const mapValues = <V, R>(source: Map<string, V>, project: (value: V) => R): Record<string, R> =>
      Object.fromEntries([...source].map(([key, value]) => [key, project(value)]));

    return {
      events: {
        total: this.totalEvents,
        lastEventAt: isoOrNull(this.lastEventAt),
        byDetector: this.eventsByDetector.toJSON(),
        bySeverity: this.eventsBySeverity.toJSON()
      },
      logs: {
        byLevel: this.logLevelTotals(),
        currentLevel: this.currentLogLevel,
        lastErrorAt: isoOrNull(this.lastError?.at ?? null),
        lastErrorMessage: this.lastError?.message ?? null
      },
      verification: {
        verdicts: mapValues(this.verdicts, counter => counter.toJSON()),
        failures: this.failures.toJSON(),
        pagesReceived: this.pagesReceived,
        windows: mapValues(this.windows, counts => ({ ...counts })),
        elapsedMs: mapValues(this.histograms, histogram => histogram.toJSON())
      }
    };
  }

  private logLevelTotals(): CounterMap {
    const totals: CounterMap = {};
    for (const level of LOG_LEVEL_ORDER) {
      totals[level] = this.logLevels.get(level);
    }
    const extras = [...this.logLevels.keys()].filter(level => !Object.hasOwn(totals, level)).sort((a, b) => a.localeCompare(b));
    for (const level of extras) {
      totals[level] = this.logLevels.get(level);
    }
    return totals;
  }
}

const defaultRegistry = new MetricsRegistry();

export type {
  HistogramSnapshot,
  MetricsSnapshot,
  PrometheusHistogramOptions,
  PrometheusGaugeOptions,
  PrometheusLogLevelOptions
};
export { MetricsRegistry };
export default defaultRegistry;
