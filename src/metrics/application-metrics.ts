/**
 * Application metrics: counters and duration histograms keyed by tag set
 *
 * One instance is built per process and handed to every component that
 * records something. Recording never throws and never changes control flow.
 */

export type MetricTags = Record<string, string>;

export interface CounterSample {
  tags: MetricTags;
  value: number;
}

export interface HistogramSample {
  tags: MetricTags;
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Record<string, CounterSample[]>;
  histograms: Record<string, HistogramSample[]>;
}

export const METRIC_NAMES = {
  cacheHits: 'cache.hits',
  cacheMisses: 'cache.misses',
  weatherApiCalls: 'weather.api.calls',
  sunnyForecasts: 'weather.sunny.count',
  apiCallDuration: 'api.call.duration',
} as const;

export class Counter {
  private readonly series = new Map<string, CounterSample>();

  constructor(readonly name: string, readonly unit: string) {}

  add(value: number, tags: MetricTags = {}): void {
    const key = tagKey(tags);
    const sample = this.series.get(key);
    if (sample) {
      sample.value += value;
      return;
    }
    this.series.set(key, { tags: { ...tags }, value });
  }

  /** Value for an exact tag set, 0 when never recorded */
  value(tags: MetricTags = {}): number {
    return this.series.get(tagKey(tags))?.value ?? 0;
  }

  samples(): CounterSample[] {
    return [...this.series.values()].map((sample) => ({ tags: { ...sample.tags }, value: sample.value }));
  }
}

export class Histogram {
  private readonly series = new Map<string, HistogramSample>();

  constructor(readonly name: string, readonly unit: string) {}

  record(value: number, tags: MetricTags = {}): void {
    const key = tagKey(tags);
    const sample = this.series.get(key);
    if (sample) {
      sample.count += 1;
      sample.sum += value;
      sample.min = Math.min(sample.min, value);
      sample.max = Math.max(sample.max, value);
      return;
    }
    this.series.set(key, { tags: { ...tags }, count: 1, sum: value, min: value, max: value });
  }

  get(tags: MetricTags = {}): HistogramSample | undefined {
    const sample = this.series.get(tagKey(tags));
    return sample ? { ...sample, tags: { ...sample.tags } } : undefined;
  }

  samples(): HistogramSample[] {
    return [...this.series.values()].map((sample) => ({ ...sample, tags: { ...sample.tags } }));
  }
}

export class ApplicationMetrics {
  readonly cacheHits = new Counter(METRIC_NAMES.cacheHits, 'hits');
  readonly cacheMisses = new Counter(METRIC_NAMES.cacheMisses, 'misses');
  readonly weatherApiCalls = new Counter(METRIC_NAMES.weatherApiCalls, 'calls');
  readonly sunnyForecasts = new Counter(METRIC_NAMES.sunnyForecasts, 'forecasts');
  readonly apiCallDuration = new Histogram(METRIC_NAMES.apiCallDuration, 'ms');

  snapshot(): MetricsSnapshot {
    const counters = [this.cacheHits, this.cacheMisses, this.weatherApiCalls, this.sunnyForecasts];
    return {
      counters: Object.fromEntries(counters.map((counter) => [counter.name, counter.samples()])),
      histograms: { [this.apiCallDuration.name]: this.apiCallDuration.samples() },
    };
  }
}

/**
 * Bucket a count to keep tag cardinality low
 */
export function getCountRange(count: number): string {
  if (count <= 10) return '0-10';
  if (count <= 50) return '11-50';
  if (count <= 100) return '51-100';
  return '100+';
}

export function getTemperatureRange(temperatureC: number): string {
  if (temperatureC < 0) return '<0';
  if (temperatureC <= 15) return '0-15';
  if (temperatureC <= 25) return '16-25';
  return '>25';
}

function tagKey(tags: MetricTags): string {
  return Object.keys(tags)
    .sort()
    .map((name) => `${name}=${tags[name]}`)
    .join(',');
}
