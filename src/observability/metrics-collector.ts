/**
 * In-process metrics for recorded calls: counters, bounded duration histograms and gauges,
 * exportable as a snapshot or in Prometheus text format. Register it with addHook().
 */

import type { ObservabilityHook } from '../core/pipeline/hooks';
import { errorClassName } from '../core/errors';

export type Labels = Record<string, string>;

export const HISTOGRAM_WINDOW = 1000;
export const PERCENTILES = [0.5, 0.9, 0.95, 0.99] as const;

export interface HistogramStats {
  count: number;
  sum: number;
  percentiles: Record<string, number>;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, HistogramStats>;
  gauges: Record<string, number>;
  uptimeSeconds: number;
  collectedAt: string;
}

interface Series<T> {
  name: string;
  labels: Labels;
  value: T;
}

/** "name{k:v,k2:v2}" with labels sorted, or just the name. */
export function metricKey(name: string, labels: Labels = {}): string {
  const pairs = Object.entries(labels)
    .map(([k, v]) => `${k}:${v}`)
    .sort();
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
}

export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname || 'unknown';
  } catch {
    return 'unknown';
  }
}

export function statusCategory(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 300) return '2xx';
  if (statusCode >= 300 && statusCode < 400) return '3xx';
  if (statusCode >= 400 && statusCode < 500) return '4xx';
  if (statusCode >= 500 && statusCode < 600) return '5xx';
  return 'unknown';
}

/** Linear interpolation between the closest ranks. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0] ?? 0;
  const index = p * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? 0;
  if (lower === upper) return lowerValue;
  return lowerValue + (index - lower) * (upperValue - lowerValue);
}

function prometheusLine(name: string, labels: Labels, value: number): string {
  const pairs = Object.entries(labels);
  if (pairs.length === 0) return `${name} ${value}`;
  const rendered = pairs.map(([k, v]) => `${k}="${v.replace(/["\\]/g, '\\$&')}"`).join(',');
  return `${name}{${rendered}} ${value}`;
}

export class MetricsCollector implements ObservabilityHook {
  private readonly counters = new Map<string, Series<number>>();
  private readonly histograms = new Map<string, Series<number[]>>();
  private readonly gauges = new Map<string, Series<number>>();
  private startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  incrementCounter(name: string, value = 1, labels: Labels = {}): void {
    const key = metricKey(name, labels);
    const series = this.counters.get(key);
    if (series) {
      series.value += value;
    } else {
      this.counters.set(key, { name, labels: sortLabels(labels), value });
    }
  }

  /** Keeps the most recent HISTOGRAM_WINDOW observations per series. */
  recordHistogram(name: string, value: number, labels: Labels = {}): void {
    const key = metricKey(name, labels);
    let series = this.histograms.get(key);
    if (!series) {
      series = { name, labels: sortLabels(labels), value: [] };
      this.histograms.set(key, series);
    }
    series.value.push(value);
    if (series.value.length > HISTOGRAM_WINDOW) {
      series.value.splice(0, series.value.length - HISTOGRAM_WINDOW);
    }
  }

  setGauge(name: string, value: number, labels: Labels = {}): void {
    this.gauges.set(metricKey(name, labels), { name, labels: sortLabels(labels), value });
  }

  recordHttpRequest(method: string, url: string, statusCode: number, durationSeconds: number, error?: unknown): void {
    const upper = method.toUpperCase();
    const domain = extractDomain(url);
    this.incrementCounter('http_requests_total', 1, { method: upper, domain, status_code: String(statusCode) });
    this.recordHistogram('http_request_duration_seconds', durationSeconds, { method: upper, domain });
    if (error !== undefined) {
      this.incrementCounter('http_request_errors_total', 1, { method: upper, domain, error_class: errorClassName(error) });
    }
    this.incrementCounter('http_requests_by_status_category', 1, { category: statusCategory(statusCode), domain });
  }

  onHttpRequest(method: string, url: string, statusCode: number, durationSeconds: number, error?: unknown): void {
    this.recordHttpRequest(method, url, statusCode, durationSeconds, error);
  }

  recordMemoryUsage(): void {
    const usage = process.memoryUsage();
    this.setGauge('memory_rss_bytes', usage.rss);
    this.setGauge('memory_heap_used_bytes', usage.heapUsed);
    this.setGauge('memory_heap_total_bytes', usage.heapTotal);
  }

  snapshot(): MetricsSnapshot {
    const counters: Record<string, number> = {};
    for (const [key, series] of this.counters) counters[key] = series.value;
    const histograms: Record<string, HistogramStats> = {};
    for (const [key, series] of this.histograms) histograms[key] = histogramStats(series.value);
    const gauges: Record<string, number> = {};
    for (const [key, series] of this.gauges) gauges[key] = series.value;
    const now = this.now();
    return {
      counters,
      histograms,
      gauges,
      uptimeSeconds: (now - this.startedAt) / 1000,
      collectedAt: new Date(now).toISOString(),
    };
  }

  toPrometheus(): string {
    const lines: string[] = [];
    for (const series of this.counters.values()) {
      lines.push(prometheusLine(series.name, series.labels, series.value));
    }
    for (const series of this.histograms.values()) {
      const stats = histogramStats(series.value);
      lines.push(prometheusLine(`${series.name}_count`, series.labels, stats.count));
      lines.push(prometheusLine(`${series.name}_sum`, series.labels, stats.sum));
      for (const [quantile, value] of Object.entries(stats.percentiles)) {
        lines.push(prometheusLine(series.name, { ...series.labels, quantile }, value));
      }
    }
    for (const series of this.gauges.values()) {
      lines.push(prometheusLine(series.name, series.labels, series.value));
    }
    return lines.join('\n');
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
    this.startedAt = this.now();
  }
}

function sortLabels(labels: Labels): Labels {
  return Object.fromEntries(Object.entries(labels).sort(([a], [b]) => a.localeCompare(b)));
}

function histogramStats(values: readonly number[]): HistogramStats {
  if (values.length === 0) return { count: 0, sum: 0, percentiles: {} };
  const sorted = [...values].sort((a, b) => a - b);
  const percentiles: Record<string, number> = {};
  for (const p of PERCENTILES) percentiles[String(p)] = percentile(sorted, p);
  return {
    count: values.length,
    sum: values.reduce((total, value) => total + value, 0),
    percentiles,
  };
}
