import type { AnomalyFlag, FlaggedBucket, FlaggedSeries, MetricSpec, Series } from '../types.js';
import { mean, sampleStd } from '../utils/normalize.js';
import { InsufficientHistoryError } from '../errors.js';

export const MIN_HISTORY = 3;
export const DEFAULT_THRESHOLD = 2;
export const DEFAULT_WINDOW = 12;

export interface DetectOptions {
  metrics: readonly Pick<MetricSpec, 'name'>[];
  threshold?: number;
  window?: number;
}

/**
 * Window actually used for a series of `length` buckets: the nominal window when
 * history allows, otherwise half the history (never below MIN_HISTORY).
 * Returns null when the series is below the statistical floor.
 */
export function effectiveWindow(length: number, nominal: number = DEFAULT_WINDOW): number | null {
  if (length < MIN_HISTORY) return null;
  if (length >= nominal) return nominal;
  return Math.max(MIN_HISTORY, Math.floor(length / 2));
}

export function assertSufficientHistory(series: Series): void {
  if (series.buckets.length < MIN_HISTORY) {
    throw new InsufficientHistoryError(series.buckets.length, MIN_HISTORY);
  }
}

/**
 * Flag buckets whose value exceeds the trailing rolling mean by more than
 * `threshold` rolling sample standard deviations. Surges only; drops are never flagged.
 */
export function detectAnomalies(series: Series, opts: DetectOptions): FlaggedSeries {
  const threshold = opts.threshold ?? DEFAULT_THRESHOLD;
  const window = effectiveWindow(series.buckets.length, opts.window ?? DEFAULT_WINDOW);

  const buckets: FlaggedBucket[] = series.buckets.map((bucket) => ({
    periodStart: bucket.periodStart,
    metrics: { ...bucket.metrics },
    flags: Object.fromEntries(opts.metrics.map((m): [string, AnomalyFlag] => [m.name, { isAnomaly: false }])),
  }));

  if (window === null) {
    return { period: series.period, buckets, effectiveWindow: null, threshold };
  }

  for (const metric of opts.metrics) {
    const values = series.buckets.map((b) => b.metrics[metric.name] ?? 0);
    for (let i = window - 1; i < values.length; i++) {
      const slice = values.slice(i - window + 1, i + 1);
      const movingAvg = mean(slice);
      const movingStd = sampleStd(slice);
      buckets[i].flags[metric.name] = {
        isAnomaly: values[i] > movingAvg + threshold * movingStd,
        movingAvg,
        movingStd,
      };
    }
  }

  return { period: series.period, buckets, effectiveWindow: window, threshold };
}
