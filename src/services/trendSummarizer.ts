import type { FlaggedSeries, MetricSpec, TrendSummary } from '../types.js';
import { MIN_HISTORY } from './anomalyDetector.js';
import { periodLabel } from '../utils/date.js';
import { roundHalfEven } from '../utils/normalize.js';

export const DEFAULT_LOOKBACK = 4;

export interface SummarizeOptions {
  metrics: readonly MetricSpec[];
  lookback?: number;
}

/**
 * Render alert text for one flagged metric. Values are truncated toward zero.
 */
export function formatAlert(metric: MetricSpec, label: string, value: number, expected: number): string {
  const unit = metric.unit ? ` ${metric.unit}` : '';
  return `Unusual spike in ${metric.label ?? metric.name} in ${label}: ${Math.trunc(value)}${unit} (expected around ${Math.trunc(expected)})`;
}

/**
 * Signed percentage deviation of `value` from its rolling mean; 0 when the mean is
 * missing or not positive.
 */
export function trendPercent(value: number, movingAvg: number | undefined): number {
  if (movingAvg === undefined || !(movingAvg > 0)) return 0;
  return roundHalfEven((value / movingAvg - 1) * 100);
}

export function summarizeTrends(flagged: FlaggedSeries, opts: SummarizeOptions): TrendSummary {
  const { buckets } = flagged;
  const lookback = Math.max(1, opts.lookback ?? DEFAULT_LOOKBACK);
  const zeroTrends = Object.fromEntries(opts.metrics.map((m): [string, number] => [m.name, 0]));
  const latest = buckets.length ? buckets[buckets.length - 1] : undefined;
  const latestBucket = latest ? { periodStart: latest.periodStart, metrics: { ...latest.metrics } } : null;

  if (!latest || buckets.length < MIN_HISTORY) {
    return { recentAlerts: [], trendPct: zeroTrends, latestBucket, hasRecentAnomaly: false };
  }

  const recentAlerts: string[] = [];
  for (const bucket of buckets.slice(-lookback)) {
    const label = periodLabel(bucket.periodStart, flagged.period);
    for (const metric of opts.metrics) {
      const flag = bucket.flags[metric.name];
      if (flag?.isAnomaly && flag.movingAvg !== undefined) {
        recentAlerts.push(formatAlert(metric, label, bucket.metrics[metric.name] ?? 0, flag.movingAvg));
      }
    }
  }

  const trendPct: Record<string, number> = {};
  for (const metric of opts.metrics) {
    trendPct[metric.name] = trendPercent(latest.metrics[metric.name] ?? 0, latest.flags[metric.name]?.movingAvg);
  }

  return {
    recentAlerts,
    trendPct,
    latestBucket,
    hasRecentAnomaly: recentAlerts.length > 0,
  };
}
