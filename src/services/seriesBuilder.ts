import type { Bucket, BucketPeriod, MetricSpec, RawEventRecord, Series } from '../types.js';
import { periodStart, toDate } from '../utils/date.js';
import { toFiniteNumber } from '../utils/normalize.js';
import { logger } from '../logger.js';

/**
 * Group raw records into calendar buckets and aggregate each metric.
 * Periods without records are not emitted; output is ascending by periodStart.
 */
export function buildSeries(
  records: readonly RawEventRecord[],
  period: BucketPeriod,
  metrics: readonly MetricSpec[],
): Series {
  const byPeriod = new Map<number, Record<string, number>>();
  let dropped = 0;

  for (const record of records) {
    const ts = toDate(record.timestamp);
    if (!ts) {
      dropped += 1;
      continue;
    }
    const key = periodStart(ts, period).getTime();
    let agg = byPeriod.get(key);
    if (!agg) {
      agg = Object.fromEntries(metrics.map((m) => [m.name, 0]));
      byPeriod.set(key, agg);
    }
    for (const metric of metrics) {
      agg[metric.name] +=
        metric.aggregate === 'count' ? 1 : toFiniteNumber(record.values[metric.field ?? metric.name]);
    }
  }

  if (dropped) {
    logger.debug({ dropped, period }, 'Dropped records with unparseable timestamps');
  }

  const buckets: Bucket[] = Array.from(byPeriod.keys())
    .sort((a, b) => a - b)
    .map((key) => ({
      periodStart: new Date(key).toISOString(),
      metrics: byPeriod.get(key) ?? {},
    }));

  return { period, buckets };
}

/** Sum of each metric across every bucket of the series. */
export function seriesTotals(series: Series, metrics: readonly MetricSpec[]): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const metric of metrics) {
    totals[metric.name] = series.buckets.reduce((sum, b) => sum + (b.metrics[metric.name] ?? 0), 0);
  }
  return totals;
}
