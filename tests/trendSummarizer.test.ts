import { describe, expect, it } from 'vitest';
import { detectAnomalies } from '../src/services/anomalyDetector.js';
import { formatAlert, summarizeTrends, trendPercent } from '../src/services/trendSummarizer.js';
import type { MetricSpec } from '../src/types.js';
import { weekStart, weeklySeries } from './fixtures.js';

const EVENTS: MetricSpec[] = [{ name: 'events', aggregate: 'count', label: 'violent events', unit: 'events' }];
const SURGE = [5, 5, 5, 5, 5, 5, 5, 5, 5, 5, 5, 5, 40, 5, 5];

describe('summarizeTrends', () => {
  it('reports a surge inside the lookback and the latest trend', () => {
    const flagged = detectAnomalies(weeklySeries(SURGE), { metrics: EVENTS, threshold: 2, window: 12 });

    const summary = summarizeTrends(flagged, { metrics: EVENTS, lookback: 4 });

    expect(summary.recentAlerts).toEqual([
      'Unusual spike in violent events in Week 13, 2025: 40 events (expected around 7)',
    ]);
    expect(summary.hasRecentAnomaly).toBe(true);
    expect(summary.trendPct).toEqual({ events: -37 });
    expect(summary.latestBucket).toEqual({ periodStart: weekStart(14), metrics: { events: 5 } });
  });

  it('drops anomalies older than the lookback', () => {
    const flagged = detectAnomalies(weeklySeries(SURGE), { metrics: EVENTS, threshold: 2, window: 12 });

    const summary = summarizeTrends(flagged, { metrics: EVENTS, lookback: 2 });

    expect(summary.recentAlerts).toEqual([]);
    expect(summary.hasRecentAnomaly).toBe(false);
    expect(summary.trendPct).toEqual({ events: -37 });
  });

  it('returns zero trends and no alerts for two buckets', () => {
    const flagged = detectAnomalies(weeklySeries([3, 9]), { metrics: EVENTS });

    const summary = summarizeTrends(flagged, { metrics: EVENTS });

    expect(summary).toEqual({
      recentAlerts: [],
      trendPct: { events: 0 },
      latestBucket: { periodStart: weekStart(1), metrics: { events: 9 } },
      hasRecentAnomaly: false,
    });
  });

  it('returns a null latest bucket for an empty series', () => {
    const flagged = detectAnomalies({ period: 'month', buckets: [] }, { metrics: EVENTS });
    expect(summarizeTrends(flagged, { metrics: EVENTS }).latestBucket).toBeNull();
  });
});

describe('formatAlert', () => {
  it('truncates values and falls back to the metric name without a unit', () => {
    const metric: MetricSpec = { name: 'fatalities', aggregate: 'sum' };
    expect(formatAlert(metric, 'March 2025', 12.9, 3.99)).toBe(
      'Unusual spike in fatalities in March 2025: 12 (expected around 3)',
    );
  });
});

describe('trendPercent', () => {
  it('computes the rounded deviation from the rolling mean', () => {
    expect(trendPercent(15, 10)).toBe(50);
    expect(trendPercent(0, 4)).toBe(-100);
  });

  it('rounds exact halves to the even neighbour', () => {
    expect(trendPercent(9, 8)).toBe(12);
    expect(trendPercent(7, 8)).toBe(-12);
  });

  it('is zero without a positive mean', () => {
    expect(trendPercent(5, 0)).toBe(0);
    expect(trendPercent(5, undefined)).toBe(0);
  });
});
