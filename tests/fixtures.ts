import type { AnalysisRun, Bucket, PipelineResult, RawEventRecord, Series } from '../src/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Monday 2025-01-06, the start of the first fixture week. */
export const FIRST_WEEK = Date.UTC(2025, 0, 6);

export function weekStart(index: number): string {
  return new Date(FIRST_WEEK + index * 7 * DAY_MS).toISOString();
}

/** One bucket per consecutive week, each holding `values[i]` for `metric`. */
export function weeklySeries(values: readonly number[], metric = 'events'): Series {
  const buckets: Bucket[] = values.map((v, i) => ({ periodStart: weekStart(i), metrics: { [metric]: v } }));
  return { period: 'week', buckets };
}

/** `counts[i]` event records on the Wednesday of week i, each with one fatality. */
export function weeklyEventRecords(counts: readonly number[]): RawEventRecord[] {
  const records: RawEventRecord[] = [];
  counts.forEach((count, i) => {
    const wednesday = new Date(FIRST_WEEK + (i * 7 + 2) * DAY_MS + 12 * 60 * 60 * 1000).toISOString();
    for (let n = 0; n < count; n++) {
      records.push({ timestamp: wednesday, values: { fatalities: '1', eventType: 'Battles' } });
    }
  });
  return records;
}

function pipeline(hasData: boolean): PipelineResult {
  return {
    hasData,
    totals: {},
    latestBucket: null,
    recentAlerts: [],
    trendPct: {},
    hasRecentAnomaly: false,
    bucketCount: 0,
    effectiveWindow: null,
  };
}

export function makeRun(overrides: Partial<AnalysisRun> = {}): AnalysisRun {
  return {
    country: 'Syria',
    runTimestamp: '2025-06-15T12:00:00.000Z',
    period: 'week',
    status: 'completed',
    hasData: true,
    totals: { events: 120, fatalities: 30 },
    latestBucket: { periodStart: '2025-06-09T00:00:00.000Z', metrics: { events: 12, fatalities: 3 } },
    recentAlerts: [],
    trendPct: { events: 0, fatalities: 0 },
    pipelines: { events: pipeline(true), sentiment: pipeline(false) },
    digest: null,
    issues: [],
    ...overrides,
  };
}
