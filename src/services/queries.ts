import { COUNTRY_COORDINATES } from '../constants/countries.js';
import { ResultNotFoundError } from '../errors.js';
import type { AlertList, AllResults, CountryResult, RunHistory, StoredRun } from '../schemas/results.js';
import type { ResultStore } from './resultStore.js';

const PERIODS_PER_YEAR = { week: 52, month: 12 } as const;

/**
 * Per-period figure for a metric: the latest bucket's value when stored, otherwise a
 * flat average of the run total over a year of periods (records written before
 * buckets were kept).
 */
export function weeklyFigure(run: StoredRun, metric: string): number {
  const latest = run.latestBucket?.metrics[metric];
  if (latest !== undefined) return latest;
  return Math.floor((run.totals[metric] ?? 0) / PERIODS_PER_YEAR[run.period]);
}

export function toCountryResult(run: StoredRun): CountryResult {
  const digest = run.digest ?? null;
  return {
    country: run.country,
    runTimestamp: run.runTimestamp,
    status: run.status ?? (run.hasData ? 'completed' : 'skipped_no_data'),
    hasData: run.hasData,
    hasAnomalies: run.recentAlerts.length > 0,
    period: run.period,
    totals: run.totals,
    trendPct: run.trendPct,
    weeklyEvents: weeklyFigure(run, 'events'),
    weeklyFatalities: weeklyFigure(run, 'fatalities'),
    latestBucket: run.latestBucket ?? null,
    coordinates: COUNTRY_COORDINATES[run.country] ?? null,
    alerts: run.recentAlerts,
    sentiment: digest
      ? {
          meanScore: digest.meanScore,
          stdDev: digest.stdDev,
          articleCount: digest.articleCount ?? digest.articles.length,
          mostNegative: digest.mostNegative,
          mostPositive: digest.mostPositive,
          summary: digest.summary,
          articles: digest.articles,
        }
      : null,
    issues: run.issues,
  };
}

/**
 * Latest result for one country. Throws ResultNotFoundError when nothing has been stored.
 */
export async function getCountryResult(store: ResultStore, country: string): Promise<CountryResult> {
  const run = await store.latest(country);
  if (!run) {
    throw new ResultNotFoundError(country);
  }
  return toCountryResult(run);
}

/**
 * Latest result per country; countries without stored runs are omitted.
 */
export async function getAllResults(store: ResultStore, countries: readonly string[]): Promise<AllResults> {
  const latest = await store.latestAll(countries);
  const results: AllResults['results'] = {};
  for (const [country, run] of Object.entries(latest)) {
    results[country] = {
      runTimestamp: run.runTimestamp,
      hasData: run.hasData,
      eventCount: run.totals.events ?? 0,
      fatalityCount: run.totals.fatalities ?? 0,
      meanScore: run.digest?.meanScore ?? null,
      anomaly: run.recentAlerts.length > 0,
      explanation: run.recentAlerts[0] ?? '',
    };
  }
  return { results };
}

export async function getRunHistory(store: ResultStore, country: string, limit = 10): Promise<RunHistory> {
  const runs = await store.history(country, limit);
  if (!runs.length) {
    throw new ResultNotFoundError(country);
  }
  return {
    country,
    runs: runs.map((run) => ({
      runTimestamp: run.runTimestamp,
      status: run.status ?? (run.hasData ? 'completed' : 'skipped_no_data'),
      hasData: run.hasData,
      totals: run.totals,
      recentAlerts: run.recentAlerts,
    })),
  };
}

/**
 * Persisted alerts for one country, newest run first. An empty list is a valid answer.
 */
export async function getAlerts(store: ResultStore, country: string, limit = 20): Promise<AlertList> {
  const rows = await store.alerts(country, limit);
  return {
    country,
    alerts: rows.map(({ runTimestamp, pipeline, text }) => ({ runTimestamp, pipeline, text })),
  };
}
