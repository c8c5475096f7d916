import type {
  Alert,
  AnalysisRun,
  ArticleSource,
  ArticleSummarizer,
  BucketPeriod,
  EventSource,
  MetricSpec,
  PipelineName,
  PipelineResult,
  RawEventRecord,
  RunIssue,
  ScoredArticle,
  SentimentDigest,
  SentimentScorer,
} from '../types.js';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import {
  EmptyDataError,
  FetchError,
  InsufficientHistoryError,
  SummarizationError,
  errorMessage,
} from '../errors.js';
import { lookbackRange } from '../utils/date.js';
import { buildSeries, seriesTotals } from './seriesBuilder.js';
import { assertSufficientHistory, detectAnomalies } from './anomalyDetector.js';
import { summarizeTrends } from './trendSummarizer.js';
import { digestScores, scoreArticle } from './scoring.js';
import { renderFallbackSummary } from './summaries.js';
import type { ResultStore } from './resultStore.js';

export const EVENT_METRICS: readonly MetricSpec[] = [
  { name: 'events', aggregate: 'count', label: 'violent events', unit: 'events' },
  { name: 'fatalities', aggregate: 'sum', unit: 'deaths' },
];

export const SENTIMENT_METRICS: readonly MetricSpec[] = [
  { name: 'articles', aggregate: 'count', label: 'news articles', unit: 'articles' },
  { name: 'negative_articles', aggregate: 'sum', field: 'negative', label: 'negative news articles', unit: 'articles' },
];

export interface AnalysisOptions {
  period: BucketPeriod;
  threshold: number;
  window: number;
  lookback: number;
  eventLookbackDays: number;
}

export interface OrchestratorDeps {
  events: EventSource;
  articles: ArticleSource;
  scorer: SentimentScorer;
  summarizer: ArticleSummarizer;
  store: ResultStore;
  now?: () => Date;
  options?: Partial<AnalysisOptions>;
}

export type RunStage = 'fetch' | 'build' | 'detect' | 'summarize' | 'persist';

function defaultOptions(): AnalysisOptions {
  const cfg = getConfig();
  return {
    period: cfg.detection.period,
    threshold: cfg.detection.threshold,
    window: cfg.detection.window,
    lookback: cfg.detection.lookback,
    eventLookbackDays: cfg.acled.lookbackDays,
  };
}

function emptyPipeline(): PipelineResult {
  return {
    hasData: false,
    totals: {},
    latestBucket: null,
    recentAlerts: [],
    trendPct: {},
    hasRecentAnomaly: false,
    bucketCount: 0,
    effectiveWindow: null,
  };
}

function issueFor(pipeline: PipelineName, err: unknown): RunIssue {
  if (err instanceof EmptyDataError) return { kind: 'empty_data', pipeline, message: err.message };
  if (err instanceof InsufficientHistoryError) return { kind: 'insufficient_history', pipeline, message: err.message };
  if (err instanceof SummarizationError) return { kind: 'summarization_error', pipeline, message: err.message };
  return { kind: 'fetch_error', pipeline, message: errorMessage(err) };
}

/**
 * Runs the events and sentiment pipelines for one country and persists one
 * AnalysisRun. Collaborator failures never escape: they end the affected
 * pipeline without data and are recorded as issues on the run.
 */
export class RunOrchestrator {
  private readonly options: AnalysisOptions;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.options = { ...defaultOptions(), ...deps.options };
    this.now = deps.now ?? (() => new Date());
  }

  async run(country: string): Promise<AnalysisRun> {
    const startedAt = this.now();
    const runTimestamp = startedAt.toISOString();
    const log = logger.child({ country, runTimestamp });
    const issues: RunIssue[] = [];
    const stage = (name: RunStage) => log.debug({ stage: name }, 'Run stage');

    stage('fetch');
    const eventRecords = await this.fetchEvents(country, startedAt, issues);
    const articles = await this.fetchScoredArticles(country, issues);
    const articleRecords: RawEventRecord[] = articles.map(({ article, publishedAt }) => ({
      timestamp: publishedAt ?? runTimestamp,
      values: { negative: article.sentimentScore < 0 ? 1 : 0 },
    }));

    const events = this.runPipeline('events', eventRecords, EVENT_METRICS, issues, stage);
    const sentiment = this.runPipeline('sentiment', articleRecords, SENTIMENT_METRICS, issues, stage);

    stage('summarize');
    const scored = articles.map(({ article }) => article).sort((a, b) => a.sentimentScore - b.sentimentScore);
    const digest = scored.length ? await this.buildDigest(scored, issues) : null;

    const hasData = events.hasData || sentiment.hasData;
    const run: AnalysisRun = {
      country,
      runTimestamp,
      period: this.options.period,
      status: hasData ? 'completed' : 'skipped_no_data',
      hasData,
      totals: hasData ? { ...events.totals, ...sentiment.totals } : {},
      latestBucket: events.latestBucket,
      recentAlerts: [...events.recentAlerts, ...sentiment.recentAlerts],
      trendPct: hasData ? { ...events.trendPct, ...sentiment.trendPct } : {},
      pipelines: { events, sentiment },
      digest,
      issues,
    };

    const alerts: Alert[] = [
      ...events.recentAlerts.map((text): Alert => ({ country, runTimestamp, pipeline: 'events', text })),
      ...sentiment.recentAlerts.map((text): Alert => ({ country, runTimestamp, pipeline: 'sentiment', text })),
    ];

    stage('persist');
    await this.deps.store.persist(run, alerts);

    if (run.status === 'skipped_no_data') {
      log.warn({ issues }, 'Run skipped: no data from any source');
    } else {
      log.info(
        { totals: run.totals, alerts: alerts.length, trendPct: run.trendPct },
        'Analysis completed',
      );
    }
    return run;
  }

  private async fetchEvents(country: string, now: Date, issues: RunIssue[]): Promise<RawEventRecord[]> {
    const { start, end } = lookbackRange(this.options.eventLookbackDays, now);
    try {
      const records = await this.deps.events.fetchEvents(country, start, end);
      if (!records.length) {
        throw new EmptyDataError(`No violent events reported for ${country} between ${start} and ${end}`);
      }
      return records;
    } catch (err: unknown) {
      issues.push(issueFor('events', err));
      logger.warn({ country, err }, err instanceof FetchError ? 'Event fetch failed' : 'No event data');
      return [];
    }
  }

  private async fetchScoredArticles(
    country: string,
    issues: RunIssue[],
  ): Promise<{ article: ScoredArticle; publishedAt?: string }[]> {
    try {
      const articles = await this.deps.articles.fetchArticles(country);
      const scored = articles
        .filter((a) => Boolean(a.title))
        .map((a) => ({ article: scoreArticle(this.deps.scorer, a), publishedAt: a.publishedAt }));
      if (!scored.length) {
        throw new EmptyDataError(`No news articles found for ${country}`);
      }
      return scored;
    } catch (err: unknown) {
      issues.push(issueFor('sentiment', err));
      logger.warn({ country, err }, err instanceof FetchError ? 'Article fetch failed' : 'No article data');
      return [];
    }
  }

  private runPipeline(
    pipeline: PipelineName,
    records: readonly RawEventRecord[],
    metrics: readonly MetricSpec[],
    issues: RunIssue[],
    stage: (name: RunStage) => void,
  ): PipelineResult {
    if (!records.length) return emptyPipeline();

    stage('build');
    const series = buildSeries(records, this.options.period, metrics);
    if (!series.buckets.length) return emptyPipeline();

    stage('detect');
    try {
      assertSufficientHistory(series);
    } catch (err: unknown) {
      issues.push(issueFor(pipeline, err));
    }
    const flagged = detectAnomalies(series, {
      metrics,
      threshold: this.options.threshold,
      window: this.options.window,
    });

    stage('summarize');
    const trends = summarizeTrends(flagged, { metrics, lookback: this.options.lookback });

    return {
      hasData: true,
      totals: seriesTotals(series, metrics),
      latestBucket: trends.latestBucket,
      recentAlerts: trends.recentAlerts,
      trendPct: trends.trendPct,
      hasRecentAnomaly: trends.hasRecentAnomaly,
      bucketCount: series.buckets.length,
      effectiveWindow: flagged.effectiveWindow,
    };
  }

  private async buildDigest(scored: ScoredArticle[], issues: RunIssue[]): Promise<SentimentDigest> {
    let summary: string;
    try {
      summary = await this.deps.summarizer.summarize(scored);
      if (!summary.trim()) {
        throw new SummarizationError('Summarizer returned an empty summary');
      }
    } catch (err: unknown) {
      const failure = err instanceof SummarizationError ? err : new SummarizationError(errorMessage(err));
      issues.push(issueFor('sentiment', failure));
      logger.warn({ err: failure }, 'Summarization failed; using fallback rendering');
      summary = renderFallbackSummary(scored);
    }
    return { ...digestScores(scored), summary, articles: scored };
  }
}
