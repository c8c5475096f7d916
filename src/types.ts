/**
 * Shared types for the unrest monitor.
 * Timestamps crossing module boundaries are ISO-8601 strings (UTC).
 */

export type BucketPeriod = 'week' | 'month';

export type PipelineName = 'events' | 'sentiment';

export type RunStatus = 'completed' | 'skipped_no_data';

/** One observation from an acquisition collaborator (an event, an article). */
export interface RawEventRecord {
  timestamp: string | Date;
  values: Readonly<Record<string, unknown>>;
}

export interface MetricSpec {
  name: string;
  aggregate: 'count' | 'sum';
  field?: string; // source field for `sum`, defaults to name
  label?: string; // used in alert text, defaults to name
  unit?: string; // appended after the value in alert text
}

export interface Bucket {
  periodStart: string; // ISO datetime, UTC period boundary
  metrics: Record<string, number>;
}

export interface Series {
  period: BucketPeriod;
  buckets: Bucket[];
}

export interface AnomalyFlag {
  isAnomaly: boolean;
  movingAvg?: number;
  movingStd?: number;
}

export interface FlaggedBucket extends Bucket {
  flags: Record<string, AnomalyFlag>;
}

export interface FlaggedSeries {
  period: BucketPeriod;
  buckets: FlaggedBucket[];
  effectiveWindow: number | null; // null when detection was skipped
  threshold: number;
}

export interface TrendSummary {
  recentAlerts: string[];
  trendPct: Record<string, number>;
  latestBucket: Bucket | null;
  hasRecentAnomaly: boolean;
}

export interface NewsArticle {
  title: string;
  snippet: string;
  link: string;
  date: string; // as reported by the provider ("3 hours ago", "Mar 3, 2025")
  publishedAt?: string; // ISO datetime when the date could be parsed
}

export interface ScoredArticle {
  title: string;
  snippet: string;
  link: string;
  sentimentScore: number;
}

export interface SentimentDigest {
  meanScore: number;
  stdDev: number;
  articleCount: number;
  mostNegative: ScoredArticle;
  mostPositive: ScoredArticle;
  summary: string;
  articles: ScoredArticle[]; // ascending by score
}

export interface PipelineResult {
  hasData: boolean;
  totals: Record<string, number>;
  latestBucket: Bucket | null;
  recentAlerts: string[];
  trendPct: Record<string, number>;
  hasRecentAnomaly: boolean;
  bucketCount: number;
  effectiveWindow: number | null;
}

export type RunIssueKind =
  | 'fetch_error'
  | 'empty_data'
  | 'insufficient_history'
  | 'summarization_error';

export interface RunIssue {
  kind: RunIssueKind;
  pipeline: PipelineName;
  message: string;
}

export interface AnalysisRun {
  country: string;
  runTimestamp: string;
  period: BucketPeriod;
  status: RunStatus;
  hasData: boolean;
  totals: Record<string, number>;
  latestBucket: Bucket | null;
  recentAlerts: string[];
  trendPct: Record<string, number>;
  pipelines: Record<PipelineName, PipelineResult>;
  digest: SentimentDigest | null;
  issues: RunIssue[];
}

export interface Alert {
  country: string;
  runTimestamp: string;
  pipeline: PipelineName;
  text: string;
}

/** Acquisition collaborator for violent-event records. Returns [] for "no data". */
export interface EventSource {
  fetchEvents(country: string, startDate: string, endDate: string): Promise<RawEventRecord[]>;
}

/** Acquisition collaborator for news articles. Returns [] for "no data". */
export interface ArticleSource {
  fetchArticles(country: string): Promise<NewsArticle[]>;
}

export interface SentimentScorer {
  /** Polarity in [-1, 1]. */
  score(title: string): number;
}

export interface ArticleSummarizer {
  /** Never called with an empty list. */
  summarize(articles: readonly ScoredArticle[]): Promise<string>;
}
