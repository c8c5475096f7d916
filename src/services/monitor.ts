import type { AppConfig } from '../config.js';
import type { ArticleSource, ArticleSummarizer, EventSource, SentimentScorer } from '../types.js';
import { AcledClient } from './acled.js';
import { RunOrchestrator } from './analysis.js';
import { RequestBudget } from './requestBudget.js';
import { JsonFileResultStore, type ResultStore } from './resultStore.js';
import { AnalysisScheduler } from './scheduler.js';
import { LexiconSentimentScorer } from './scoring.js';
import { SerperNewsClient } from './serper.js';
import { createSummarizer } from './summaries.js';

export interface Monitor {
  store: ResultStore;
  orchestrator: RunOrchestrator;
  scheduler: AnalysisScheduler;
}

export interface MonitorOverrides {
  store?: ResultStore;
  events?: EventSource;
  articles?: ArticleSource;
  scorer?: SentimentScorer;
  summarizer?: ArticleSummarizer;
  now?: () => Date;
}

/**
 * Build every long-lived collaborator once and wire them together.
 */
export function createMonitor(cfg: AppConfig, overrides: MonitorOverrides = {}): Monitor {
  const budget = new RequestBudget(cfg.rateLimits);
  const store = overrides.store ?? JsonFileResultStore.inDataDir(cfg.dataDir);

  const orchestrator = new RunOrchestrator({
    events:
      overrides.events ??
      new AcledClient({ apiKey: cfg.acled.apiKey, email: cfg.acled.email, baseUrl: cfg.acled.baseUrl, budget }),
    articles:
      overrides.articles ??
      new SerperNewsClient({
        apiKey: cfg.serper.apiKey,
        baseUrl: cfg.serper.baseUrl,
        timeRange: cfg.serper.timeRange,
        budget,
      }),
    scorer: overrides.scorer ?? new LexiconSentimentScorer(),
    summarizer: overrides.summarizer ?? createSummarizer(cfg.openai.apiKey, cfg.openai.model),
    store,
    now: overrides.now,
    options: {
      period: cfg.detection.period,
      threshold: cfg.detection.threshold,
      window: cfg.detection.window,
      lookback: cfg.detection.lookback,
      eventLookbackDays: cfg.acled.lookbackDays,
    },
  });

  const scheduler = new AnalysisScheduler(
    orchestrator,
    store,
    {
      countries: cfg.countries,
      intervalMs: cfg.scheduler.intervalMs,
      startupDelayMs: cfg.scheduler.startupDelayMs,
      minRunIntervalMs: cfg.scheduler.minRunIntervalMs,
    },
    overrides.now,
    budget,
  );

  return { store, orchestrator, scheduler };
}
