import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { UnknownCountryError, errorMessage } from '../errors.js';
import type { TriggerResult } from '../schemas/results.js';
import type { AnalysisRun } from '../types.js';
import type { BudgetSnapshot } from './requestBudget.js';
import type { ResultStore } from './resultStore.js';

export interface SchedulerOptions {
  countries: readonly string[];
  intervalMs: number;
  startupDelayMs: number;
  minRunIntervalMs: number; // 0 disables duplicate-run suppression
}

export interface BatchReport {
  startedAt: string;
  finishedAt: string;
  outcomes: TriggerResult[];
  /** Request budget usage once the batch has finished, when a budget is attached. */
  requests?: BudgetSnapshot;
}

type Timer = ReturnType<typeof setTimeout>;

/**
 * Drives the orchestrator for every tracked country: once after a startup delay,
 * then on a fixed interval, plus on-demand single-country triggers.
 * All work goes through one queue, so at most one country run is in flight.
 */
export class AnalysisScheduler {
  private readonly options: SchedulerOptions;
  private queue: Promise<unknown> = Promise.resolve();
  private pendingBatches = 0;
  private startupTimer?: Timer;
  private intervalTimer?: Timer;

  constructor(
    private readonly orchestrator: { run(country: string): Promise<AnalysisRun> },
    private readonly store: ResultStore,
    options: Partial<SchedulerOptions> = {},
    private readonly now: () => Date = () => new Date(),
    private readonly budget?: { snapshot(): BudgetSnapshot },
  ) {
    const cfg = getConfig();
    this.options = {
      countries: options.countries ?? cfg.countries,
      intervalMs: options.intervalMs ?? cfg.scheduler.intervalMs,
      startupDelayMs: options.startupDelayMs ?? cfg.scheduler.startupDelayMs,
      minRunIntervalMs: options.minRunIntervalMs ?? cfg.scheduler.minRunIntervalMs,
    };
  }

  get countries(): readonly string[] {
    return this.options.countries;
  }

  get running(): boolean {
    return this.pendingBatches > 0;
  }

  start(): void {
    if (this.intervalTimer || this.startupTimer) return;
    this.startupTimer = setTimeout(() => {
      this.startupTimer = undefined;
      this.tick('startup');
    }, this.options.startupDelayMs);
    this.intervalTimer = setInterval(() => this.tick('interval'), this.options.intervalMs);
    logger.info(
      { countries: this.options.countries.length, intervalMs: this.options.intervalMs, startupDelayMs: this.options.startupDelayMs },
      'Scheduler started',
    );
  }

  stop(): void {
    if (this.startupTimer) clearTimeout(this.startupTimer);
    if (this.intervalTimer) clearInterval(this.intervalTimer);
    this.startupTimer = undefined;
    this.intervalTimer = undefined;
  }

  /**
   * Run every tracked country in list order. One country's failure is logged
   * and reported; the batch continues.
   */
  async runAll(): Promise<BatchReport> {
    this.pendingBatches += 1;
    try {
      return await this.enqueue(async () => {
        const startedAt = this.now().toISOString();
        logger.info({ countries: this.options.countries }, 'Starting scheduled analysis');
        const outcomes: TriggerResult[] = [];
        for (const country of this.options.countries) {
          outcomes.push(await this.runOne(country));
        }
        const finishedAt = this.now().toISOString();
        const requests = this.budget?.snapshot();
        logger.info(
          { failed: outcomes.filter((o) => !o.ok).length, total: outcomes.length, requests },
          'Scheduled analysis completed',
        );
        return requests ? { startedAt, finishedAt, outcomes, requests } : { startedAt, finishedAt, outcomes };
      });
    } finally {
      this.pendingBatches -= 1;
    }
  }

  /**
   * On-demand trigger for one tracked country; resolves once the run has finished.
   */
  async runNow(country: string): Promise<TriggerResult> {
    if (!this.options.countries.includes(country)) {
      throw new UnknownCountryError(country);
    }
    return this.enqueue(() => this.runOne(country));
  }

  private tick(reason: 'startup' | 'interval'): void {
    if (this.running) {
      logger.warn({ reason }, 'Previous batch still running; skipping this tick');
      return;
    }
    this.runAll().catch((err: unknown) => {
      logger.error({ err, reason }, 'Scheduled batch failed');
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async runOne(country: string): Promise<TriggerResult> {
    try {
      if (await this.isSuppressed(country)) {
        logger.info({ country }, 'Skipping run: latest result is newer than the minimum interval');
        return { country, ok: true, status: 'suppressed' };
      }
      logger.info({ country }, 'Starting analysis');
      const run = await this.orchestrator.run(country);
      return { country, ok: true, status: run.status, runTimestamp: run.runTimestamp };
    } catch (err: unknown) {
      logger.error({ err, country }, 'Analysis failed');
      return { country, ok: false, status: 'failed', error: errorMessage(err) };
    }
  }

  private async isSuppressed(country: string): Promise<boolean> {
    if (this.options.minRunIntervalMs <= 0) return false;
    const latest = await this.store.latest(country);
    if (!latest) return false;
    return this.now().getTime() - Date.parse(latest.runTimestamp) < this.options.minRunIntervalMs;
  }
}
