import { getConfig } from '../config.js';

export interface BudgetOptions {
  dailyRequestsCap?: number;
  perSecondCap?: number;
  now?: () => number; // ms epoch
}

export type BudgetDecision = { allowed: true } | { allowed: false; reason: 'per_second' | 'daily' };

export interface BudgetSnapshot {
  day: string | undefined;
  dailyCount: number;
  dailyCap?: number;
  lastSecondCount: number;
  perSecondCap?: number;
  bySource: Record<string, number>;
}

const SECOND_MS = 1000;

/**
 * Process-wide request budget for the acquisition APIs, shared by every HTTP
 * client so the caps apply to a whole batch rather than to each provider.
 * Per-second accounting uses a sliding one-second window; daily counts reset at
 * the UTC day boundary. Without caps every request is allowed and only counted.
 */
export class RequestBudget {
  private readonly dailyCap?: number;
  private readonly perSecondCap?: number;
  private readonly now: () => number;

  private recent: number[] = [];
  private day?: string;
  private dailyCount = 0;
  private bySource: Record<string, number> = {};

  constructor(opts: BudgetOptions = {}) {
    const cfg = getConfig();
    this.dailyCap = opts.dailyRequestsCap ?? cfg.rateLimits.dailyRequestsCap;
    this.perSecondCap = opts.perSecondCap ?? cfg.rateLimits.perSecondCap;
    this.now = opts.now ?? (() => Date.now());
  }

  /** Decide without consuming anything. */
  check(count = 1): BudgetDecision {
    const at = this.now();
    this.roll(at);
    if (this.perSecondCap !== undefined && this.recent.length + count > this.perSecondCap) {
      return { allowed: false, reason: 'per_second' };
    }
    if (this.dailyCap !== undefined && this.dailyCount + count > this.dailyCap) {
      return { allowed: false, reason: 'daily' };
    }
    return { allowed: true };
  }

  /** Check and, when allowed, record `count` requests against `source`. */
  consume(source: string, count = 1): BudgetDecision {
    const decision = this.check(count);
    if (!decision.allowed) return decision;
    const at = this.now();
    for (let i = 0; i < count; i++) this.recent.push(at);
    this.dailyCount += count;
    this.bySource[source] = (this.bySource[source] ?? 0) + count;
    return decision;
  }

  snapshot(): BudgetSnapshot {
    this.roll(this.now());
    return {
      day: this.day,
      dailyCount: this.dailyCount,
      dailyCap: this.dailyCap,
      lastSecondCount: this.recent.length,
      perSecondCap: this.perSecondCap,
      bySource: { ...this.bySource },
    };
  }

  private roll(at: number): void {
    this.recent = this.recent.filter((t) => at - t < SECOND_MS);
    const day = new Date(at).toISOString().slice(0, 10);
    if (day !== this.day) {
      this.day = day;
      this.dailyCount = 0;
      this.bySource = {};
    }
  }
}
