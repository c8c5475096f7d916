import { describe, expect, it } from 'vitest';
import { RequestBudget } from '../src/services/requestBudget.js';

describe('RequestBudget', () => {
  it('refuses requests beyond the per-second cap until the window slides', () => {
    let now = 5_000;
    const budget = new RequestBudget({ perSecondCap: 2, now: () => now });

    expect(budget.consume('acled')).toEqual({ allowed: true });
    now = 5_400;
    expect(budget.consume('serper')).toEqual({ allowed: true });
    expect(budget.consume('acled')).toEqual({ allowed: false, reason: 'per_second' });

    now = 6_000;
    expect(budget.check()).toEqual({ allowed: true });
    expect(budget.snapshot().lastSecondCount).toBe(1);
  });

  it('refuses requests beyond the daily cap until the next UTC day', () => {
    let now = Date.UTC(2025, 5, 15, 9);
    const budget = new RequestBudget({ dailyRequestsCap: 3, now: () => now });

    expect(budget.consume('acled', 3)).toEqual({ allowed: true });
    expect(budget.consume('serper')).toEqual({ allowed: false, reason: 'daily' });
    expect(budget.snapshot()).toMatchObject({ day: '2025-06-15', dailyCount: 3, bySource: { acled: 3 } });

    now = Date.UTC(2025, 5, 16, 0, 5);
    expect(budget.consume('serper')).toEqual({ allowed: true });
    expect(budget.snapshot()).toMatchObject({ day: '2025-06-16', dailyCount: 1, bySource: { serper: 1 } });
  });

  it('only counts when no caps are set', () => {
    const budget = new RequestBudget({ now: () => 0 });
    expect(budget.consume('acled', 50)).toEqual({ allowed: true });
    expect(budget.snapshot().bySource).toEqual({ acled: 50 });
  });

  it('does not record refused requests', () => {
    const budget = new RequestBudget({ dailyRequestsCap: 0, now: () => 0 });
    expect(budget.consume('acled')).toEqual({ allowed: false, reason: 'daily' });
    expect(budget.snapshot().dailyCount).toBe(0);
  });
});
