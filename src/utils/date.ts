import * as chrono from 'chrono-node';
import type { BucketPeriod } from '../types.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): string {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a provider date ("3 hours ago", "Mar 3, 2025", "2025-03-03") into a Date
 * relative to `now`. Text without an offset is read as UTC, whatever the host's zone.
 * Returns undefined when the text carries no date.
 */
export function parseDateNL(input: string, now: Date = new Date()): Date | undefined {
  if (!input || !input.trim()) return undefined;
  const parsed = chrono.parseDate(input, { instant: now, timezone: 0 }, { forwardDate: false });
  return parsed ?? undefined;
}

export function toDate(input: string | Date): Date | undefined {
  const d = input instanceof Date ? input : new Date(input);
  return Number.isNaN(d.getTime()) ? undefined : d;
}

/**
 * Inclusive [start, end] YYYY-MM-DD range covering the last `days` days up to `now`.
 */
export function lookbackRange(days: number, now: Date = new Date()): { start: string; end: string } {
  const start = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
  return { start: normalizeDate(start), end: normalizeDate(now) };
}

/**
 * Start of the calendar period containing `date`, in UTC.
 * Weeks start on the ISO Monday; months on the first day.
 */
export function periodStart(date: Date, period: BucketPeriod): Date {
  const y = date.getUTCFullYear();
  const m = date.getUTCMonth();
  if (period === 'month') {
    return new Date(Date.UTC(y, m, 1));
  }
  const offset = (date.getUTCDay() + 6) % 7; // days since Monday
  return new Date(Date.UTC(y, m, date.getUTCDate() - offset));
}

/**
 * Human label for a bucket: "Week 09, 2025" (Sunday-based week of year) or "March 2025".
 */
export function periodLabel(start: string | Date, period: BucketPeriod): string {
  const d = start instanceof Date ? start : new Date(start);
  const year = d.getUTCFullYear();
  if (period === 'month') {
    return `${MONTH_NAMES[d.getUTCMonth()]} ${year}`;
  }
  const yearStart = Date.UTC(year, 0, 1);
  const dayOfYear = Math.floor((d.getTime() - yearStart) / (24 * 60 * 60 * 1000));
  const week = Math.floor((dayOfYear + 7 - d.getUTCDay()) / 7);
  return `Week ${String(week).padStart(2, '0')}, ${year}`;
}
