/**
 * Centralized configuration loader for the unrest monitor.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (all optional unless a collaborator needs them):
 * - TRANSPORT=stdio|http (default: stdio), PORT (default: 3000), HOST
 * - ALLOWED_HOSTS, ALLOWED_ORIGINS (comma lists for the http transport)
 * - LOG_LEVEL (default: info)
 * - COUNTRIES (comma list; defaults to the tracked set in constants/countries)
 * - DATA_DIR (default: ./data), where the result store file lives
 * - ACLED_API_KEY, ACLED_EMAIL, ACLED_BASE_URL, EVENT_LOOKBACK_DAYS (default: 365)
 * - SERPER_API_KEY, SERPER_BASE_URL, NEWS_TIME_RANGE (default: qdr:m)
 * - OPENAI_API_KEY, OPENAI_MODEL (default: gpt-3.5-turbo)
 * - BUCKET_PERIOD=week|month (default: week)
 * - ANOMALY_THRESHOLD (default: 2), ANOMALY_WINDOW (default: 12), ALERT_LOOKBACK (default: 4)
 * - SCHEDULER_ENABLED=1|0 (default: 1), SCHEDULE_INTERVAL_HOURS (default: 24)
 * - SCHEDULE_STARTUP_DELAY_SECONDS (default: 10), MIN_RUN_INTERVAL_MINUTES (default: 0)
 * - RATE_LIMIT_DAILY_REQUESTS, RATE_LIMIT_PER_SECOND (optional)
 */

import { config } from 'dotenv';
import { DEFAULT_COUNTRIES } from './constants/countries.js';
import type { BucketPeriod } from './types.js';

config();

export type Transport = 'stdio' | 'http';

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  countries: string[];
  dataDir: string;
  acled: {
    apiKey: string;
    email: string;
    baseUrl: string;
    lookbackDays: number;
  };
  serper: {
    apiKey: string;
    baseUrl: string;
    timeRange: string;
  };
  openai: {
    apiKey: string;
    model: string;
  };
  detection: {
    period: BucketPeriod;
    threshold: number;
    window: number;
    lookback: number;
  };
  scheduler: {
    enabled: boolean;
    intervalMs: number;
    startupDelayMs: number;
    minRunIntervalMs: number;
  };
  rateLimits: {
    dailyRequestsCap?: number;
    perSecondCap?: number;
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

export function getConfig(): AppConfig {
  const transport: Transport = process.env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const port = parseNumber(process.env.PORT) ?? 3000;
  const httpHost = process.env.HOST?.trim() || '0.0.0.0';
  const allowedHosts = parseList(process.env.ALLOWED_HOSTS);
  const allowedOrigins = parseList(process.env.ALLOWED_ORIGINS);
  const logLevel = process.env.LOG_LEVEL?.trim() || 'info';

  const configuredCountries = parseList(process.env.COUNTRIES);
  const countries = configuredCountries.length ? configuredCountries : Array.from(DEFAULT_COUNTRIES);
  const dataDir = process.env.DATA_DIR?.trim() || 'data';

  const acled = {
    apiKey: process.env.ACLED_API_KEY ?? '',
    email: process.env.ACLED_EMAIL ?? '',
    baseUrl: process.env.ACLED_BASE_URL?.trim() || 'https://api.acleddata.com/acled/read',
    lookbackDays: parseNumber(process.env.EVENT_LOOKBACK_DAYS) ?? 365,
  };

  const serper = {
    apiKey: process.env.SERPER_API_KEY ?? '',
    baseUrl: process.env.SERPER_BASE_URL?.trim() || 'https://google.serper.dev/news',
    timeRange: process.env.NEWS_TIME_RANGE?.trim() || 'qdr:m',
  };

  const openai = {
    apiKey: process.env.OPENAI_API_KEY ?? '',
    model: process.env.OPENAI_MODEL?.trim() || 'gpt-3.5-turbo',
  };

  const period: BucketPeriod = process.env.BUCKET_PERIOD === 'month' ? 'month' : 'week';
  const detection = {
    period,
    threshold: parseNumber(process.env.ANOMALY_THRESHOLD) ?? 2,
    window: Math.max(1, Math.floor(parseNumber(process.env.ANOMALY_WINDOW) ?? 12)),
    lookback: Math.max(1, Math.floor(parseNumber(process.env.ALERT_LOOKBACK) ?? 4)),
  };

  const scheduler = {
    enabled: parseFlag(process.env.SCHEDULER_ENABLED, true),
    intervalMs: (parseNumber(process.env.SCHEDULE_INTERVAL_HOURS) ?? 24) * 60 * 60 * 1000,
    startupDelayMs: (parseNumber(process.env.SCHEDULE_STARTUP_DELAY_SECONDS) ?? 10) * 1000,
    minRunIntervalMs: (parseNumber(process.env.MIN_RUN_INTERVAL_MINUTES) ?? 0) * 60 * 1000,
  };

  const rateLimits = {
    dailyRequestsCap: parseNumber(process.env.RATE_LIMIT_DAILY_REQUESTS),
    perSecondCap: parseNumber(process.env.RATE_LIMIT_PER_SECOND),
  };

  return {
    transport,
    port,
    httpHost,
    allowedHosts,
    allowedOrigins,
    logLevel,
    countries,
    dataDir,
    acled,
    serper,
    openai,
    detection,
    scheduler,
    rateLimits,
  };
}

export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Guard for the long-running server. Acquisition keys are not required here:
 * a missing key surfaces per run as a skipped pipeline, not a startup failure.
 * Scheduler delays must fit a Node timer, which fires at once above MAX_TIMER_MS.
 */
export function assertRequiredConfig(cfg: AppConfig) {
  if (!cfg.countries.length) {
    throw new Error('COUNTRIES must name at least one country to monitor');
  }
  if (cfg.scheduler.enabled && cfg.scheduler.intervalMs <= 0) {
    throw new Error('SCHEDULE_INTERVAL_HOURS must be positive when the scheduler is enabled');
  }
  if (cfg.scheduler.enabled && cfg.scheduler.intervalMs > MAX_TIMER_MS) {
    throw new Error('SCHEDULE_INTERVAL_HOURS must not exceed 596 hours');
  }
  if (cfg.scheduler.enabled && cfg.scheduler.startupDelayMs > MAX_TIMER_MS) {
    throw new Error(`SCHEDULE_STARTUP_DELAY_SECONDS must not exceed ${Math.floor(MAX_TIMER_MS / 1000)} seconds`);
  }
}
