import axios, { type AxiosInstance } from 'axios';
import { getConfig } from '../config.js';
import { FetchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { ArticleSource, NewsArticle } from '../types.js';
import { parseDateNL } from '../utils/date.js';
import type { RequestBudget } from './requestBudget.js';

type RawNewsItem = {
  title?: string;
  snippet?: string;
  link?: string;
  date?: string;
  source?: string;
};
type RawResponse = {
  news?: RawNewsItem[];
};

export interface SerperClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeRange?: string; // Google "tbs" value, e.g. qdr:d, qdr:w, qdr:m
  http?: AxiosInstance;
  budget?: RequestBudget;
  now?: () => Date;
}

/**
 * Serper news search client. Relative provider dates ("5 hours ago") are
 * resolved against the request time.
 */
export class SerperNewsClient implements ArticleSource {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly timeRange: string;
  private readonly budget?: RequestBudget;
  private readonly now: () => Date;

  constructor(opts: SerperClientOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.serper.apiKey;
    this.timeRange = opts.timeRange ?? cfg.serper.timeRange;
    this.budget = opts.budget;
    this.now = opts.now ?? (() => new Date());
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? cfg.serper.baseUrl,
        timeout: 30000,
      });
  }

  async fetchArticles(country: string): Promise<NewsArticle[]> {
    if (!this.apiKey) {
      throw new FetchError('SERPER_API_KEY not configured', 'serper');
    }
    const decision = this.budget?.consume('serper');
    if (decision && !decision.allowed) {
      throw new FetchError(`Serper request budget exhausted (${decision.reason})`, 'serper');
    }

    const body = { q: `${country} news`, tbs: this.timeRange };
    try {
      logger.debug({ country, tbs: this.timeRange }, 'Serper news request');
      const { data } = await this.http.post<RawResponse>('', body, {
        headers: { 'X-API-KEY': this.apiKey, 'Content-Type': 'application/json' },
      });
      if (!data?.news || !Array.isArray(data.news)) return [];
      const requestedAt = this.now();
      return data.news.filter((item) => Boolean(item.title)).map((item) => this.mapArticle(item, requestedAt));
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new FetchError(
        `Serper request failed for ${country}: status=${status ?? 'n/a'} ${errorMessage(error)}`,
        'serper',
        { status },
      );
    }
  }

  private mapArticle(raw: RawNewsItem, requestedAt: Date): NewsArticle {
    const date = raw.date ?? '';
    const published = parseDateNL(date, requestedAt);
    return {
      title: raw.title ?? '',
      snippet: raw.snippet ?? '',
      link: raw.link ?? '',
      date,
      publishedAt: published?.toISOString(),
    };
  }
}

export default SerperNewsClient;
