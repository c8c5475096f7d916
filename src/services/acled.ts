import axios, { type AxiosInstance } from 'axios';
import { getConfig } from '../config.js';
import { FetchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { EventSource, RawEventRecord } from '../types.js';
import type { RequestBudget } from './requestBudget.js';

/**
 * Raw types matching ACLED read API responses
 */
type RawEvent = {
  event_date?: string;
  event_type?: string;
  fatalities?: string | number;
};
type RawResponse = {
  success?: boolean;
  count?: number;
  data?: RawEvent[];
};

export const VIOLENT_EVENT_TYPES = ['Violence against civilians', 'Explosions/Remote violence', 'Battles'];

export interface AcledClientOptions {
  apiKey?: string;
  email?: string;
  baseUrl?: string;
  http?: AxiosInstance;
  budget?: RequestBudget;
}

/**
 * AcledClient for the ACLED read endpoint.
 * Yields one RawEventRecord per violent event with its fatality count.
 */
export class AcledClient implements EventSource {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly email: string;
  private readonly budget?: RequestBudget;

  constructor(opts: AcledClientOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.acled.apiKey;
    this.email = opts.email ?? cfg.acled.email;
    this.budget = opts.budget;
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? cfg.acled.baseUrl,
        timeout: 30000,
      });
  }

  async fetchEvents(country: string, startDate: string, endDate: string): Promise<RawEventRecord[]> {
    if (!this.apiKey || !this.email) {
      throw new FetchError('ACLED API credentials not configured (ACLED_API_KEY, ACLED_EMAIL)', 'acled');
    }
    const decision = this.budget?.consume('acled');
    if (decision && !decision.allowed) {
      throw new FetchError(`ACLED request budget exhausted (${decision.reason})`, 'acled');
    }

    const params = {
      key: this.apiKey,
      email: this.email,
      country,
      event_date_where: 'BETWEEN',
      event_date: `${startDate}|${endDate}`,
      event_type: VIOLENT_EVENT_TYPES.join('|'),
      limit: 0,
    };

    try {
      logger.debug({ country, startDate, endDate }, 'ACLED request');
      const { data } = await this.http.get<RawResponse>('', { params });
      if (!data?.data || !Array.isArray(data.data)) return [];
      return data.data.map(this.mapEvent);
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new FetchError(
        `ACLED request failed for ${country}: status=${status ?? 'n/a'} ${errorMessage(error)}`,
        'acled',
        { status },
      );
    }
  }

  /**
   * Map an ACLED row to a record; fatalities stay raw so the series builder coerces them.
   */
  private mapEvent(raw: RawEvent): RawEventRecord {
    return {
      timestamp: raw.event_date ?? '',
      values: {
        fatalities: raw.fatalities,
        eventType: raw.event_type,
      },
    };
  }
}

export default AcledClient;
