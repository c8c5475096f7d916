import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { AcledClient, VIOLENT_EVENT_TYPES } from '../src/services/acled.js';
import { SerperNewsClient } from '../src/services/serper.js';
import { RequestBudget } from '../src/services/requestBudget.js';
import { FetchError } from '../src/errors.js';

/** axios instance answering every request with `data`, recording the last request config. */
function stubHttp(data: unknown) {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      calls.push(config);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, calls };
}

function failingHttp(status: number) {
  return axios.create({
    adapter: async (config) => {
      throw new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, undefined, {
        data: {},
        status,
        statusText: 'Error',
        headers: {},
        config,
      });
    },
  });
}

describe('AcledClient', () => {
  it('queries violent events between two dates and maps rows', async () => {
    const { http, calls } = stubHttp({
      success: true,
      data: [{ event_date: '2024-05-01', event_type: 'Battles', fatalities: '4' }],
    });
    const client = new AcledClient({ apiKey: 'test-key', email: 'test@example.com', http });

    const records = await client.fetchEvents('Syria', '2024-01-01', '2024-12-31');

    expect(records).toEqual([{ timestamp: '2024-05-01', values: { fatalities: '4', eventType: 'Battles' } }]);
    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('get');
    expect(calls[0].params).toEqual({
      key: 'test-key',
      email: 'test@example.com',
      country: 'Syria',
      event_date_where: 'BETWEEN',
      event_date: '2024-01-01|2024-12-31',
      event_type: VIOLENT_EVENT_TYPES.join('|'),
      limit: 0,
    });
  });

  it('returns no records when the response carries no data', async () => {
    const { http } = stubHttp({ success: true });
    const client = new AcledClient({ apiKey: 'test-key', email: 'test@example.com', http });
    await expect(client.fetchEvents('Tuvalu', '2024-01-01', '2024-12-31')).resolves.toEqual([]);
  });

  it('fails without credentials before calling out', async () => {
    const { http, calls } = stubHttp({ data: [] });
    const client = new AcledClient({ apiKey: '', email: '', http });
    await expect(client.fetchEvents('Syria', '2024-01-01', '2024-12-31')).rejects.toThrow(FetchError);
    expect(calls).toHaveLength(0);
  });

  it('wraps HTTP failures with the status', async () => {
    const client = new AcledClient({ apiKey: 'test-key', email: 'test@example.com', http: failingHttp(503) });
    await expect(client.fetchEvents('Syria', '2024-01-01', '2024-12-31')).rejects.toThrow(
      'ACLED request failed for Syria: status=503 Request failed',
    );
  });

  it('refuses to call out when the budget is exhausted', async () => {
    const { http, calls } = stubHttp({ data: [] });
    const budget = new RequestBudget({ dailyRequestsCap: 0 });
    const client = new AcledClient({ apiKey: 'test-key', email: 'test@example.com', http, budget });
    await expect(client.fetchEvents('Syria', '2024-01-01', '2024-12-31')).rejects.toThrow(
      'ACLED request budget exhausted',
    );
    expect(calls).toHaveLength(0);
  });
});

describe('SerperNewsClient', () => {
  const now = () => new Date('2025-06-15T12:00:00Z');

  it('posts the country query and maps dated articles', async () => {
    const { http, calls } = stubHttp({
      news: [
        { title: 'Ceasefire holds', snippet: 'Calm in the north', link: 'https://example.com/1', date: '3 hours ago' },
        { title: '', snippet: 'untitled', link: 'https://example.com/2', date: '1 day ago' },
        { title: 'Aid convoy arrives', link: 'https://example.com/3' },
      ],
    });
    const client = new SerperNewsClient({ apiKey: 'test-key', timeRange: 'qdr:w', http, now });

    const articles = await client.fetchArticles('Lebanon');

    expect(articles).toEqual([
      {
        title: 'Ceasefire holds',
        snippet: 'Calm in the north',
        link: 'https://example.com/1',
        date: '3 hours ago',
        publishedAt: '2025-06-15T09:00:00.000Z',
      },
      { title: 'Aid convoy arrives', snippet: '', link: 'https://example.com/3', date: '', publishedAt: undefined },
    ]);
    expect(calls[0].method).toBe('post');
    expect(calls[0].headers.get('x-api-key')).toBe('test-key');
    expect(JSON.parse(String(calls[0].data))).toEqual({ q: 'Lebanon news', tbs: 'qdr:w' });
  });

  it('fails without an API key', async () => {
    const { http } = stubHttp({ news: [] });
    const client = new SerperNewsClient({ apiKey: '', http, now });
    await expect(client.fetchArticles('Lebanon')).rejects.toThrow('SERPER_API_KEY not configured');
  });

  it('wraps HTTP failures in FetchError', async () => {
    const client = new SerperNewsClient({ apiKey: 'test-key', http: failingHttp(429), now });
    await expect(client.fetchArticles('Lebanon')).rejects.toThrow(FetchError);
  });
});
