import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { describe, expect, it, vi } from 'vitest';
import { TOOL_DEFINITIONS, callTool, formatTrigger, toMcpError, type ToolContext } from '../src/tools.js';
import { MemoryResultStore } from '../src/services/resultStore.js';
import { FetchError } from '../src/errors.js';
import type { TriggerResult } from '../src/schemas/results.js';
import { makeRun } from './fixtures.js';

function context(store = new MemoryResultStore()) {
  const runNow = vi.fn<ToolContext['scheduler']['runNow']>(
    async (country): Promise<TriggerResult> => ({
      country,
      ok: true,
      status: 'completed',
      runTimestamp: '2025-06-15T12:00:00.000Z',
    }),
  );
  const ctx: ToolContext = { store, scheduler: { countries: ['Syria', 'Libya'], runNow } };
  return { ctx, runNow };
}

describe('callTool', () => {
  it('returns the latest country result as text and structured content', async () => {
    const store = new MemoryResultStore();
    await store.persist(makeRun(), []);
    const { ctx } = context(store);

    const result = await callTool(ctx, 'get_country_results', { country: 'Syria' });

    expect(result.content).toEqual([
      {
        type: 'text',
        text: [
          'Syria: completed run at 2025-06-15T12:00:00.000Z',
          'Violent events this week: 12 (3 deaths)',
          'No recent anomalies.',
        ].join('\n'),
      },
    ]);
    expect(result.structuredContent).toMatchObject({ country: 'Syria', weeklyEvents: 12 });
  });

  it('names the bucket period of monthly runs', async () => {
    const store = new MemoryResultStore();
    await store.persist(
      makeRun({
        period: 'month',
        latestBucket: { periodStart: '2025-06-01T00:00:00.000Z', metrics: { events: 40, fatalities: 9 } },
      }),
      [],
    );
    const { ctx } = context(store);

    const result = await callTool(ctx, 'get_country_results', { country: 'Syria' });

    expect(result.content).toEqual([
      {
        type: 'text',
        text: [
          'Syria: completed run at 2025-06-15T12:00:00.000Z',
          'Violent events this month: 40 (9 deaths)',
          'No recent anomalies.',
        ].join('\n'),
      },
    ]);
    expect(result.structuredContent).toMatchObject({ period: 'month', weeklyEvents: 40 });
  });

  it('maps an untracked country to invalid params', async () => {
    const { ctx } = context();
    await expect(callTool(ctx, 'get_country_results', { country: 'Chad' })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it('maps a tracked country without results to invalid request', async () => {
    const { ctx } = context();
    await expect(callTool(ctx, 'get_country_results', { country: 'Libya' })).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });

  it('rejects missing arguments', async () => {
    const { ctx } = context();
    await expect(callTool(ctx, 'get_run_history', {})).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(callTool(ctx, 'get_run_history', { country: 'Syria', limit: 0 })).rejects.toMatchObject({
      code: ErrorCode.InvalidParams,
    });
  });

  it('reports an empty store for all results', async () => {
    const { ctx } = context();
    const result = await callTool(ctx, 'get_all_results', undefined);
    expect(result.content).toEqual([{ type: 'text', text: 'No results stored yet.' }]);
    expect(result.structuredContent).toEqual({ results: {} });
  });

  it('lists stored alerts with their pipeline', async () => {
    const store = new MemoryResultStore();
    const run = makeRun();
    await store.persist(run, [{ country: 'Syria', runTimestamp: run.runTimestamp, pipeline: 'sentiment', text: 'spike' }]);
    const { ctx } = context(store);

    const result = await callTool(ctx, 'get_alerts', { country: 'Syria' });

    expect(result.content).toEqual([{ type: 'text', text: 'Alerts for Syria\n- [sentiment] spike' }]);
  });

  it('triggers an analysis through the scheduler', async () => {
    const { ctx, runNow } = context();

    const result = await callTool(ctx, 'trigger_analysis', { country: 'Libya' });

    expect(runNow).toHaveBeenCalledWith('Libya');
    expect(result.isError).toBe(false);
    expect(result.content).toEqual([
      { type: 'text', text: 'Analysis for Libya finished with status completed at 2025-06-15T12:00:00.000Z.' },
    ]);
  });

  it('rejects unknown tools', async () => {
    const { ctx } = context();
    await expect(callTool(ctx, 'drop_tables', {})).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });
});

describe('toMcpError', () => {
  it('keeps the code of monitor errors', () => {
    expect(toMcpError(new FetchError('down', 'acled')).code).toBe(ErrorCode.InternalError);
  });

  it('wraps unexpected errors as internal errors', () => {
    const error = toMcpError(new TypeError('oops'));
    expect(error).toBeInstanceOf(McpError);
    expect(error.code).toBe(ErrorCode.InternalError);
  });
});

describe('formatTrigger', () => {
  it('describes failed and suppressed runs', () => {
    expect(formatTrigger({ country: 'Syria', ok: false, status: 'failed', error: 'boom' })).toBe(
      'Analysis for Syria failed: boom',
    );
    expect(formatTrigger({ country: 'Syria', ok: true, status: 'suppressed' })).toBe(
      'Analysis for Syria skipped: a recent run already exists.',
    );
  });
});

describe('TOOL_DEFINITIONS', () => {
  it('describes tool arguments as object schemas', () => {
    const history = TOOL_DEFINITIONS.find((t) => t.name === 'get_run_history');
    expect(history?.inputSchema.type).toBe('object');
    expect(Object.keys(history?.inputSchema.properties ?? {})).toEqual(['country', 'limit']);
    expect(history?.inputSchema.required).toEqual(['country']);
  });
});
