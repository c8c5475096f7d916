import { ErrorCode, McpError, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { MonitorError, UnknownCountryError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import {
  AlertListSchema,
  AllResultsSchema,
  CountryArgsSchema,
  CountryResultSchema,
  HistoryArgsSchema,
  RunHistorySchema,
  TriggerResultSchema,
  alertListJsonSchema,
  allResultsJsonSchema,
  countryResultJsonSchema,
  runHistoryJsonSchema,
  toToolSchema,
  triggerResultJsonSchema,
  type AlertList,
  type AllResults,
  type CountryResult,
  type RunHistory,
  type ToolJsonSchema,
  type TriggerResult,
} from './schemas/results.js';
import { getAlerts, getAllResults, getCountryResult, getRunHistory } from './services/queries.js';
import type { ResultStore } from './services/resultStore.js';

export interface ToolContext {
  store: ResultStore;
  scheduler: {
    readonly countries: readonly string[];
    runNow(country: string): Promise<TriggerResult>;
  };
}

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolJsonSchema;
  outputSchema: ToolJsonSchema;
};

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: 'get_country_results',
    description: 'Latest stored analysis for one tracked country: weekly figures, trends, alerts and news sentiment.',
    inputSchema: toToolSchema(CountryArgsSchema),
    outputSchema: countryResultJsonSchema,
  },
  {
    name: 'get_all_results',
    description: 'Latest stored analysis summary for every tracked country that has results.',
    inputSchema: { type: 'object', properties: {} },
    outputSchema: allResultsJsonSchema,
  },
  {
    name: 'get_run_history',
    description: 'Stored runs for one tracked country, newest first.',
    inputSchema: toToolSchema(HistoryArgsSchema),
    outputSchema: runHistoryJsonSchema,
  },
  {
    name: 'get_alerts',
    description: 'Anomaly alerts persisted for one tracked country, newest first.',
    inputSchema: toToolSchema(HistoryArgsSchema),
    outputSchema: alertListJsonSchema,
  },
  {
    name: 'trigger_analysis',
    description: 'Run the analysis for one tracked country now and wait for it to finish.',
    inputSchema: toToolSchema(CountryArgsSchema),
    outputSchema: triggerResultJsonSchema,
  },
];

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
  }
  return parsed.data;
}

function assertTracked(ctx: ToolContext, country: string): void {
  if (!ctx.scheduler.countries.includes(country)) {
    throw new UnknownCountryError(country);
  }
}

/**
 * Dispatch one MCP tool call. Every structured payload is checked against its
 * output schema before it leaves the process.
 */
export async function callTool(ctx: ToolContext, name: string, args: unknown): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'get_country_results': {
        const { country } = parseArgs(CountryArgsSchema, args);
        assertTracked(ctx, country);
        const result = CountryResultSchema.parse(await getCountryResult(ctx.store, country));
        return { content: [{ type: 'text', text: formatCountryResult(result) }], structuredContent: result };
      }
      case 'get_all_results': {
        const result = AllResultsSchema.parse(await getAllResults(ctx.store, ctx.scheduler.countries));
        return { content: [{ type: 'text', text: formatAllResults(result) }], structuredContent: result };
      }
      case 'get_run_history': {
        const { country, limit } = parseArgs(HistoryArgsSchema, args);
        assertTracked(ctx, country);
        const result = RunHistorySchema.parse(await getRunHistory(ctx.store, country, limit));
        return { content: [{ type: 'text', text: formatRunHistory(result) }], structuredContent: result };
      }
      case 'get_alerts': {
        const { country, limit } = parseArgs(HistoryArgsSchema, args);
        assertTracked(ctx, country);
        const result = AlertListSchema.parse(await getAlerts(ctx.store, country, limit));
        return { content: [{ type: 'text', text: formatAlerts(result) }], structuredContent: result };
      }
      case 'trigger_analysis': {
        const { country } = parseArgs(CountryArgsSchema, args);
        const result = TriggerResultSchema.parse(await ctx.scheduler.runNow(country));
        return {
          content: [{ type: 'text', text: formatTrigger(result) }],
          structuredContent: result,
          isError: !result.ok,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (error: unknown) {
    throw toMcpError(error);
  }
}

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof MonitorError) {
    return new McpError(error.code, error.message);
  }
  logger.error({ err: error }, 'Unexpected tool invocation failure');
  return new McpError(ErrorCode.InternalError, errorMessage(error));
}

export function formatCountryResult(result: CountryResult): string {
  const lines = [
    `${result.country}: ${result.status} run at ${result.runTimestamp}`,
    `Violent events this ${result.period}: ${result.weeklyEvents} (${result.weeklyFatalities} deaths)`,
  ];
  if (result.sentiment) {
    lines.push(
      `News sentiment: ${result.sentiment.meanScore.toFixed(2)} across ${result.sentiment.articleCount} articles`,
    );
  }
  if (result.alerts.length) {
    lines.push('Alerts:', ...result.alerts.map((a) => `- ${a}`));
  } else {
    lines.push('No recent anomalies.');
  }
  return lines.join('\n');
}

export function formatAllResults(result: AllResults): string {
  const entries = Object.entries(result.results);
  if (!entries.length) return 'No results stored yet.';
  return entries
    .map(([country, r]) => {
      const flag = r.anomaly ? ` | ${r.explanation}` : '';
      return `${country}: ${r.eventCount} events, ${r.fatalityCount} deaths${flag}`;
    })
    .join('\n');
}

export function formatRunHistory(result: RunHistory): string {
  const lines = result.runs.map(
    (r) => `${r.runTimestamp} ${r.status} (${r.recentAlerts.length} alert${r.recentAlerts.length === 1 ? '' : 's'})`,
  );
  return [`Run history for ${result.country}`, ...lines].join('\n');
}

export function formatAlerts(result: AlertList): string {
  if (!result.alerts.length) return `No alerts stored for ${result.country}.`;
  return [`Alerts for ${result.country}`, ...result.alerts.map((a) => `- [${a.pipeline}] ${a.text}`)].join('\n');
}

export function formatTrigger(result: TriggerResult): string {
  if (!result.ok) return `Analysis for ${result.country} failed: ${result.error ?? 'unknown error'}`;
  if (result.status === 'suppressed') return `Analysis for ${result.country} skipped: a recent run already exists.`;
  return `Analysis for ${result.country} finished with status ${result.status} at ${result.runTimestamp ?? 'n/a'}.`;
}
