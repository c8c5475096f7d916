import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

/*
 * Stored shapes are parsed leniently: records written by earlier versions may
 * lack any field marked optional/default here.
 */

const BucketSchema = z.object({
  periodStart: z.string(),
  metrics: z.record(z.number()),
});

const PipelineSchema = z.object({
  hasData: z.boolean(),
  totals: z.record(z.number()).default({}),
  latestBucket: BucketSchema.nullable().default(null),
  recentAlerts: z.array(z.string()).default([]),
  trendPct: z.record(z.number()).default({}),
  hasRecentAnomaly: z.boolean().default(false),
  bucketCount: z.number().default(0),
  effectiveWindow: z.number().nullable().default(null),
});

const ScoredArticleSchema = z.object({
  title: z.string(),
  snippet: z.string().default(''),
  link: z.string().default(''),
  sentimentScore: z.number(),
});

const DigestSchema = z.object({
  meanScore: z.number(),
  stdDev: z.number(),
  articleCount: z.number().optional(),
  mostNegative: ScoredArticleSchema,
  mostPositive: ScoredArticleSchema,
  summary: z.string().default(''),
  articles: z.array(ScoredArticleSchema).default([]),
});

const IssueSchema = z.object({
  kind: z.enum(['fetch_error', 'empty_data', 'insufficient_history', 'summarization_error']),
  pipeline: z.enum(['events', 'sentiment']),
  message: z.string(),
});

export const StoredRunSchema = z.object({
  country: z.string(),
  runTimestamp: z.string(),
  period: z.enum(['week', 'month']).default('week'),
  status: z.enum(['completed', 'skipped_no_data']).optional(),
  hasData: z.boolean(),
  totals: z.record(z.number()).default({}),
  latestBucket: BucketSchema.nullable().optional(),
  recentAlerts: z.array(z.string()).default([]),
  trendPct: z.record(z.number()).default({}),
  pipelines: z
    .object({
      events: PipelineSchema,
      sentiment: PipelineSchema,
    })
    .partial()
    .optional(),
  digest: DigestSchema.nullable().optional(),
  issues: z.array(IssueSchema).default([]),
});

export const StoredAlertSchema = z.object({
  country: z.string(),
  runTimestamp: z.string(),
  pipeline: z.enum(['events', 'sentiment']).default('events'),
  text: z.string(),
});

/** Outer document of the JSON store; rows are validated one by one. */
export const StoreFileSchema = z.object({
  runs: z.array(z.unknown()).default([]),
  alerts: z.array(z.unknown()).default([]),
});

export type StoredRun = z.infer<typeof StoredRunSchema>;
export type StoredAlert = z.infer<typeof StoredAlertSchema>;

export const CountryResultSchema = z.object({
  country: z.string(),
  runTimestamp: z.string(),
  status: z.enum(['completed', 'skipped_no_data']),
  hasData: z.boolean(),
  hasAnomalies: z.boolean(),
  period: z.enum(['week', 'month']),
  totals: z.record(z.number()),
  trendPct: z.record(z.number()),
  weeklyEvents: z.number(),
  weeklyFatalities: z.number(),
  latestBucket: BucketSchema.nullable(),
  coordinates: z.tuple([z.number(), z.number()]).nullable(),
  alerts: z.array(z.string()),
  sentiment: z
    .object({
      meanScore: z.number(),
      stdDev: z.number(),
      articleCount: z.number(),
      mostNegative: ScoredArticleSchema,
      mostPositive: ScoredArticleSchema,
      summary: z.string(),
      articles: z.array(ScoredArticleSchema),
    })
    .nullable(),
  issues: z.array(IssueSchema),
});

export const AllResultsSchema = z.object({
  results: z.record(
    z.object({
      runTimestamp: z.string(),
      hasData: z.boolean(),
      eventCount: z.number(),
      fatalityCount: z.number(),
      meanScore: z.number().nullable(),
      anomaly: z.boolean(),
      explanation: z.string(),
    }),
  ),
});

export const RunHistorySchema = z.object({
  country: z.string(),
  runs: z.array(
    z.object({
      runTimestamp: z.string(),
      status: z.enum(['completed', 'skipped_no_data']),
      hasData: z.boolean(),
      totals: z.record(z.number()),
      recentAlerts: z.array(z.string()),
    }),
  ),
});

export const TriggerResultSchema = z.object({
  country: z.string(),
  ok: z.boolean(),
  status: z.enum(['completed', 'skipped_no_data', 'suppressed', 'failed']),
  runTimestamp: z.string().optional(),
  error: z.string().optional(),
});

export const AlertListSchema = z.object({
  country: z.string(),
  alerts: z.array(
    z.object({
      runTimestamp: z.string(),
      pipeline: z.enum(['events', 'sentiment']),
      text: z.string(),
    }),
  ),
});

export type CountryResult = z.infer<typeof CountryResultSchema>;
export type AllResults = z.infer<typeof AllResultsSchema>;
export type RunHistory = z.infer<typeof RunHistorySchema>;
export type AlertList = z.infer<typeof AlertListSchema>;
export type TriggerResult = z.infer<typeof TriggerResultSchema>;

export const CountryArgsSchema = z.object({
  country: z.string().trim().min(1, 'country is required'),
});

export const HistoryArgsSchema = CountryArgsSchema.extend({
  limit: z.number().int().positive().max(100).optional(),
});

/** JSON Schema shape accepted by MCP for tool input and output. */
export type ToolJsonSchema = {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
};

export function toToolSchema(schema: z.ZodTypeAny): ToolJsonSchema {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  return {
    type: 'object',
    properties: 'properties' in json ? json.properties : undefined,
    required: 'required' in json ? json.required : undefined,
  };
}

export const countryResultJsonSchema = toToolSchema(CountryResultSchema);
export const allResultsJsonSchema = toToolSchema(AllResultsSchema);
export const runHistoryJsonSchema = toToolSchema(RunHistorySchema);
export const alertListJsonSchema = toToolSchema(AlertListSchema);
export const triggerResultJsonSchema = toToolSchema(TriggerResultSchema);
