/**
 * Zod schemas for runtime validation of queries, configuration and
 * upstream response bodies.
 */

import { z } from 'zod';
import type { JsonValue } from './types.js';

/**
 * Insights aggregation levels accepted by the reporting endpoint
 */
export const InsightsLevelSchema = z.enum(['account', 'campaign', 'adset', 'ad']);

/**
 * Date in YYYY-MM-DD format that names a real calendar day
 */
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const DateSchema = z
  .string()
  .regex(DATE_REGEX, {
    message: 'Date must be in YYYY-MM-DD format',
  })
  .refine(isCalendarDate, { message: 'Date must be a valid calendar date' });

/**
 * Report time granularity: a day count (1-90), `monthly` or `all_days`.
 * Numeric strings such as "7" are accepted and converted.
 */
export const TimeIncrementSchema = z.union([
  z.literal('monthly'),
  z.literal('all_days'),
  z.number().int().min(1).max(90),
  z
    .string()
    .regex(/^\d+$/, { message: "Time increment must be a day count, 'monthly' or 'all_days'" })
    .transform(Number)
    .pipe(z.number().int().min(1).max(90)),
]);

const NonEmptyStringListSchema = z.array(z.string().min(1, 'Entries must be non-empty strings'));

/**
 * Insights query. Only shape is checked for fields and breakdowns:
 * which combinations are legal is decided upstream.
 */
export const InsightsQuerySchema = z
  .object({
    /** Ad account ID, with or without the `act_` prefix */
    accountId: z.string().trim().min(1, 'Account ID is required'),
    /** First day of the report range (inclusive) */
    startDate: DateSchema,
    /** Last day of the report range (inclusive) */
    endDate: DateSchema,
    /** Metrics to retrieve */
    fields: NonEmptyStringListSchema.min(1, 'At least one field is required'),
    /** Aggregation level (default: account) */
    level: InsightsLevelSchema.default('account'),
    /** Segmentation dimensions such as age or country */
    breakdowns: NonEmptyStringListSchema.optional(),
    /** Time granularity */
    timeIncrement: TimeIncrementSchema.optional(),
    /** Expand action lists into flat fields (default: true) */
    flattenActions: z.boolean().default(true),
    /** Restrict flattened action keys to these action types */
    actionTypes: NonEmptyStringListSchema.optional(),
    /** Convert numeric strings of known metric fields to numbers after flattening (default: true) */
    coerceNumeric: z.boolean().default(true),
  })
  .refine((query) => query.startDate <= query.endDate, {
    message: 'startDate must not be after endDate',
    path: ['startDate'],
  });

/**
 * Any JSON value, checked recursively
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Insights report row
 */
export const InsightRecordSchema = z.record(JsonValueSchema);

/**
 * Envelope of a paginated collection response. Records are validated
 * separately against the collection's own record schema.
 */
export const GraphPageSchema = z.object({
  data: z.array(z.unknown()),
  paging: z
    .object({
      next: z.string().optional(),
      previous: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

/**
 * Error body returned with non-2xx responses
 */
export const GraphErrorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      type: z.string().optional(),
      code: z.number().optional(),
      error_subcode: z.number().optional(),
      fbtrace_id: z.string().optional(),
    })
    .optional(),
});

/**
 * Ad account returned by `me/adaccounts`
 */
export const AccountRecordSchema = z
  .object({
    /** Account ID with `act_` prefix */
    id: z.string(),
    /** Numeric account ID */
    account_id: z.string().optional(),
    name: z.string().optional(),
    currency: z.string().optional(),
    timezone_name: z.string().optional(),
    /** 1 = active, 2 = disabled, 101 = closed, ... */
    account_status: z.number().optional(),
    business: z
      .object({
        id: z.string(),
        name: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Campaign returned by `<account>/campaigns`
 */
export const CampaignRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    status: z.string().optional(),
    effective_status: z.string().optional(),
    objective: z.string().optional(),
    /** Budgets are expressed in the account currency's minor unit */
    daily_budget: z.string().optional(),
    lifetime_budget: z.string().optional(),
    created_time: z.string().optional(),
    updated_time: z.string().optional(),
  })
  .passthrough();

/**
 * Ad set returned by `<account>/adsets`
 */
export const AdSetRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    status: z.string().optional(),
    effective_status: z.string().optional(),
    campaign_id: z.string().optional(),
    daily_budget: z.string().optional(),
    lifetime_budget: z.string().optional(),
    targeting: z.record(JsonValueSchema).optional(),
    created_time: z.string().optional(),
    updated_time: z.string().optional(),
  })
  .passthrough();

/**
 * Ad returned by `<account>/ads`
 */
export const AdRecordSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    status: z.string().optional(),
    effective_status: z.string().optional(),
    adset_id: z.string().optional(),
    creative: z
      .object({
        id: z.string(),
        title: z.string().optional(),
        body: z.string().optional(),
        image_url: z.string().optional(),
      })
      .passthrough()
      .optional(),
    created_time: z.string().optional(),
    updated_time: z.string().optional(),
  })
  .passthrough();

/**
 * Client configuration. Defaults fill everything but the access token.
 */
export const ClientConfigSchema = z.object({
  /** Bearer credential for the reporting API */
  accessToken: z.string().trim().min(1, 'Access token is required'),
  /** Graph API version segment, e.g. v21.0 */
  apiVersion: z
    .string()
    .regex(/^v\d+\.\d+$/, { message: 'API version must look like v21.0' })
    .default('v21.0'),
  baseUrl: z.string().url().default('https://graph.facebook.com'),
  /** Retries after a rate-limit response before giving up */
  maxRetries: z.number().int().nonnegative().default(3),
  /** First backoff delay; doubled on each further retry */
  baseDelayMs: z.number().int().nonnegative().default(1000),
  /** Upper bound on any single backoff delay, including Retry-After */
  maxRetryDelayMs: z.number().int().nonnegative().default(60000),
  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(30000),
  /** Records requested per page */
  pageSize: z.number().int().positive().max(5000).default(500),
  /** Upper bound on pages followed by a single fetch (unbounded when unset) */
  maxPages: z.number().int().positive().optional(),
});

// Type exports inferred from schemas
export type InsightsQueryInput = z.input<typeof InsightsQuerySchema>;
export type InsightsQuery = z.output<typeof InsightsQuerySchema>;
export type TimeIncrement = z.output<typeof TimeIncrementSchema>;
export type GraphPage = z.infer<typeof GraphPageSchema>;
export type GraphErrorBody = z.infer<typeof GraphErrorBodySchema>;
export type AccountRecord = z.infer<typeof AccountRecordSchema>;
export type CampaignRecord = z.infer<typeof CampaignRecordSchema>;
export type AdSetRecord = z.infer<typeof AdSetRecordSchema>;
export type AdRecord = z.infer<typeof AdRecordSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type ClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate an insights query safely (returns result object)
 */
export function safeValidateInsightsQuery(
  data: unknown
): z.SafeParseReturnType<InsightsQueryInput, InsightsQuery> {
  return InsightsQuerySchema.safeParse(data);
}

/**
 * Validate client configuration safely (returns result object)
 */
export function safeValidateClientConfig(
  data: unknown
): z.SafeParseReturnType<ClientConfigInput, ClientConfig> {
  return ClientConfigSchema.safeParse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
