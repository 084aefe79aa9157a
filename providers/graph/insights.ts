/**
 * Insights reporting: query validation, parameter building and
 * post-processing of report rows
 */

import { InsightRecordSchema, safeValidateInsightsQuery } from '../../schemas/index.js';
import type {
  ClientConfig,
  InsightRow,
  InsightsQuery,
  InsightsQueryInput,
} from '../../schemas/index.js';
import { coerceNumericFields, flattenActions, normalizeAccountId } from '../../normalizers/index.js';
import { toValidationError } from '../../src/errors.js';
import { fetchAllPages } from './pagination.js';
import type { GraphQueryParams, GraphRequestOptions } from './types.js';

/**
 * Insights query with the level fixed to campaign
 */
export type CampaignInsightsQueryInput = Omit<InsightsQueryInput, 'level'>;

/**
 * Build the upstream query parameters for a validated insights query
 */
export function buildInsightsParams(query: InsightsQuery): GraphQueryParams {
  const params: GraphQueryParams = {
    fields: query.fields.join(','),
    level: query.level,
    time_range: JSON.stringify({ since: query.startDate, until: query.endDate }),
  };

  if (query.breakdowns && query.breakdowns.length > 0) {
    params.breakdowns = query.breakdowns.join(',');
  }

  if (query.timeIncrement !== undefined) {
    params.time_increment = String(query.timeIncrement);
  }

  return params;
}

/**
 * Fetch all insights rows for an ad account
 *
 * The query is validated before any request is issued. Rows are flattened
 * unless `flattenActions` is false, in which case nested action lists are
 * returned intact.
 *
 * @throws ValidationError on a malformed query
 * @throws FlattenError if an action value is not numeric
 */
export async function getInsights(
  config: ClientConfig,
  input: InsightsQueryInput,
  options: GraphRequestOptions = {}
): Promise<InsightRow[]> {
  const validated = safeValidateInsightsQuery(input);
  if (!validated.success) {
    throw toValidationError('Invalid insights query', validated.error);
  }

  const query = validated.data;
  const endpoint = `${normalizeAccountId(query.accountId)}/insights`;
  const rows = await fetchAllPages(
    config,
    endpoint,
    buildInsightsParams(query),
    InsightRecordSchema,
    options
  );

  if (!query.flattenActions) {
    return rows;
  }

  const flattenOptions = { actionTypes: query.actionTypes };
  return rows.map((row) => {
    const flat = flattenActions(row, flattenOptions);
    return query.coerceNumeric ? coerceNumericFields(flat) : flat;
  });
}

/**
 * Fetch insights broken down by campaign
 */
export async function getCampaignInsights(
  config: ClientConfig,
  input: CampaignInsightsQueryInput,
  options: GraphRequestOptions = {}
): Promise<InsightRow[]> {
  return getInsights(config, { ...input, level: 'campaign' }, options);
}
