/**
 * Cursor-following page fetcher
 *
 * Pages are requested strictly in sequence: each cursor comes from the
 * previous response and must stay on the configured API origin, since the
 * bearer token is sent with it. Every call owns its accumulator and cursor.
 */

import type { z } from 'zod';
import { GraphPageSchema, formatValidationErrors } from '../../schemas/index.js';
import type { ClientConfig, Page } from '../../schemas/index.js';
import { UpstreamProtocolError } from '../../src/errors.js';
import { buildGraphUrl, getJson } from './fetch.js';
import type {
  FetchingState,
  GraphQueryParams,
  GraphRequestOptions,
  PaginationLimits,
  PaginationState,
} from './types.js';

export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Decode one response body into a Page
 *
 * @throws UpstreamProtocolError if the `data` array is missing or a record
 *   does not match the collection's schema
 */
export function parsePage<T>(body: unknown, recordSchema: RecordSchema<T>, endpoint: string): Page<T> {
  const envelope = GraphPageSchema.safeParse(body);
  if (!envelope.success) {
    throw new UpstreamProtocolError(
      `Malformed page from ${endpoint}: ${formatValidationErrors(envelope.error).join('; ')}`,
      { field: 'data' }
    );
  }

  const records: T[] = [];
  envelope.data.data.forEach((item, index) => {
    const record = recordSchema.safeParse(item);
    if (!record.success) {
      throw new UpstreamProtocolError(
        `Malformed record ${index} from ${endpoint}: ${formatValidationErrors(record.error).join('; ')}`,
        { field: `data.${index}` }
      );
    }
    records.push(record.data);
  });

  return { records, nextCursor: envelope.data.paging?.next ?? null };
}

function originOf(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

/**
 * Advance the state machine by one fetched page
 */
export function advancePagination<T>(
  state: FetchingState<T>,
  page: Page<T>,
  limits: PaginationLimits = {}
): PaginationState<T> {
  const { maxPages, origin } = limits;
  const pagesFetched = state.pagesFetched + 1;

  if (page.records.length === 0) {
    return { status: 'done', records: state.records, pagesFetched };
  }

  const records = state.records.concat(page.records);

  if (page.nextCursor === null) {
    return { status: 'done', records, pagesFetched };
  }

  if (state.cursor !== null && page.nextCursor === state.cursor) {
    return {
      status: 'failed',
      error: new UpstreamProtocolError(
        `Pagination cursor did not advance after page ${pagesFetched}`,
        { field: 'paging.next' }
      ),
      pagesFetched,
    };
  }

  if (origin !== undefined && originOf(page.nextCursor) !== origin) {
    return {
      status: 'failed',
      error: new UpstreamProtocolError(`Pagination cursor points outside ${origin}`, {
        field: 'paging.next',
      }),
      pagesFetched,
    };
  }

  if (maxPages !== undefined && pagesFetched >= maxPages) {
    return {
      status: 'failed',
      error: new UpstreamProtocolError(
        `Pagination exceeded the limit of ${maxPages} pages`,
        { field: 'paging.next' }
      ),
      pagesFetched,
    };
  }

  return {
    status: 'fetching',
    url: page.nextCursor,
    cursor: page.nextCursor,
    records,
    pagesFetched,
  };
}

/**
 * Fetch every page of a collection endpoint and return all records in
 * server order. A failure at any page yields no result.
 *
 * @param endpoint - Path relative to the API version, e.g. `act_123/campaigns`
 * @param params - Query parameters for the first request; later requests
 *   follow the cursor, which already carries them
 * @param recordSchema - Schema every record must satisfy
 */
export async function fetchAllPages<T>(
  config: ClientConfig,
  endpoint: string,
  params: GraphQueryParams,
  recordSchema: RecordSchema<T>,
  options: GraphRequestOptions = {}
): Promise<T[]> {
  const limits: PaginationLimits = {
    maxPages: config.maxPages,
    origin: new URL(config.baseUrl).origin,
  };
  let state: PaginationState<T> = {
    status: 'fetching',
    url: buildGraphUrl(config, endpoint, { ...params, limit: String(config.pageSize) }),
    cursor: null,
    records: [],
    pagesFetched: 0,
  };

  while (state.status === 'fetching') {
    const body = await getJson(config, state.url, options);
    state = advancePagination(state, parsePage(body, recordSchema, endpoint), limits);
  }

  if (state.status === 'failed') {
    throw state.error;
  }

  return state.records;
}
