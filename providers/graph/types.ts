/**
 * Graph provider request and pagination types
 */

import type { Cursor } from '../../schemas/index.js';
import type { AdsApiError } from '../../src/errors.js';

/**
 * Per-call request options
 */
export interface GraphRequestOptions {
  /** Caller-owned abort signal; aborting releases any open request */
  signal?: AbortSignal;
}

/**
 * Query parameters sent with the first page request
 */
export type GraphQueryParams = Record<string, string>;

/**
 * Page request still to be issued
 */
export interface FetchingState<T> {
  status: 'fetching';
  /** URL of the page to request next */
  url: string;
  /** Cursor consumed to build `url`, null for the first page */
  cursor: Cursor | null;
  records: T[];
  pagesFetched: number;
}

/**
 * Bounds checked after every page
 */
export interface PaginationLimits {
  /** Fail once this many pages have been fetched and a cursor remains */
  maxPages?: number;
  /** Origin every next-page cursor must share */
  origin?: string;
}

/**
 * Cursor-following state machine
 *
 * fetching -> fetching  while a fresh cursor is present
 * fetching -> done      on an absent cursor or an empty page
 * fetching -> failed    on a repeated or foreign cursor, or an exceeded page bound
 */
export type PaginationState<T> =
  | FetchingState<T>
  | { status: 'done'; records: T[]; pagesFetched: number }
  | { status: 'failed'; error: AdsApiError; pagesFetched: number };

/**
 * Entity collections reachable under an ad account
 */
export type AccountEdge = 'campaigns' | 'adsets' | 'ads';
