/**
 * Graph API transport
 *
 * One authenticated GET per call, with error classification and a bounded
 * retry on rate-limit responses. Every request owns an AbortController
 * combining the per-request timeout with the caller's signal; both are
 * released on every exit path.
 */

import {
  GraphErrorBodySchema,
  type ClientConfig,
  type GraphErrorBody,
} from '../../schemas/index.js';
import {
  AuthError,
  FetchError,
  RateLimitError,
  describeError,
  type AdsApiError,
} from '../../src/errors.js';
import type { GraphQueryParams, GraphRequestOptions } from './types.js';

/** Graph error codes for an invalid or expired access token */
const AUTH_ERROR_CODES = new Set([102, 190]);

/** Graph error codes for application, user and ad-account throttling */
const RATE_LIMIT_ERROR_CODES = new Set([4, 17, 32, 613]);

/** Business use case throttling codes (80000-80014) */
function isBusinessUseCaseThrottle(code: number): boolean {
  return code >= 80000 && code <= 80014;
}

/**
 * Build a Graph API URL for an endpoint relative to the configured version
 */
export function buildGraphUrl(
  config: ClientConfig,
  endpoint: string,
  params: GraphQueryParams = {}
): string {
  const path = endpoint.replace(/^\/+/, '');
  const url = new URL(`${config.baseUrl.replace(/\/+$/, '')}/${config.apiVersion}/${path}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

function parseErrorBody(text: string): GraphErrorBody['error'] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return undefined;
  }
  const result = GraphErrorBodySchema.safeParse(decoded);
  return result.success ? result.data.error : undefined;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || !/^\d+$/.test(header.trim())) {
    return undefined;
  }
  return Number(header.trim()) * 1000;
}

/**
 * Map a non-2xx response to a typed error. Always consumes the body.
 */
async function classifyErrorResponse(response: Response): Promise<AdsApiError> {
  const graphError = parseErrorBody(await response.text());
  const code = graphError?.code;
  const message = graphError?.message ?? (response.statusText || `HTTP ${response.status}`);
  const label = code === undefined ? `${response.status}` : `${response.status} (code ${code})`;

  if (response.status === 401 || (code !== undefined && AUTH_ERROR_CODES.has(code))) {
    return new AuthError(`Graph API auth error ${label}: ${message}`, { status: response.status });
  }

  if (
    response.status === 429 ||
    (code !== undefined && (RATE_LIMIT_ERROR_CODES.has(code) || isBusinessUseCaseThrottle(code)))
  ) {
    return new RateLimitError(`Graph API rate limit ${label}: ${message}`, {
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }

  return new FetchError(`Graph API error ${label}: ${message}`, { status: response.status });
}

function callerAborted(reason: unknown): FetchError {
  return new FetchError('Request aborted by caller', { cause: reason });
}

/**
 * Execute a single GET request and decode its JSON body
 */
async function requestOnce(
  config: ClientConfig,
  url: string,
  options: GraphRequestOptions
): Promise<unknown> {
  const { signal } = options;
  if (signal?.aborted) {
    throw callerAborted(signal.reason);
  }

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${config.timeoutMs}ms`));
  }, config.timeoutMs);
  const onAbort = (): void => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${config.accessToken}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error) {
      throw new FetchError(`Graph API request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw await classifyErrorResponse(response);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new FetchError('Graph API returned a body that is not valid JSON', { cause: error });
    }
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Wait before a retry; rejects as soon as the caller aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(callerAborted(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(callerAborted(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * GET a URL, retrying rate-limit responses with exponential backoff
 *
 * The delay is the upstream Retry-After when present, otherwise
 * `baseDelayMs * 2^attempt`, capped at `maxRetryDelayMs`. After
 * `maxRetries` retries the last RateLimitError is thrown. Other errors
 * are never retried.
 */
export async function getJson(
  config: ClientConfig,
  url: string,
  options: GraphRequestOptions = {}
): Promise<unknown> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await requestOnce(config, url, options);
    } catch (error) {
      if (!(error instanceof RateLimitError) || attempt >= config.maxRetries) {
        throw error;
      }

      const delayMs = Math.min(
        error.retryAfterMs ?? config.baseDelayMs * 2 ** attempt,
        config.maxRetryDelayMs
      );
      console.warn(
        `[graph] Rate limited, retry ${attempt + 1}/${config.maxRetries} in ${delayMs}ms`
      );
      await sleep(delayMs, options.signal);
    }
  }
}
