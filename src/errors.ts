/**
 * Typed failures raised by the fetch engine and its post-processing stages.
 *
 * Only RateLimitError is recovered locally (bounded retry in the transport);
 * every other kind propagates to the caller.
 */

import type { ZodError } from 'zod';
import { formatValidationErrors } from '../schemas/index.js';

export type AdsApiErrorCode =
  | 'AUTH'
  | 'RATE_LIMIT'
  | 'VALIDATION'
  | 'UPSTREAM_PROTOCOL'
  | 'FETCH'
  | 'FLATTEN';

export interface AdsApiErrorOptions {
  /** Offending parameter or field name */
  field?: string;
  cause?: unknown;
}

export abstract class AdsApiError extends Error {
  abstract readonly code: AdsApiErrorCode;
  readonly field?: string;

  constructor(message: string, options: AdsApiErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.field = options.field;
  }
}

/**
 * Invalid or expired credential. Never retried.
 */
export class AuthError extends AdsApiError {
  readonly code = 'AUTH';
  readonly status?: number;

  constructor(message: string, options: AdsApiErrorOptions & { status?: number } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/**
 * Upstream throttling
 */
export class RateLimitError extends AdsApiError {
  readonly code = 'RATE_LIMIT';
  /** Delay requested by the upstream Retry-After header */
  readonly retryAfterMs?: number;

  constructor(message: string, options: AdsApiErrorOptions & { retryAfterMs?: number } = {}) {
    super(message, options);
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Malformed input, rejected before any network call
 */
export class ValidationError extends AdsApiError {
  readonly code = 'VALIDATION';
}

/**
 * Missing pagination field, malformed page or a non-advancing cursor
 */
export class UpstreamProtocolError extends AdsApiError {
  readonly code = 'UPSTREAM_PROTOCOL';
}

/**
 * Transport or HTTP failure not covered by the other kinds
 */
export class FetchError extends AdsApiError {
  readonly code = 'FETCH';
  readonly status?: number;

  constructor(message: string, options: AdsApiErrorOptions & { status?: number } = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/**
 * Non-numeric value inside an action entry
 */
export class FlattenError extends AdsApiError {
  readonly code = 'FLATTEN';
  readonly actionType?: string;

  constructor(message: string, options: AdsApiErrorOptions & { actionType?: string } = {}) {
    super(message, options);
    this.actionType = options.actionType;
  }
}

/**
 * Wrap a ZodError into a ValidationError naming the first offending field
 */
export function toValidationError(context: string, error: ZodError): ValidationError {
  const firstPath = error.errors[0]?.path.join('.');
  return new ValidationError(`${context}: ${formatValidationErrors(error).join('; ')}`, {
    field: firstPath || undefined,
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
