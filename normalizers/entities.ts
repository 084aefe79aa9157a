/**
 * Account identifier canonicalization and status filtering for listed entities
 */

import { ValidationError } from '../src/errors.js';
import type { StatusBearing } from './types.js';

export const ACCOUNT_ID_PREFIX = 'act_';

/**
 * Return the canonical `act_`-prefixed form of an ad account ID.
 * Idempotent: already-prefixed IDs are returned as-is (trimmed).
 *
 * @throws ValidationError if the ID is empty
 */
export function normalizeAccountId(id: string): string {
  const trimmed = id.trim();
  const bare = trimmed.startsWith(ACCOUNT_ID_PREFIX)
    ? trimmed.slice(ACCOUNT_ID_PREFIX.length)
    : trimmed;

  if (bare.length === 0) {
    throw new ValidationError('Account ID is required', { field: 'accountId' });
  }

  return `${ACCOUNT_ID_PREFIX}${bare}`;
}

/**
 * Keep the records whose status exactly matches (case-sensitive),
 * preserving input order. Without a status the input is returned unchanged.
 */
export function filterByStatus<T extends StatusBearing>(records: T[], status?: string): T[] {
  if (status === undefined) {
    return records;
  }
  return records.filter((record) => record.status === status);
}
