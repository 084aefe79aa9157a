/**
 * Normalization utility functions
 */

const DECIMAL_REGEX = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse an upstream numeric value
 *
 * Numbers pass through when finite. Strings are trimmed and must be a plain
 * decimal literal ("12", "-3.5", "1e3"); anything else yields null.
 */
export function parseNumericValue(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (!DECIMAL_REGEX.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}
