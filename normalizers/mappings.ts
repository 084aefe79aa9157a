/**
 * Key naming tables for flattened report rows
 */

import type { ActionFieldMapping } from './types.js';

/**
 * Action-list fields whose flattened keys use a shorter prefix.
 * Any other action-list field uses its own name as prefix.
 *
 * Conversion fields may also arrive as `{ <action_type>: value }` objects.
 */
export const ACTION_FIELD_MAPPINGS: ActionFieldMapping[] = [
  { field: 'actions', prefix: 'action', description: 'Action counts' },
  { field: 'action_values', prefix: 'action_value', description: 'Monetary value of actions' },
  {
    field: 'conversions',
    prefix: 'conversion',
    description: 'Conversions API events',
    acceptsMap: true,
  },
  {
    field: 'conversion_values',
    prefix: 'conversion_value',
    description: 'Monetary value of conversions',
    acceptsMap: true,
  },
];

/**
 * Substrings marking a field as numeric for coerceNumericFields
 */
export const NUMERIC_FIELD_PATTERNS: readonly string[] = [
  'spend',
  'impressions',
  'clicks',
  'reach',
  'frequency',
  'ctr',
  'cpc',
  'cpm',
  'conversions',
  'cost',
  'action_',
  'value',
  'video',
  'budget',
];

/**
 * Get the key prefix used when flattening an action-list field
 */
export function getActionKeyPrefix(field: string): string {
  const mapping = ACTION_FIELD_MAPPINGS.find((m) => m.field === field);
  return mapping?.prefix ?? field;
}

/**
 * Whether an object value of this field is keyed by action type
 */
export function acceptsActionMap(field: string): boolean {
  return ACTION_FIELD_MAPPINGS.some((m) => m.field === field && m.acceptsMap === true);
}

/**
 * Build the flattened key for one action type of a field
 */
export function buildActionKey(field: string, actionType: string): string {
  return `${getActionKeyPrefix(field)}_${actionType}`;
}

/**
 * Whether a field name matches one of the numeric patterns
 */
export function isNumericField(field: string): boolean {
  const lower = field.toLowerCase();
  return NUMERIC_FIELD_PATTERNS.some((pattern) => lower.includes(pattern));
}
