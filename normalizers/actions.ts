/**
 * Action flattening for insights report rows
 *
 * Transforms nested structures like:
 *   { actions: [{ action_type: 'purchase', value: '3' }, { action_type: 'purchase', value: '2' }] }
 *   { conversions: { schedule_total: '296' } }
 * into:
 *   { action_purchase: 5 }
 *   { conversion_schedule_total: 296 }
 */

import type { FlattenedRecord, InsightRecord, JsonValue } from '../schemas/index.js';
import { FlattenError } from '../src/errors.js';
import { acceptsActionMap, buildActionKey, isNumericField } from './mappings.js';
import type { ActionListEntry, FieldValue, FlattenOptions } from './types.js';
import { parseNumericValue } from './utils.js';

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toActionListEntry(item: JsonValue): ActionListEntry | null {
  if (!isJsonObject(item)) {
    return null;
  }
  const actionType = item.action_type;
  if (typeof actionType !== 'string') {
    return null;
  }
  return { action_type: actionType, value: 'value' in item ? item.value : undefined };
}

/**
 * Classify a row field by shape.
 *
 * An array counts as an action list when every element carries a string
 * `action_type`, whatever its `value`; an empty array is an empty list.
 */
export function classifyField(field: string, value: JsonValue): FieldValue {
  if (Array.isArray(value)) {
    const entries: ActionListEntry[] = [];
    for (const item of value) {
      const entry = toActionListEntry(item);
      if (entry === null) {
        return { kind: 'scalar', value };
      }
      entries.push(entry);
    }
    return { kind: 'actionList', entries };
  }

  if (isJsonObject(value)) {
    if (acceptsActionMap(field)) {
      return {
        kind: 'actionMap',
        entries: Object.entries(value).map(([actionType, amount]) => ({
          action_type: actionType,
          value: amount,
        })),
      };
    }
    return { kind: 'object', fields: value };
  }

  return { kind: 'scalar', value };
}

function parseActionValue(field: string, entry: ActionListEntry): number {
  const { value } = entry;
  const amount =
    typeof value === 'string' || typeof value === 'number' ? parseNumericValue(value) : null;

  if (amount === null) {
    const problem =
      value === undefined ? 'Missing value' : `Non-numeric value ${JSON.stringify(value)}`;
    throw new FlattenError(
      `${problem} for action type "${entry.action_type}" in field "${field}"`,
      { field, actionType: entry.action_type }
    );
  }

  return amount;
}

/**
 * Sum the entries of one action field into `<prefix>_<action_type>` keys
 *
 * @throws FlattenError if an entry's value is missing or not numeric
 */
function sumActionEntries(
  field: string,
  entries: ActionListEntry[],
  allowed: ReadonlySet<string> | null
): Map<string, number> {
  const totals = new Map<string, number>();

  for (const entry of entries) {
    if (allowed && !allowed.has(entry.action_type)) {
      continue;
    }

    const key = buildActionKey(field, entry.action_type);
    totals.set(key, (totals.get(key) ?? 0) + parseActionValue(field, entry));
  }

  return totals;
}

/**
 * Output row that remembers which source field produced each key
 */
class FlatRecordBuilder {
  readonly record: FlattenedRecord = {};
  private readonly sources = new Map<string, string>();

  set(key: string, value: JsonValue, field: string): void {
    const existing = this.sources.get(key);
    if (existing !== undefined) {
      throw new FlattenError(
        `Key "${key}" from field "${field}" collides with field "${existing}"`,
        { field }
      );
    }
    this.sources.set(key, field);
    this.record[key] = value;
  }
}

/**
 * Flatten every action field of a report row
 *
 * - Each action list or conversion map is replaced by one numeric key per distinct action type
 * - Values sharing an action type within a field are summed
 * - Other nested objects are expanded into `<field>_<key>` entries
 * - Remaining fields pass through unchanged
 *
 * @throws FlattenError on the first missing or non-numeric action value, or
 *   when two source fields produce the same key
 */
export function flattenActions(record: InsightRecord, options: FlattenOptions = {}): FlattenedRecord {
  const allowed = options.actionTypes ? new Set(options.actionTypes) : null;
  const flat = new FlatRecordBuilder();

  for (const [field, value] of Object.entries(record)) {
    const classified = classifyField(field, value);

    switch (classified.kind) {
      case 'scalar':
        flat.set(field, classified.value, field);
        break;
      case 'actionList':
      case 'actionMap':
        for (const [key, total] of sumActionEntries(field, classified.entries, allowed)) {
          flat.set(key, total, field);
        }
        break;
      case 'object':
        for (const [subKey, subValue] of Object.entries(classified.fields)) {
          flat.set(`${field}_${subKey}`, subValue, field);
        }
        break;
    }
  }

  return flat.record;
}

/**
 * Convert numeric strings of known metric fields to numbers.
 * Strings that do not parse stay as they are.
 */
export function coerceNumericFields(record: FlattenedRecord): FlattenedRecord {
  const converted: FlattenedRecord = {};

  for (const [field, value] of Object.entries(record)) {
    if (typeof value === 'string' && isNumericField(field)) {
      converted[field] = parseNumericValue(value) ?? value;
    } else {
      converted[field] = value;
    }
  }

  return converted;
}
