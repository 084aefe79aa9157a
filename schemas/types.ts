/**
 * Aggregation granularity of an insights query
 */
export type InsightsLevel = 'account' | 'campaign' | 'adset' | 'ad';

/**
 * Any value that can appear in a decoded JSON response body
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Opaque token identifying the next page of a collection.
 * Compared for equality only, never parsed.
 */
export type Cursor = string;

/**
 * One page of a cursor-paginated collection
 */
export interface Page<T> {
  /** Records in server-returned order */
  records: T[];
  /** Cursor for the following page, null on the last page */
  nextCursor: Cursor | null;
}

/**
 * A single `{action_type, value}` pair inside an action-list field
 * (e.g. `actions`, `action_values`, `cost_per_action_type`).
 *
 * Declared as a type alias so it stays assignable to JsonValue.
 */
export type ActionEntry = {
  action_type: string;
  value: string | number;
};

/**
 * Raw insights report row as returned by the reporting endpoint.
 * Some values are lists of ActionEntry.
 */
export type InsightRecord = Record<string, JsonValue>;

/**
 * Report row after flattening: action lists are expanded into
 * `<prefix>_<action_type>` numeric keys, every other field is untouched.
 */
export type FlattenedRecord = Record<string, JsonValue>;

/**
 * Row returned from an insights operation, flattened or raw
 */
export type InsightRow = InsightRecord | FlattenedRecord;
