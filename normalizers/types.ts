/**
 * Types shared by the post-processing stages
 */

import type { JsonValue } from '../schemas/index.js';

/**
 * One `{action_type, value}` pair as found in a row. The value is checked
 * when the pair is summed, so it may be missing or of any JSON type here.
 */
export interface ActionListEntry {
  action_type: string;
  value: JsonValue | undefined;
}

/**
 * A report row field, classified by shape
 *
 * - `actionList`: array of `{action_type, value}` objects
 * - `actionMap`: conversion object keyed by action type
 * - `object`: any other nested object, expanded one level
 */
export type FieldValue =
  | { kind: 'scalar'; value: JsonValue }
  | { kind: 'actionList'; entries: ActionListEntry[] }
  | { kind: 'actionMap'; entries: ActionListEntry[] }
  | { kind: 'object'; fields: Record<string, JsonValue> };

/**
 * Options for flattening action lists
 */
export interface FlattenOptions {
  /** Only emit keys for these action types (default: all) */
  actionTypes?: readonly string[];
}

/**
 * Key prefix mapping entry for an action-list field
 */
export interface ActionFieldMapping {
  /** Source field in the raw row */
  field: string;
  /** Prefix of the flattened keys */
  prefix: string;
  /** Optional description */
  description?: string;
  /** Also flatten an object keyed by action type */
  acceptsMap?: boolean;
}

/**
 * Any listed entity carrying a status field
 */
export interface StatusBearing {
  status?: string;
}
