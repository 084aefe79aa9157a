/**
 * Post-processing stages applied to fetched records
 *
 * - Action flattening for insights rows
 * - Account ID canonicalization and status filtering for entities
 */

export type { ActionEntry, FlattenedRecord, InsightRecord } from '../schemas/index.js';

// Types
export * from './types.js';

// Key naming tables
export * from './mappings.js';

// Utility functions
export * from './utils.js';

// Stages
export * from './actions.js';
export * from './entities.js';
