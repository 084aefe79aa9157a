/**
 * Ads Insights Fetcher
 *
 * Main exports: reporting client, fetch engine, post-processing stages.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Errors
export * from './errors.js';

// Configuration
export * from './config.js';

// Fetch engine
export * from '../providers/index.js';

// Post-processing stages
export {
  classifyField,
  coerceNumericFields,
  filterByStatus,
  flattenActions,
  normalizeAccountId,
  ACCOUNT_ID_PREFIX,
} from '../normalizers/index.js';
export type { ActionListEntry, FieldValue, FlattenOptions } from '../normalizers/index.js';

// Client
export * from './client.js';
