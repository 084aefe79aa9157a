/**
 * Data model types and runtime validation schemas
 */

export * from './types.js';
export * from './validation.js';
