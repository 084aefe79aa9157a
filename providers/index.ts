/**
 * Provider implementations for fetching report data
 *
 * Each provider module:
 * - Takes an explicit client config
 * - Follows every page of a collection
 * - Handles rate limiting and error classification
 */

export * from './graph/index.js';
