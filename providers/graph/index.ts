/**
 * Graph reporting API provider
 *
 * Cursor-paginated listing and insights endpoints over the Graph REST API.
 */

export * from './types.js';
export * from './fetch.js';
export * from './pagination.js';
export * from './entities.js';
export * from './insights.js';
