/**
 * Pagination
 *
 * @module interactions/pagination
 */

export * from './paginated-list.js';
export * from './sectioned-list.js';
export * from './browse.js';
