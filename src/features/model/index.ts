/**
 * @fileoverview Model feature public API
 * @module features/model
 */

export * from './adapters/index.js';
export * from './catalog.js';
export * from './error-handling.js';
