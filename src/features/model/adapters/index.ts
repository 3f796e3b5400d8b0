/**
 * @fileoverview Generation clients public API
 * @module features/model/adapters
 *
 * Importing this module registers both transports.
 */

export * from './types.js';
export * from './google.js';
export * from './rest.js';
