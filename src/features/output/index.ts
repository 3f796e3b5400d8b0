/**
 * @fileoverview Output rendering public API
 * @module features/output
 */

export { renderResult, toMarkdownQuote } from './render.js';
