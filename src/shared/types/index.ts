/**
 * @fileoverview Shared type definitions
 * @module shared/types
 */

export {
  TransportSchema,
  OutputFormatSchema,
  GenerateOptionsSchema,
  type Transport,
  type OutputFormat,
  type ModelInfo,
  type GenerateOptions,
  type TokenUsage,
  type GenerationResult,
  type StreamChunk,
} from './models.js';
