/**
 * @fileoverview Model-related type definitions
 * @module shared/types/models
 */

import { z } from 'zod';

// =============================================================================
// TRANSPORT & OUTPUT
// =============================================================================

/**
 * How requests reach the Gemini API: through the official SDK or as plain
 * HTTP calls with the key in the query string.
 */
export const TransportSchema = z.enum(['sdk', 'rest']);
export type Transport = z.infer<typeof TransportSchema>;

/**
 * Output rendering formats.
 */
export const OutputFormatSchema = z.enum(['text', 'markdown', 'json']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

// =============================================================================
// MODEL CATALOG TYPES
// =============================================================================

/**
 * Entry of the fixed model menu.
 */
export interface ModelInfo {
  /** Identifier sent to the API, without the `models/` prefix */
  id: string;
  displayName: string;
  description: string;
  /** Input token limit */
  contextLimit: number;
}

// =============================================================================
// GENERATION TYPES
// =============================================================================

/**
 * Generation options applied to a single request.
 */
export const GenerateOptionsSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  systemInstruction: z.string().min(1).optional(),
});
export type GenerateOptions = z.infer<typeof GenerateOptionsSchema>;

/**
 * Token usage reported by the service.
 */
export interface TokenUsage {
  promptTokens: number;
  candidatesTokens: number;
  totalTokens: number;
}

/**
 * Result of a non-streaming generation.
 */
export interface GenerationResult {
  text: string;
  model: string;
  finishReason?: string;
  usage?: TokenUsage;
}

/**
 * Chunk yielded while streaming.
 */
export type StreamChunk =
  | { type: 'text'; text: string }
  | { type: 'done'; finishReason?: string; usage?: TokenUsage };
