/**
 * @fileoverview Fixed menu of Gemini models offered by the CLI
 * @module features/model/catalog
 */

import type { ModelInfo } from '../../shared/types/models.js';
import { AdapterError } from './adapters/types.js';

/** Model selected when nothing else is configured */
export const DEFAULT_MODEL = 'gemini-2.0-flash';

/**
 * Models offered by `gemini-quickstart models`. The service accepts other
 * ids as well; these are the ones the quickstart recommends.
 */
export const MODEL_CATALOG: readonly ModelInfo[] = [
  {
    id: 'gemini-2.0-flash',
    displayName: 'Gemini 2.0 Flash',
    description: 'Fast multimodal model for everyday tasks',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-2.0-flash-lite',
    displayName: 'Gemini 2.0 Flash-Lite',
    description: 'Lowest-latency 2.0 model',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-2.5-flash',
    displayName: 'Gemini 2.5 Flash',
    description: 'Thinking model with a good price-performance balance',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-2.5-pro',
    displayName: 'Gemini 2.5 Pro',
    description: 'Most capable thinking model for complex reasoning',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-1.5-flash',
    displayName: 'Gemini 1.5 Flash',
    description: 'Previous-generation fast model',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-1.5-flash-8b',
    displayName: 'Gemini 1.5 Flash-8B',
    description: 'Small previous-generation model for high-volume tasks',
    contextLimit: 1048576,
  },
  {
    id: 'gemini-1.5-pro',
    displayName: 'Gemini 1.5 Pro',
    description: 'Previous-generation model with a 2M token window',
    contextLimit: 2097152,
  },
];

const MODEL_ID_PATTERN = /^[a-z0-9][a-z0-9.-]*$/;

/**
 * Normalizes a model identifier.
 *
 * Accepts the resource form returned by the API (`models/gemini-2.0-flash`)
 * as well as the bare id.
 *
 * @throws {AdapterError} INVALID_CONFIG for ids the API could never accept
 */
export function normalizeModelId(id: string): string {
  const bare = id.trim().replace(/^models\//, '');
  if (!MODEL_ID_PATTERN.test(bare)) {
    throw new AdapterError(
      'INVALID_CONFIG',
      'gemini',
      `Invalid model id "${id}". Use lowercase letters, digits, dots and dashes, e.g. ${DEFAULT_MODEL}`
    );
  }
  return bare;
}

/**
 * Looks up a model in the catalog.
 */
export function findModel(id: string): ModelInfo | undefined {
  const bare = normalizeModelId(id);
  return MODEL_CATALOG.find((model) => model.id === bare);
}
