/**
 * @fileoverview Gemini client speaking the REST API directly
 * @module features/model/adapters/rest
 *
 * The same call the SDK makes, spelled out: an HTTPS POST to
 * `{baseUrl}/{apiVersion}/models/{model}:generateContent?key={apiKey}` with a
 * `contents` array of `{ parts: [{ text }] }`.
 */

import { z } from 'zod';
import type {
  GenerateOptions,
  GenerationResult,
  StreamChunk,
  TokenUsage,
} from '../../../shared/types/models.js';
import { logger } from '../../../shared/utils/logger.js';
import { redactSecrets } from '../../credentials/masking.js';
import { normalizeModelId } from '../catalog.js';
import { failureFromHttp, mapApiFailure, mapGeminiError } from '../error-handling.js';
import {
  AdapterError,
  registerClient,
  type ClientSettings,
  type IGenerationClient,
} from './types.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';
export const DEFAULT_API_VERSION = 'v1beta';
const DEFAULT_TIMEOUT_MS = 60000;
const MODELS_PAGE_SIZE = 50;
const MAX_MODEL_PAGES = 20;

const log = logger.child('rest');

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const PartSchema = z.object({ text: z.string().optional() }).passthrough();

const CandidateSchema = z
  .object({
    content: z
      .object({
        parts: z.array(PartSchema).default([]),
        role: z.string().optional(),
      })
      .optional(),
    finishReason: z.string().optional(),
  })
  .passthrough();

const UsageMetadataSchema = z
  .object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
    totalTokenCount: z.number().optional(),
  })
  .passthrough();

export const GenerateContentResponseSchema = z
  .object({
    candidates: z.array(CandidateSchema).default([]),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
    usageMetadata: UsageMetadataSchema.optional(),
  })
  .passthrough();
export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

const RemoteModelSchema = z
  .object({
    name: z.string(),
    displayName: z.string().optional(),
    description: z.string().optional(),
    inputTokenLimit: z.number().optional(),
    outputTokenLimit: z.number().optional(),
    supportedGenerationMethods: z.array(z.string()).default([]),
  })
  .passthrough();

const ListModelsResponseSchema = z.object({
  models: z.array(RemoteModelSchema).default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Model as reported by the service's `models` endpoint.
 */
export interface RemoteModel {
  id: string;
  displayName: string;
  inputTokenLimit?: number;
  supportsGenerateContent: boolean;
}

/** `fetch` signature accepted for injection */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// =============================================================================
// REQUEST & RESPONSE HELPERS
// =============================================================================

/**
 * Builds the JSON body of a generateContent call.
 */
export function buildRequestBody(prompt: string, options: GenerateOptions = {}): Record<string, unknown> {
  const body: Record<string, unknown> = {
    contents: [{ parts: [{ text: prompt }] }],
  };

  const generationConfig: Record<string, number> = {};
  if (options.temperature !== undefined) {
    generationConfig['temperature'] = options.temperature;
  }
  if (options.maxOutputTokens !== undefined) {
    generationConfig['maxOutputTokens'] = options.maxOutputTokens;
  }
  if (Object.keys(generationConfig).length > 0) {
    body['generationConfig'] = generationConfig;
  }
  if (options.systemInstruction !== undefined) {
    body['systemInstruction'] = { parts: [{ text: options.systemInstruction }] };
  }
  return body;
}

function toTokenUsage(metadata: GenerateContentResponse['usageMetadata']): TokenUsage | undefined {
  if (metadata === undefined) {
    return undefined;
  }
  return {
    promptTokens: metadata.promptTokenCount ?? 0,
    candidatesTokens: metadata.candidatesTokenCount ?? 0,
    totalTokens: metadata.totalTokenCount ?? 0,
  };
}

/**
 * Extracts the text of the first candidate.
 *
 * @param requireText - Fail when a complete response carries no text
 * @throws {AdapterError} CONTENT_BLOCKED when the prompt or the answer was blocked
 */
export function extractCandidate(
  response: GenerateContentResponse,
  requireText: boolean
): { text: string; finishReason?: string } {
  const blockReason = response.promptFeedback?.blockReason;
  const candidate = response.candidates[0];

  if (candidate === undefined) {
    if (blockReason !== undefined) {
      throw new AdapterError('CONTENT_BLOCKED', 'gemini', `Prompt was blocked (${blockReason})`);
    }
    if (requireText) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Response contained no candidates');
    }
    return { text: '' };
  }

  const text = (candidate.content?.parts ?? []).map((part) => part.text ?? '').join('');
  const finishReason = candidate.finishReason;

  if (text === '' && (finishReason === 'SAFETY' || finishReason === 'BLOCKLIST' || finishReason === 'PROHIBITED_CONTENT')) {
    throw new AdapterError('CONTENT_BLOCKED', 'gemini', `Response was blocked (${finishReason})`);
  }

  return { text, ...(finishReason !== undefined && { finishReason }) };
}

/**
 * Yields the JSON payload of each `data:` line of a server-sent event stream.
 */
export async function* readSseData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        if (line.startsWith('data:')) {
          yield line.slice('data:'.length).trim();
        }
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    const last = buffer.replace(/\r$/, '');
    if (last.startsWith('data:')) {
      yield last.slice('data:'.length).trim();
    }
  } finally {
    reader.releaseLock();
  }
}

// =============================================================================
// REST CLIENT
// =============================================================================

/**
 * Gemini client that issues plain HTTPS requests with the key in the query string.
 *
 * @example
 * ```typescript
 * const client = new GeminiRestClient({ transport: 'rest', apiKey, model: 'gemini-2.0-flash' });
 * const { text } = await client.generate('Write a haiku about keys');
 * ```
 */
export class GeminiRestClient implements IGenerationClient {
  readonly transport = 'rest';
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(settings: ClientSettings, options: { fetchImpl?: FetchLike } = {}) {
    if (settings.apiKey.trim() === '') {
      throw new AdapterError('INVALID_CONFIG', 'gemini', 'An API key is required to create a client');
    }
    this.apiKey = settings.apiKey;
    this.model = normalizeModelId(settings.model);
    this.baseUrl = (settings.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.apiVersion = settings.apiVersion ?? DEFAULT_API_VERSION;
    this.timeoutMs = settings.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * URL of a model method, with the key as a query parameter.
   */
  buildUrl(method: 'generateContent' | 'streamGenerateContent'): string {
    const url = new URL(`${this.baseUrl}/${this.apiVersion}/models/${this.model}:${method}`);
    if (method === 'streamGenerateContent') {
      url.searchParams.set('alt', 'sse');
    }
    url.searchParams.set('key', this.apiKey);
    return url.toString();
  }

  private async post(url: string, prompt: string, options: GenerateOptions): Promise<Response> {
    log.debug(`POST ${redactSecrets(url, [this.apiKey])}`);
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildRequestBody(prompt, options)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw mapGeminiError(error, [this.apiKey]);
    }

    if (!response.ok) {
      const bodyText = await readBody(response, this.apiKey);
      throw mapApiFailure(failureFromHttp(response.status, response.statusText, bodyText), [this.apiKey]);
    }
    return response;
  }

  private parseResponse(payload: unknown): GenerateContentResponse {
    const parsed = GenerateContentResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Unexpected response shape from generateContent', {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Response was not valid JSON', { cause: error });
    }
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const response = await this.post(this.buildUrl('generateContent'), prompt, options);

    const bodyText = await readBody(response, this.apiKey);
    const data = this.parseResponse(this.parseJson(bodyText));
    const { text, finishReason } = extractCandidate(data, true);
    const usage = toTokenUsage(data.usageMetadata);

    return {
      text,
      model: this.model,
      ...(finishReason !== undefined && { finishReason }),
      ...(usage !== undefined && { usage }),
    };
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncGenerator<StreamChunk> {
    const response = await this.post(this.buildUrl('streamGenerateContent'), prompt, options);
    if (response.body === null) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Streaming response had no body');
    }

    let finishReason: string | undefined;
    let usage: TokenUsage | undefined;

    try {
      for await (const payload of readSseData(response.body)) {
        if (payload === '') {
          continue;
        }
        const data = this.parseResponse(this.parseJson(payload));
        const extracted = extractCandidate(data, false);
        finishReason = extracted.finishReason ?? finishReason;
        usage = toTokenUsage(data.usageMetadata) ?? usage;
        if (extracted.text !== '') {
          yield { type: 'text', text: extracted.text };
        }
      }
    } catch (error) {
      throw mapGeminiError(error, [this.apiKey]);
    }

    yield {
      type: 'done',
      ...(finishReason !== undefined && { finishReason }),
      ...(usage !== undefined && { usage }),
    };
  }
}

/**
 * Reads a response body; a timeout or reset while reading is mapped like a failed request.
 */
async function readBody(response: Response, apiKey: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw mapGeminiError(error, [apiKey]);
  }
}

// =============================================================================
// MODEL LISTING
// =============================================================================

/**
 * Lists the models available to an API key, following pagination.
 */
export async function listRemoteModels(options: {
  apiKey: string;
  baseUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}): Promise<RemoteModel[]> {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
  const models: RemoteModel[] = [];
  let pageToken: string | undefined;

  for (let page = 0; page < MAX_MODEL_PAGES; page++) {
    const url = new URL(`${baseUrl}/${apiVersion}/models`);
    url.searchParams.set('pageSize', String(MODELS_PAGE_SIZE));
    if (pageToken !== undefined) {
      url.searchParams.set('pageToken', pageToken);
    }
    url.searchParams.set('key', options.apiKey);

    let response: Response;
    try {
      response = await fetchImpl(url.toString(), {
        method: 'GET',
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      throw mapGeminiError(error, [options.apiKey]);
    }

    const bodyText = await readBody(response, options.apiKey);
    if (!response.ok) {
      throw mapApiFailure(failureFromHttp(response.status, response.statusText, bodyText), [options.apiKey]);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(bodyText);
    } catch (error) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Model list was not valid JSON', { cause: error });
    }
    const parsed = ListModelsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AdapterError('PARSING_ERROR', 'gemini', 'Unexpected response shape from models.list', {
        cause: parsed.error,
      });
    }

    for (const model of parsed.data.models) {
      models.push({
        id: model.name.replace(/^models\//, ''),
        displayName: model.displayName ?? model.name,
        ...(model.inputTokenLimit !== undefined && { inputTokenLimit: model.inputTokenLimit }),
        supportsGenerateContent: model.supportedGenerationMethods.includes('generateContent'),
      });
    }

    pageToken = parsed.data.nextPageToken;
    if (pageToken === undefined || pageToken === '') {
      break;
    }
  }

  return models;
}

// =============================================================================
// FACTORY REGISTRATION
// =============================================================================

function createRestClient(settings: ClientSettings): IGenerationClient {
  return new GeminiRestClient(settings);
}

registerClient('rest', createRestClient);
