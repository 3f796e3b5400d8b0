/**
 * @fileoverview Gemini client backed by the official SDK
 * @module features/model/adapters/google
 *
 * Wraps `@google/generative-ai`: the key is passed to `GoogleGenerativeAI`,
 * a `GenerativeModel` is created per request with the generation settings,
 * and the prompt is sent as a single user turn.
 */

import {
  GoogleGenerativeAI,
  type Content,
  type GenerateContentRequest,
  type GenerationConfig,
  type GenerativeModel,
  type RequestOptions,
  type UsageMetadata,
} from '@google/generative-ai';

import type {
  GenerateOptions,
  GenerationResult,
  StreamChunk,
  TokenUsage,
} from '../../../shared/types/models.js';
import { logger } from '../../../shared/utils/logger.js';
import { mapGeminiError } from '../error-handling.js';
import { normalizeModelId } from '../catalog.js';
import {
  AdapterError,
  registerClient,
  type ClientSettings,
  type IGenerationClient,
} from './types.js';

const log = logger.child('sdk');

// =============================================================================
// CONVERSION
// =============================================================================

/**
 * Converts SDK usage metadata into the shared shape.
 */
export function toTokenUsage(metadata: Partial<UsageMetadata> | undefined): TokenUsage | undefined {
  if (metadata === undefined) {
    return undefined;
  }
  return {
    promptTokens: metadata.promptTokenCount ?? 0,
    candidatesTokens: metadata.candidatesTokenCount ?? 0,
    totalTokens: metadata.totalTokenCount ?? 0,
  };
}

function buildContents(prompt: string): Content[] {
  return [{ role: 'user', parts: [{ text: prompt }] }];
}

function buildGenerationConfig(options: GenerateOptions): GenerationConfig {
  const config: GenerationConfig = {};
  if (options.temperature !== undefined) {
    config.temperature = options.temperature;
  }
  if (options.maxOutputTokens !== undefined) {
    config.maxOutputTokens = options.maxOutputTokens;
  }
  return config;
}

// =============================================================================
// SDK CLIENT
// =============================================================================

/**
 * Gemini client using `@google/generative-ai`.
 *
 * @example
 * ```typescript
 * const client = new GeminiSdkClient({ transport: 'sdk', apiKey, model: 'gemini-2.0-flash' });
 * const result = await client.generate('Please give me python code to sort a list.');
 * console.log(result.text);
 * ```
 */
export class GeminiSdkClient implements IGenerationClient {
  readonly transport = 'sdk';
  readonly model: string;

  private readonly client: GoogleGenerativeAI;
  private readonly apiKey: string;
  private readonly requestOptions: RequestOptions;

  constructor(settings: ClientSettings) {
    if (settings.apiKey.trim() === '') {
      throw new AdapterError('INVALID_CONFIG', 'gemini', 'An API key is required to create a client');
    }
    this.apiKey = settings.apiKey;
    this.model = normalizeModelId(settings.model);
    this.client = new GoogleGenerativeAI(settings.apiKey);
    this.requestOptions = {
      ...(settings.timeoutMs !== undefined && { timeout: settings.timeoutMs }),
      ...(settings.apiVersion !== undefined && { apiVersion: settings.apiVersion }),
      ...(settings.baseUrl !== undefined && { baseUrl: settings.baseUrl }),
    };
  }

  private getModel(options: GenerateOptions): GenerativeModel {
    return this.client.getGenerativeModel(
      {
        model: this.model,
        generationConfig: buildGenerationConfig(options),
        ...(options.systemInstruction !== undefined && { systemInstruction: options.systemInstruction }),
      },
      this.requestOptions
    );
  }

  private buildRequest(prompt: string): GenerateContentRequest {
    return { contents: buildContents(prompt) };
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    log.debug(`generateContent model=${this.model}`);
    try {
      const result = await this.getModel(options).generateContent(this.buildRequest(prompt));
      const response = result.response;
      // text() throws when the candidate was blocked
      const text = response.text();
      const finishReason = response.candidates?.[0]?.finishReason;
      const usage = toTokenUsage(response.usageMetadata);

      return {
        text,
        model: this.model,
        ...(finishReason !== undefined && { finishReason }),
        ...(usage !== undefined && { usage }),
      };
    } catch (error) {
      throw mapGeminiError(error, [this.apiKey]);
    }
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncGenerator<StreamChunk> {
    log.debug(`generateContentStream model=${this.model}`);
    try {
      const { stream, response } = await this.getModel(options).generateContentStream(this.buildRequest(prompt));
      // response rejects together with stream when the body fails; the stream error is the one reported
      void response.catch((error: unknown) => {
        log.debug(`Aggregated stream response failed: ${error instanceof Error ? error.message : String(error)}`);
      });

      for await (const chunk of stream) {
        const text = chunk.text();
        if (text !== '') {
          yield { type: 'text', text };
        }
      }

      const aggregated = await response;
      const finishReason = aggregated.candidates?.[0]?.finishReason;
      const usage = toTokenUsage(aggregated.usageMetadata);
      yield {
        type: 'done',
        ...(finishReason !== undefined && { finishReason }),
        ...(usage !== undefined && { usage }),
      };
    } catch (error) {
      throw mapGeminiError(error, [this.apiKey]);
    }
  }
}

// =============================================================================
// FACTORY REGISTRATION
// =============================================================================

function createSdkClient(settings: ClientSettings): IGenerationClient {
  return new GeminiSdkClient(settings);
}

registerClient('sdk', createSdkClient);
