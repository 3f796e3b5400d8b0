/**
 * @fileoverview Generation client interface definitions
 * @module features/model/adapters/types
 *
 * Both transports (the official SDK and plain REST) implement the same
 * interface so the commands never care how a request reaches the service.
 */

import type {
  GenerateOptions,
  GenerationResult,
  StreamChunk,
  Transport,
} from '../../../shared/types/models.js';

// =============================================================================
// CLIENT INTERFACE
// =============================================================================

/**
 * A Gemini client bound to one API key and one model.
 *
 * @example
 * ```typescript
 * const client = createGenerationClient({ transport: 'sdk', apiKey, model: 'gemini-2.0-flash' });
 * const { text } = await client.generate('Explain API keys in one sentence.');
 *
 * for await (const chunk of client.generateStream('Tell me a story')) {
 *   if (chunk.type === 'text') {
 *     process.stdout.write(chunk.text);
 *   }
 * }
 * ```
 */
export interface IGenerationClient {
  readonly transport: Transport;

  /** Model identifier, without the `models/` prefix */
  readonly model: string;

  /**
   * Sends a single-turn prompt and waits for the whole response.
   *
   * @throws {AdapterError} If the request fails or the response is blocked
   */
  generate(prompt: string, options?: GenerateOptions): Promise<GenerationResult>;

  /**
   * Sends a single-turn prompt and yields text as it arrives, ending with a
   * `done` chunk.
   *
   * @throws {AdapterError} If the request fails or the response is blocked
   */
  generateStream(prompt: string, options?: GenerateOptions): AsyncGenerator<StreamChunk>;
}

/**
 * Settings shared by every transport.
 */
export interface ClientSettings {
  transport: Transport;
  apiKey: string;
  model: string;
  baseUrl?: string;
  apiVersion?: string;
  timeoutMs?: number;
}

// =============================================================================
// ADAPTER ERRORS
// =============================================================================

/**
 * Error codes for generation failures.
 */
export type AdapterErrorCode =
  | 'INVALID_CONFIG'
  | 'AUTH_FAILED'
  | 'RATE_LIMITED'
  | 'INVALID_REQUEST'
  | 'INVALID_MODEL'
  | 'CONTENT_BLOCKED'
  | 'API_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'PARSING_ERROR';

/**
 * Custom error class for generation failures.
 *
 * Provides structured error information for better error handling and
 * user-facing error messages.
 */
export class AdapterError extends Error {
  readonly code: AdapterErrorCode;
  readonly provider: string;
  readonly retryable: boolean;
  /** HTTP status of the failed call, when there was one */
  readonly httpStatus: number | undefined;

  constructor(
    code: AdapterErrorCode,
    provider: string,
    message: string,
    options?: {
      retryable?: boolean;
      httpStatus?: number;
      cause?: unknown;
    }
  ) {
    super(`[${provider}] ${message}`, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AdapterError';
    this.code = code;
    this.provider = provider;
    this.retryable = options?.retryable ?? false;
    this.httpStatus = options?.httpStatus;
  }
}

// =============================================================================
// CLIENT FACTORY
// =============================================================================

/**
 * Factory function type for creating generation clients.
 */
export type ClientFactory = (settings: ClientSettings) => IGenerationClient;

/**
 * Registry of client factories by transport.
 */
export const clientFactories = new Map<Transport, ClientFactory>();

/**
 * Register a client factory for a transport.
 */
export function registerClient(transport: Transport, factory: ClientFactory): void {
  clientFactories.set(transport, factory);
}

/**
 * Create a client for the given settings.
 *
 * @throws {AdapterError} If the transport has no registered factory
 */
export function createGenerationClient(settings: ClientSettings): IGenerationClient {
  const factory = clientFactories.get(settings.transport);
  if (factory === undefined) {
    throw new AdapterError(
      'INVALID_CONFIG',
      'gemini',
      `Unsupported transport: ${settings.transport}. Available: ${[...clientFactories.keys()].join(', ')}`
    );
  }
  return factory(settings);
}
