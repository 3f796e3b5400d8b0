/**
 * @fileoverview Error mapping for Gemini API failures
 * @module features/model/error-handling
 *
 * Normalizes SDK errors, HTTP error bodies, aborts and network failures into
 * {@link AdapterError}. Messages are redacted so the API key never reaches a
 * log line, even when the failing URL carried it as `?key=`.
 */

import { z } from 'zod';
import { redactSecrets } from '../credentials/masking.js';
import { AdapterError, type AdapterErrorCode } from './adapters/types.js';

const PROVIDER = 'gemini';

// =============================================================================
// ERROR SHAPES
// =============================================================================

/**
 * A failed API call reduced to the fields the mapping needs.
 */
export interface ApiFailure {
  httpStatus?: number;
  /** Canonical status such as `INVALID_ARGUMENT` */
  status?: string;
  /** Error detail reason such as `API_KEY_INVALID` */
  reason?: string;
  message: string;
}

const ErrorDetailSchema = z.object({ reason: z.string().optional() }).passthrough();

/** JSON body the service returns on failure */
export const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().int().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    details: z.array(ErrorDetailSchema).optional(),
  }),
});

/** Fields of the SDK's fetch error */
const SdkFetchErrorSchema = z.object({
  status: z.number().int(),
  statusText: z.string().optional(),
  errorDetails: z.array(ErrorDetailSchema).optional(),
});

// =============================================================================
// CODE MAPPING
// =============================================================================

/** Canonical status -> adapter code */
const ERROR_CODE_MAP: Record<string, AdapterErrorCode> = {
  PERMISSION_DENIED: 'AUTH_FAILED',
  UNAUTHENTICATED: 'AUTH_FAILED',
  RESOURCE_EXHAUSTED: 'RATE_LIMITED',
  INVALID_ARGUMENT: 'INVALID_REQUEST',
  FAILED_PRECONDITION: 'INVALID_REQUEST',
  OUT_OF_RANGE: 'INVALID_REQUEST',
  NOT_FOUND: 'INVALID_MODEL',
  INTERNAL: 'API_ERROR',
  UNAVAILABLE: 'API_ERROR',
  DEADLINE_EXCEEDED: 'TIMEOUT',
};

/** The service reports a bad key as a 400 with one of these reasons */
const AUTH_REASONS = new Set(['API_KEY_INVALID', 'API_KEY_EXPIRED', 'API_KEY_SERVICE_BLOCKED']);

const NETWORK_PATTERN = /fetch failed|ECONNREFUSED|ENOTFOUND|ECONNRESET|EAI_AGAIN|socket hang up/i;
const TIMEOUT_PATTERN = /aborted|timed out|timeout/i;
const BLOCKED_PATTERN = /blocked/i;
const SDK_PREFIX = /^\[GoogleGenerativeAI Error\]:\s*/;

function codeFromHttpStatus(httpStatus: number): AdapterErrorCode {
  if (httpStatus === 401 || httpStatus === 403) return 'AUTH_FAILED';
  if (httpStatus === 404) return 'INVALID_MODEL';
  if (httpStatus === 408 || httpStatus === 504) return 'TIMEOUT';
  if (httpStatus === 429) return 'RATE_LIMITED';
  if (httpStatus >= 400 && httpStatus < 500) return 'INVALID_REQUEST';
  return 'API_ERROR';
}

/**
 * Chooses the adapter code for a failed call. A key-related reason wins over
 * the generic status since the service reports bad keys as INVALID_ARGUMENT.
 */
export function codeForFailure(failure: ApiFailure): AdapterErrorCode {
  if (failure.reason !== undefined && AUTH_REASONS.has(failure.reason)) {
    return 'AUTH_FAILED';
  }
  if (failure.status !== undefined) {
    const mapped = ERROR_CODE_MAP[failure.status];
    if (mapped !== undefined) {
      return mapped;
    }
  }
  if (failure.httpStatus !== undefined) {
    return codeFromHttpStatus(failure.httpStatus);
  }
  return 'API_ERROR';
}

function isRetryable(code: AdapterErrorCode, httpStatus: number | undefined): boolean {
  switch (code) {
    case 'RATE_LIMITED':
    case 'TIMEOUT':
    case 'NETWORK_ERROR':
      return true;
    case 'API_ERROR':
      return httpStatus === 500 || httpStatus === 503;
    default:
      return false;
  }
}

function hintFor(code: AdapterErrorCode): string | undefined {
  switch (code) {
    case 'AUTH_FAILED':
      return 'Check that the API key is correct and enabled for the Generative Language API.';
    case 'INVALID_MODEL':
      return 'Run "gemini-quickstart models --remote" to see the models your key can use.';
    case 'RATE_LIMITED':
      return 'Quota exhausted; wait a moment before trying again.';
    default:
      return undefined;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Builds an {@link AdapterError} from a reduced API failure.
 */
export function mapApiFailure(failure: ApiFailure, secrets: readonly string[] = [], cause?: unknown): AdapterError {
  const code = codeForFailure(failure);
  const hint = hintFor(code);
  const base = redactSecrets(failure.message.replace(SDK_PREFIX, ''), secrets);
  const message = hint !== undefined ? `${base}\n${hint}` : base;

  return new AdapterError(code, PROVIDER, message, {
    retryable: isRetryable(code, failure.httpStatus),
    ...(failure.httpStatus !== undefined && { httpStatus: failure.httpStatus }),
    ...(cause !== undefined && { cause }),
  });
}

/**
 * Reduces a non-2xx HTTP response body to an {@link ApiFailure}.
 */
export function failureFromHttp(httpStatus: number, statusText: string, bodyText: string): ApiFailure {
  let body: unknown;
  try {
    body = JSON.parse(bodyText);
  } catch {
    // Not JSON (proxies, HTML error pages): fall back to the raw text below
    body = undefined;
  }

  const parsed = ApiErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    const text = bodyText.trim();
    return {
      httpStatus,
      message: `HTTP ${httpStatus} ${statusText}${text !== '' ? `: ${text.slice(0, 500)}` : ''}`.trim(),
    };
  }

  const { error } = parsed.data;
  const reason = error.details?.find((detail) => detail.reason !== undefined)?.reason;
  return {
    httpStatus: error.code ?? httpStatus,
    ...(error.status !== undefined && { status: error.status }),
    ...(reason !== undefined && { reason }),
    message: error.message ?? `HTTP ${httpStatus} ${statusText}`.trim(),
  };
}

/**
 * Maps any error thrown while talking to the service onto {@link AdapterError}.
 *
 * @param error - Error thrown by the SDK, `fetch` or response handling
 * @param secrets - Values to scrub from the message (the API key)
 */
export function mapGeminiError(error: unknown, secrets: readonly string[] = []): AdapterError {
  if (error instanceof AdapterError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';

  const sdkError = SdkFetchErrorSchema.safeParse(error);
  if (sdkError.success) {
    const reason = sdkError.data.errorDetails?.find((detail) => detail.reason !== undefined)?.reason;
    return mapApiFailure(
      { httpStatus: sdkError.data.status, ...(reason !== undefined && { reason }), message },
      secrets,
      error
    );
  }

  if (name === 'AbortError' || name === 'TimeoutError' || name === 'GoogleGenerativeAIAbortError') {
    return new AdapterError('TIMEOUT', PROVIDER, 'Request timed out', { retryable: true, cause: error });
  }

  const causeCode =
    error instanceof Error && error.cause instanceof Error && 'code' in error.cause
      ? String(error.cause.code)
      : '';
  if (NETWORK_PATTERN.test(message) || NETWORK_PATTERN.test(causeCode)) {
    return new AdapterError(
      'NETWORK_ERROR',
      PROVIDER,
      `Network connection failed: ${redactSecrets(message.replace(SDK_PREFIX, ''), secrets)}`,
      { retryable: true, cause: error }
    );
  }

  if (TIMEOUT_PATTERN.test(message)) {
    return new AdapterError('TIMEOUT', PROVIDER, 'Request timed out', { retryable: true, cause: error });
  }

  if (name === 'GoogleGenerativeAIResponseError' || BLOCKED_PATTERN.test(message)) {
    return new AdapterError(
      'CONTENT_BLOCKED',
      PROVIDER,
      redactSecrets(message.replace(SDK_PREFIX, ''), secrets),
      { cause: error }
    );
  }

  return new AdapterError(
    'API_ERROR',
    PROVIDER,
    redactSecrets(message.replace(SDK_PREFIX, ''), secrets) || 'Unknown API error',
    { cause: error }
  );
}
