/**
 * @fileoverview Tests for Gemini error mapping
 * @module features/model/__tests__/error-handling.test
 */

import { describe, it, expect } from 'vitest';
import {
  codeForFailure,
  failureFromHttp,
  mapApiFailure,
  mapGeminiError,
  type ApiFailure,
} from '../error-handling.js';
import { AdapterError, type AdapterErrorCode } from '../adapters/types.js';

describe('codeForFailure', () => {
  const cases: Array<[ApiFailure, AdapterErrorCode]> = [
    [{ httpStatus: 400, status: 'INVALID_ARGUMENT', reason: 'API_KEY_INVALID', message: '' }, 'AUTH_FAILED'],
    [{ httpStatus: 403, status: 'PERMISSION_DENIED', message: '' }, 'AUTH_FAILED'],
    [{ httpStatus: 429, status: 'RESOURCE_EXHAUSTED', message: '' }, 'RATE_LIMITED'],
    [{ httpStatus: 404, status: 'NOT_FOUND', message: '' }, 'INVALID_MODEL'],
    [{ httpStatus: 400, status: 'INVALID_ARGUMENT', message: '' }, 'INVALID_REQUEST'],
    [{ httpStatus: 401, message: '' }, 'AUTH_FAILED'],
    [{ httpStatus: 504, message: '' }, 'TIMEOUT'],
    [{ httpStatus: 418, message: '' }, 'INVALID_REQUEST'],
    [{ httpStatus: 502, message: '' }, 'API_ERROR'],
    [{ message: '' }, 'API_ERROR'],
  ];

  it.each(cases)('maps %j to %s', (failure, code) => {
    expect(codeForFailure(failure)).toBe(code);
  });
});

describe('failureFromHttp', () => {
  it('reads the JSON error body', () => {
    const body = JSON.stringify({
      error: {
        code: 400,
        message: 'API key not valid. Please pass a valid API key.',
        status: 'INVALID_ARGUMENT',
        details: [{ '@type': 'type.googleapis.com/google.rpc.ErrorInfo', reason: 'API_KEY_INVALID' }],
      },
    });

    expect(failureFromHttp(400, 'Bad Request', body)).toEqual({
      httpStatus: 400,
      status: 'INVALID_ARGUMENT',
      reason: 'API_KEY_INVALID',
      message: 'API key not valid. Please pass a valid API key.',
    });
  });

  it('falls back to the raw text for non-JSON bodies', () => {
    expect(failureFromHttp(502, 'Bad Gateway', '<html>upstream error</html>\n')).toEqual({
      httpStatus: 502,
      message: 'HTTP 502 Bad Gateway: <html>upstream error</html>',
    });
  });

  it('handles an empty body', () => {
    expect(failureFromHttp(503, 'Service Unavailable', '')).toEqual({
      httpStatus: 503,
      message: 'HTTP 503 Service Unavailable',
    });
  });
});

describe('mapApiFailure', () => {
  it('adds a hint for authentication failures', () => {
    const error = mapApiFailure({
      httpStatus: 400,
      status: 'INVALID_ARGUMENT',
      reason: 'API_KEY_INVALID',
      message: 'API key not valid. Please pass a valid API key.',
    });

    expect(error.code).toBe('AUTH_FAILED');
    expect(error.retryable).toBe(false);
    expect(error.httpStatus).toBe(400);
    expect(error.message).toBe(
      '[gemini] API key not valid. Please pass a valid API key.\n' +
        'Check that the API key is correct and enabled for the Generative Language API.'
    );
  });

  it('marks server errors retryable', () => {
    const error = mapApiFailure({ httpStatus: 503, status: 'UNAVAILABLE', message: 'The model is overloaded.' });

    expect(error.code).toBe('API_ERROR');
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('[gemini] The model is overloaded.');
  });

  it('redacts the key from the message', () => {
    const error = mapApiFailure({ httpStatus: 400, message: 'Bad key test-secret' }, ['test-secret']);

    expect(error.message).toBe('[gemini] Bad key ***');
  });
});

describe('mapGeminiError', () => {
  it('passes adapter errors through', () => {
    const original = new AdapterError('PARSING_ERROR', 'gemini', 'bad');

    expect(mapGeminiError(original)).toBe(original);
  });

  it('maps SDK fetch errors by status and redacts the key', () => {
    const sdkError = Object.assign(
      new Error(
        '[GoogleGenerativeAI Error]: Error fetching from https://example.test/v1beta/models/gemini-2.0-flash:generateContent?key=test-secret: [429 Too Many Requests] Resource exhausted'
      ),
      { status: 429, statusText: 'Too Many Requests' }
    );

    const error = mapGeminiError(sdkError, ['test-secret']);

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.retryable).toBe(true);
    expect(error.httpStatus).toBe(429);
    expect(error.cause).toBe(sdkError);
    expect(error.message).toBe(
      '[gemini] Error fetching from https://example.test/v1beta/models/gemini-2.0-flash:generateContent?key=***: [429 Too Many Requests] Resource exhausted\n' +
        'Quota exhausted; wait a moment before trying again.'
    );
  });

  it('uses the error detail reason of SDK errors', () => {
    const sdkError = Object.assign(new Error('[GoogleGenerativeAI Error]: API key not valid'), {
      status: 400,
      errorDetails: [{ reason: 'API_KEY_INVALID' }],
    });

    expect(mapGeminiError(sdkError).code).toBe('AUTH_FAILED');
  });

  it('maps aborts to TIMEOUT', () => {
    const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });

    const error = mapGeminiError(abort);

    expect(error.code).toBe('TIMEOUT');
    expect(error.message).toBe('[gemini] Request timed out');
    expect(error.retryable).toBe(true);
  });

  it('maps fetch failures to NETWORK_ERROR', () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
    const error = mapGeminiError(new TypeError('fetch failed', { cause }));

    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.message).toBe('[gemini] Network connection failed: fetch failed');
    expect(error.retryable).toBe(true);
  });

  it('maps blocked responses to CONTENT_BLOCKED', () => {
    const blocked = Object.assign(new Error('[GoogleGenerativeAI Error]: Candidate was blocked due to SAFETY'), {
      name: 'GoogleGenerativeAIResponseError',
    });

    const error = mapGeminiError(blocked);

    expect(error.code).toBe('CONTENT_BLOCKED');
    expect(error.message).toBe('[gemini] Candidate was blocked due to SAFETY');
  });

  it('maps anything else to API_ERROR', () => {
    const error = mapGeminiError('boom');

    expect(error.code).toBe('API_ERROR');
    expect(error.message).toBe('[gemini] boom');
    expect(error.retryable).toBe(false);
  });
});
