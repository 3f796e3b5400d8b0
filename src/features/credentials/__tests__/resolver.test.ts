/**
 * @fileoverview Unit tests for API key resolution
 * @module features/credentials/__tests__/resolver.test
 */

import { describe, it, expect } from 'vitest';
import { describeMissingKey, inspectCredentials, resolveApiKey } from '../resolver.js';
import { CredentialError, type ResolveOptions } from '../types.js';
import { InMemorySecretStore } from './fake-store.js';

function options(overrides: Partial<ResolveOptions> = {}): ResolveOptions {
  return {
    sources: ['secrets', 'env'],
    secretName: 'GOOGLE_API_KEY',
    envVars: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
    store: new InMemorySecretStore(),
    env: {},
    ...overrides,
  };
}

async function captureError(promise: Promise<unknown>): Promise<CredentialError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CredentialError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a CredentialError');
}

describe('resolveApiKey', () => {
  it('prefers the secrets manager over the environment', async () => {
    const result = await resolveApiKey(
      options({
        store: new InMemorySecretStore({ GOOGLE_API_KEY: 'test-secret-from-store' }),
        env: { GOOGLE_API_KEY: 'test-secret-from-env' },
      })
    );

    expect(result).toEqual({
      apiKey: 'test-secret-from-store',
      source: 'secrets',
      origin: 'GOOGLE_API_KEY',
      attempts: [{ source: 'secrets', origin: 'GOOGLE_API_KEY', outcome: 'found' }],
    });
  });

  it('falls back to the first non-empty environment variable', async () => {
    const result = await resolveApiKey(options({ env: { GOOGLE_API_KEY: '', GEMINI_API_KEY: ' test-secret ' } }));

    expect(result.apiKey).toBe('test-secret');
    expect(result.source).toBe('env');
    expect(result.origin).toBe('GEMINI_API_KEY');
    expect(result.attempts).toEqual([
      { source: 'secrets', origin: 'GOOGLE_API_KEY', outcome: 'missing' },
      { source: 'env', origin: 'GOOGLE_API_KEY', outcome: 'empty' },
      { source: 'env', origin: 'GEMINI_API_KEY', outcome: 'found' },
    ]);
  });

  it('follows the configured source order', async () => {
    const result = await resolveApiKey(
      options({
        sources: ['env', 'secrets'],
        store: new InMemorySecretStore({ GOOGLE_API_KEY: 'test-secret-from-store' }),
        env: { GOOGLE_API_KEY: 'test-secret-from-env' },
      })
    );

    expect(result.apiKey).toBe('test-secret-from-env');
    expect(result.source).toBe('env');
  });

  it('skips a revoked secret and uses the environment', async () => {
    const result = await resolveApiKey(
      options({
        store: new InMemorySecretStore({ GOOGLE_API_KEY: { value: 'test-secret', granted: false } }),
        env: { GEMINI_API_KEY: 'test-secret-from-env' },
      })
    );

    expect(result.origin).toBe('GEMINI_API_KEY');
    expect(result.attempts[0]).toEqual({ source: 'secrets', origin: 'GOOGLE_API_KEY', outcome: 'access_denied' });
  });

  it('fails with MISSING_KEY when nothing is set', async () => {
    const error = await captureError(resolveApiKey(options()));

    expect(error.code).toBe('MISSING_KEY');
    expect(error.attempts).toHaveLength(3);
    expect(error.message).toBe(
      [
        'No Gemini API key found.',
        'Store a key in one of these ways:',
        '  gemini-quickstart secrets set GOOGLE_API_KEY --stdin',
        '  export GOOGLE_API_KEY=<your key>   (or add it to a .env file)',
        'Create a key at https://aistudio.google.com/app/apikey; run "gemini-quickstart setup" for details.',
      ].join('\n')
    );
  });

  it('treats an inherited property name as an unset variable', async () => {
    const error = await captureError(resolveApiKey(options({ sources: ['env'], envVars: ['toString'] })));

    expect(error.code).toBe('MISSING_KEY');
    expect(error.attempts).toEqual([{ source: 'env', origin: 'toString', outcome: 'missing' }]);
  });

  it('fails with EMPTY_KEY when a variable is set but blank', async () => {
    const error = await captureError(resolveApiKey(options({ sources: ['env'], env: { GOOGLE_API_KEY: '  ' } })));

    expect(error.code).toBe('EMPTY_KEY');
    expect(error.message.split('\n')[1]).toBe('Environment variable GOOGLE_API_KEY is set but empty.');
  });

  it('fails with ACCESS_DENIED ahead of other outcomes', async () => {
    const error = await captureError(
      resolveApiKey(
        options({
          store: new InMemorySecretStore({ GOOGLE_API_KEY: { value: 'test-secret', granted: false } }),
          env: { GOOGLE_API_KEY: '' },
        })
      )
    );

    expect(error.code).toBe('ACCESS_DENIED');
    expect(error.message.split('\n').slice(0, 3)).toEqual([
      'Secret "GOOGLE_API_KEY" exists but access to it is revoked.',
      'Grant access with: gemini-quickstart secrets grant GOOGLE_API_KEY',
      'Environment variable GOOGLE_API_KEY is set but empty.',
    ]);
  });

  it('never includes the key in the error message', async () => {
    const error = await captureError(
      resolveApiKey(
        options({
          sources: ['secrets'],
          store: new InMemorySecretStore({ GOOGLE_API_KEY: { value: 'test-secret', granted: false } }),
        })
      )
    );

    expect(error.message.includes('test-secret')).toBe(false);
  });
});

describe('inspectCredentials', () => {
  it('returns the attempts without throwing', async () => {
    const result = await inspectCredentials(options({ sources: ['env'], envVars: ['GOOGLE_API_KEY'] }));

    expect(result).toEqual({ attempts: [{ source: 'env', origin: 'GOOGLE_API_KEY', outcome: 'missing' }] });
  });

  it('reports the resolved key and its origin', async () => {
    const result = await inspectCredentials(options({ env: { GOOGLE_API_KEY: 'test-secret' } }));

    expect(result.resolved).toEqual({ apiKey: 'test-secret', source: 'env', origin: 'GOOGLE_API_KEY' });
  });
});

describe('describeMissingKey', () => {
  it('names the first configured environment variable', () => {
    const message = describeMissingKey({ secretName: 'MY_KEY', envVars: ['MY_ENV_KEY'] }, []);

    expect(message.split('\n')).toContain('  export MY_ENV_KEY=<your key>   (or add it to a .env file)');
    expect(message.split('\n')).toContain('  gemini-quickstart secrets set MY_KEY --stdin');
  });
});
