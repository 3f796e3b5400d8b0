/**
 * @fileoverview Unit tests for the models command handler
 * @module features/commands/__tests__/models.test
 */

import { describe, it, expect, vi } from 'vitest';
import { runModels } from '../handlers/models.js';
import { CredentialError } from '../../credentials/types.js';
import { createTestContext } from './context.js';

describe('runModels', () => {
  it('lists the catalog and marks the default model', async () => {
    const context = createTestContext();

    await runModels({}, context);

    const lines = context.output().split('\n');
    expect(lines.slice(0, 3)).toEqual([
      '   MODEL                  NAME                   CONTEXT    DESCRIPTION',
      '*  gemini-2.0-flash       Gemini 2.0 Flash       1,048,576  Fast multimodal model for everyday tasks',
      '   gemini-2.0-flash-lite  Gemini 2.0 Flash-Lite  1,048,576  Lowest-latency 2.0 model',
    ]);
    expect(lines).toHaveLength(9);
    expect(context.listModels).not.toHaveBeenCalled();
  });

  it('marks a configured default given in resource form', async () => {
    const context = createTestContext({ config: { defaultModel: 'models/gemini-1.5-pro' } });

    await runModels({}, context);

    const marked = context
      .output()
      .split('\n')
      .filter((line) => line.startsWith('*'));
    expect(marked).toHaveLength(1);
    expect(marked[0]?.startsWith('*  gemini-1.5-pro ')).toBe(true);
  });

  it('lists remote models that support generateContent', async () => {
    const context = createTestContext({ env: { GOOGLE_API_KEY: 'test-secret' } });
    vi.mocked(context.listModels).mockResolvedValueOnce([
      { id: 'gemini-2.0-flash', displayName: 'Gemini 2.0 Flash', inputTokenLimit: 1048576, supportsGenerateContent: true },
      { id: 'text-embedding-004', displayName: 'Text Embedding 004', supportsGenerateContent: false },
      { id: 'gemini-exp', displayName: 'Exp', supportsGenerateContent: true },
    ]);

    await runModels({ remote: true }, context);

    expect(context.listModels).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseUrl: 'https://generativelanguage.googleapis.com',
      apiVersion: 'v1beta',
      timeoutMs: 60000,
    });
    expect(context.output()).toBe(
      '   MODEL             NAME              CONTEXT\n' +
        '*  gemini-2.0-flash  Gemini 2.0 Flash  1,048,576\n' +
        '   gemini-exp        Exp               -\n'
    );
  });

  it('reports when no remote model supports generateContent', async () => {
    const context = createTestContext({ env: { GOOGLE_API_KEY: 'test-secret' } });

    await runModels({ remote: true }, context);

    expect(context.output()).toBe('No models supporting generateContent are available to this key\n');
  });

  it('needs a key for the remote listing', async () => {
    const context = createTestContext();

    await expect(runModels({ remote: true }, context)).rejects.toBeInstanceOf(CredentialError);
    expect(context.listModels).not.toHaveBeenCalled();
  });
});
