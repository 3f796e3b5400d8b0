/**
 * @fileoverview Unit tests for the generate command handler
 * @module features/commands/__tests__/generate.test
 */

import { describe, it, expect, vi } from 'vitest';
import { runGenerate } from '../handlers/generate.js';
import { CredentialError } from '../../credentials/types.js';
import { AdapterError } from '../../model/adapters/types.js';
import { createTestContext } from './context.js';

const DEFAULT_PROMPT = 'Please give me python code to sort a list.';

function warnings(): string[] {
  return vi.mocked(console.warn).mock.calls.map((call) => String(call[0]));
}

describe('runGenerate', () => {
  it('configures a client with the resolved key and sends the default prompt', async () => {
    const context = createTestContext({ env: { GOOGLE_API_KEY: 'test-secret' } });

    const result = await runGenerate({}, context);

    expect(context.clientSettings).toEqual([
      {
        transport: 'sdk',
        apiKey: 'test-secret',
        model: 'gemini-2.0-flash',
        baseUrl: 'https://generativelanguage.googleapis.com',
        apiVersion: 'v1beta',
        timeoutMs: 60000,
      },
    ]);
    expect(context.clients[0]?.prompts).toEqual([{ prompt: DEFAULT_PROMPT, options: {} }]);
    expect(result).toEqual({ text: 'Hello', model: 'gemini-2.0-flash', finishReason: 'STOP' });
    expect(context.output()).toBe('Hello\n');
  });

  it('uses the default prompt for a blank prompt', async () => {
    const context = createTestContext({ env: { GOOGLE_API_KEY: 'test-secret' } });

    await runGenerate({ prompt: '   ' }, context);

    expect(context.clients[0]?.prompts[0]?.prompt).toBe(DEFAULT_PROMPT);
  });

  it('applies command-line overrides on top of configured defaults', async () => {
    const context = createTestContext({
      env: { GOOGLE_API_KEY: 'test-secret' },
      config: { generation: { temperature: 0.9, systemInstruction: 'Be verbose' } },
    });

    await runGenerate(
      {
        prompt: 'Sort a list',
        model: 'models/gemini-1.5-pro',
        transport: 'rest',
        temperature: 0.3,
        maxOutputTokens: 100,
        system: 'Be brief',
        format: 'json',
      },
      context
    );

    expect(context.clientSettings[0]?.transport).toBe('rest');
    expect(context.clientSettings[0]?.model).toBe('gemini-1.5-pro');
    expect(context.clients[0]?.prompts).toEqual([
      { prompt: 'Sort a list', options: { temperature: 0.3, maxOutputTokens: 100, systemInstruction: 'Be brief' } },
    ]);
    expect(JSON.parse(context.output())).toEqual({
      model: 'gemini-1.5-pro',
      text: 'Hello',
      finishReason: 'STOP',
      usage: null,
    });
  });

  it('keeps configured generation settings that are not overridden', async () => {
    const context = createTestContext({
      env: { GOOGLE_API_KEY: 'test-secret' },
      config: { generation: { temperature: 0.9 } },
    });

    await runGenerate({ maxOutputTokens: 50 }, context);

    expect(context.clients[0]?.prompts[0]?.options).toEqual({ temperature: 0.9, maxOutputTokens: 50 });
  });

  it('warns about models outside the catalog but still sends the request', async () => {
    const context = createTestContext({ env: { GOOGLE_API_KEY: 'test-secret' } });

    await runGenerate({ model: 'gemini-exp-1206' }, context);

    expect(context.clientSettings[0]?.model).toBe('gemini-exp-1206');
    expect(warnings().some((line) => line.includes('Model "gemini-exp-1206" is not in the catalog'))).toBe(true);
  });

  it('rejects invalid generation settings before resolving the key', async () => {
    const context = createTestContext();

    await expect(runGenerate({ temperature: 3 }, context)).rejects.toBeInstanceOf(AdapterError);
    await expect(runGenerate({ temperature: 3 }, context)).rejects.toMatchObject({ code: 'INVALID_CONFIG' });
    expect(context.clientSettings).toEqual([]);
  });

  it('fails without creating a client when no key is available', async () => {
    const context = createTestContext();

    await expect(runGenerate({}, context)).rejects.toBeInstanceOf(CredentialError);
    expect(context.clientSettings).toEqual([]);
    expect(context.output()).toBe('');
  });

  it('restricts the lookup to the requested source', async () => {
    const context = createTestContext({
      secrets: { GOOGLE_API_KEY: 'test-secret-from-store' },
      env: { GOOGLE_API_KEY: 'test-secret-from-env' },
    });

    await runGenerate({ source: 'env' }, context);

    expect(context.clientSettings[0]?.apiKey).toBe('test-secret-from-env');
  });

  describe('streaming', () => {
    it('writes text chunks as they arrive and ends the line', async () => {
      const context = createTestContext({
        env: { GOOGLE_API_KEY: 'test-secret' },
        reply: { text: ['sorted(', 'my_list)'], finishReason: 'STOP' },
      });
      const write = vi.spyOn(context, 'write');

      const result = await runGenerate({ stream: true }, context);

      expect(write.mock.calls.map((call) => call[0])).toEqual(['sorted(', 'my_list)', '\n']);
      expect(result).toEqual({ text: 'sorted(my_list)', model: 'gemini-2.0-flash', finishReason: 'STOP' });
    });

    it('does not add a newline when the text already ends with one', async () => {
      const context = createTestContext({
        env: { GOOGLE_API_KEY: 'test-secret' },
        reply: { text: ['done\n'] },
      });

      await runGenerate({ stream: true }, context);

      expect(context.output()).toBe('done\n');
    });

    it('renders markdown once the stream completes', async () => {
      const context = createTestContext({
        env: { GOOGLE_API_KEY: 'test-secret' },
        reply: { text: ['Steps:\n', '• sort'] },
      });

      await runGenerate({ stream: true, format: 'markdown' }, context);

      expect(context.output()).toBe('> Steps:\n>   * sort\n');
    });
  });
});
