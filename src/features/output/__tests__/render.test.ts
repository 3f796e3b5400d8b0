/**
 * @fileoverview Tests for result rendering
 * @module features/output/__tests__/render.test
 */

import { describe, it, expect } from 'vitest';
import { renderResult, toMarkdownQuote } from '../render.js';
import type { GenerationResult } from '../../../shared/types/models.js';

const RESULT: GenerationResult = {
  text: 'Steps:\n• call sorted()\n\n• done\n',
  model: 'gemini-2.0-flash',
  finishReason: 'STOP',
  usage: { promptTokens: 4, candidatesTokens: 9, totalTokens: 13 },
};

describe('toMarkdownQuote', () => {
  it('quotes every line and turns bullets into list items', () => {
    expect(toMarkdownQuote('Steps:\n• one\n\n• two')).toBe('> Steps:\n>   * one\n> \n>   * two');
  });
});

describe('renderResult', () => {
  it('prints text as-is with a single trailing newline', () => {
    expect(renderResult(RESULT, 'text')).toBe('Steps:\n• call sorted()\n\n• done\n');
    expect(renderResult({ text: 'hi', model: 'gemini-2.0-flash' }, 'text')).toBe('hi\n');
  });

  it('renders markdown as a block quote', () => {
    expect(renderResult(RESULT, 'markdown')).toBe('> Steps:\n>   * call sorted()\n> \n>   * done\n');
  });

  it('renders json with nulls for missing fields', () => {
    const rendered = renderResult({ text: 'hi', model: 'gemini-2.0-flash' }, 'json');

    expect(rendered.endsWith('}\n')).toBe(true);
    expect(JSON.parse(rendered)).toEqual({ model: 'gemini-2.0-flash', text: 'hi', finishReason: null, usage: null });
  });

  it('includes usage in json output', () => {
    expect(JSON.parse(renderResult(RESULT, 'json'))).toEqual({
      model: 'gemini-2.0-flash',
      text: 'Steps:\n• call sorted()\n\n• done\n',
      finishReason: 'STOP',
      usage: { promptTokens: 4, candidatesTokens: 9, totalTokens: 13 },
    });
  });
});
