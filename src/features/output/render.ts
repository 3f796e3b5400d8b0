/**
 * @fileoverview Rendering of generation results for the terminal
 * @module features/output/render
 */

import type { GenerationResult, OutputFormat } from '../../shared/types/models.js';

/**
 * Renders text as a Markdown block quote: `•` bullets become `  *` list
 * items and every line, blank ones included, is prefixed with `> `.
 *
 * @example
 * ```typescript
 * toMarkdownQuote('Steps:\n• one'); // '> Steps:\n>   * one'
 * ```
 */
export function toMarkdownQuote(text: string): string {
  return text
    .replace(/•/g, '  *')
    .split('\n')
    .map((line) => `> ${line}`)
    .join('\n');
}

/**
 * Renders a generation result in the requested format. The output always
 * ends with a single newline.
 */
export function renderResult(result: GenerationResult, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return result.text.endsWith('\n') ? result.text : `${result.text}\n`;

    case 'markdown':
      return `${toMarkdownQuote(result.text.replace(/\n+$/, ''))}\n`;

    case 'json':
      return `${JSON.stringify(
        {
          model: result.model,
          text: result.text,
          finishReason: result.finishReason ?? null,
          usage: result.usage ?? null,
        },
        null,
        2
      )}\n`;
  }
}
