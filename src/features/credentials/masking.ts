/**
 * @fileoverview Masking and redaction of API keys for display
 * @module features/credentials/masking
 */

const MASK_CHAR = '*';
const VISIBLE_EDGE = 4;
const MIN_PARTIAL_LENGTH = 8;

/** Matches the value of a `key=` query parameter */
const KEY_QUERY_PARAM = /([?&]key=)[^&\s"':]+/g;

/**
 * Masks an API key for display.
 *
 * Keys longer than 8 characters keep their first and last four characters;
 * shorter keys are masked entirely.
 *
 * @example
 * ```typescript
 * maskApiKey('test-secret-value'); // 'test*********alue'
 * maskApiKey('short');             // '*****'
 * ```
 */
export function maskApiKey(key: string): string {
  if (key.length <= MIN_PARTIAL_LENGTH) {
    return MASK_CHAR.repeat(key.length);
  }
  const hidden = key.length - VISIBLE_EDGE * 2;
  return `${key.slice(0, VISIBLE_EDGE)}${MASK_CHAR.repeat(hidden)}${key.slice(-VISIBLE_EDGE)}`;
}

/**
 * Removes secrets from free text such as error messages and URLs.
 *
 * Every occurrence of a listed secret becomes `***`, as does the value of any
 * `key=` query parameter.
 */
export function redactSecrets(text: string, secrets: readonly string[] = []): string {
  let redacted = text;
  for (const secret of secrets) {
    if (secret !== '') {
      redacted = redacted.split(secret).join('***');
    }
  }
  return redacted.replace(KEY_QUERY_PARAM, '$1***');
}
