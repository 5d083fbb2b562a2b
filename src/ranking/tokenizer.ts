/**
 * Tokenizer
 *
 * Turns free text into lowercase alphanumeric word tokens. No stemming,
 * no stopword removal, no minimum token length.
 *
 * @module ranking/tokenizer
 */

const TOKEN_PATTERN = /[a-z0-9]+/g;

/**
 * Lowercase the text and return every maximal run of `[a-z0-9]`,
 * left to right. Anything else separates tokens and is discarded.
 *
 * @example
 * ```typescript
 * tokenize('Hello, World! 2024'); // ['hello', 'world', '2024']
 * tokenize(null);                 // []
 * ```
 */
export function tokenize(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}
