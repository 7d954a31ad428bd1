/**
 * Text helpers shared by the classifier and the embedder
 */

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Lowercased letter/digit runs
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export function countWords(text: string): number {
  const matches = text.match(/\S+/g);
  return matches ? matches.length : 0;
}

/**
 * Leading slice of `text`, at most `length` characters
 */
export function preview(text: string, length: number): string {
  return text.length <= length ? text : text.slice(0, length);
}
