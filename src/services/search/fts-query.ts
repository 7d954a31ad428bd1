/**
 * FTS5 query sanitizer
 *
 * @module services/search/fts-query
 */

import { ValidationError } from '../../utils/validation.js';

const FTS5_OPERATORS = new Set(['AND', 'OR', 'NOT']);

/**
 * Turn user query text into a safe FTS5 MATCH expression.
 *
 * - Keeps the boolean operators AND, OR and NOT
 * - Splits on hyphens, as the unicode61 tokenizer does
 * - Strips FTS5 metacharacters
 * - Drops leading, trailing and repeated operators, and a leading NOT
 * - Joins consecutive terms with AND
 *
 * @throws ValidationError when no search term survives
 */
export function sanitizeFTS5Query(query: string): string {
  const tokens: string[] = [];
  for (const raw of query.trim().split(/\s+/)) {
    if (raw.length === 0) continue;
    if (FTS5_OPERATORS.has(raw.toUpperCase())) {
      tokens.push(raw.toUpperCase());
      continue;
    }
    for (const part of raw.split('-')) {
      const cleaned = part.replace(/['"()*:^~+{}[\]\\;@<>#!$%&|,./`?=]/g, '');
      if (cleaned.length > 0) tokens.push(cleaned);
    }
  }

  while (tokens.length > 0 && FTS5_OPERATORS.has(tokens[0])) tokens.shift();
  while (tokens.length > 0 && FTS5_OPERATORS.has(tokens[tokens.length - 1])) tokens.pop();

  const collapsed: string[] = [];
  for (const t of tokens) {
    const prev = collapsed[collapsed.length - 1];
    if (FTS5_OPERATORS.has(t) && prev !== undefined && FTS5_OPERATORS.has(prev)) continue;
    collapsed.push(t);
  }
  if (collapsed.length >= 2 && collapsed[0] === 'NOT') collapsed.shift();

  if (collapsed.length === 0) {
    throw new ValidationError('Query contains no searchable terms');
  }

  const parts: string[] = [];
  collapsed.forEach((t, i) => {
    parts.push(t);
    const next = collapsed[i + 1];
    if (next !== undefined && !FTS5_OPERATORS.has(t) && !FTS5_OPERATORS.has(next)) {
      parts.push('AND');
    }
  });
  return parts.join(' ');
}
