/**
 * FTS5 Query Sanitizer Tests
 */

import { describe, it, expect } from 'vitest';
import { sanitizeFTS5Query } from '../../../src/services/search/fts-query.js';
import { ValidationError } from '../../../src/utils/validation.js';

describe('sanitizeFTS5Query', () => {
  it('joins plain terms with AND', () => {
    expect(sanitizeFTS5Query('mind body')).toBe('mind AND body');
  });

  it('splits hyphenated words', () => {
    expect(sanitizeFTS5Query('state-of-the-art')).toBe('state AND of AND the AND art');
  });

  it('keeps explicit operators between terms', () => {
    expect(sanitizeFTS5Query('mind OR brain')).toBe('mind OR brain');
    expect(sanitizeFTS5Query('mind not brain')).toBe('mind NOT brain');
  });

  it('drops dangling and repeated operators', () => {
    expect(sanitizeFTS5Query('AND foo OR')).toBe('foo');
    expect(sanitizeFTS5Query('NOT foo')).toBe('foo');
    expect(sanitizeFTS5Query('foo AND OR bar')).toBe('foo AND bar');
  });

  it('strips FTS5 metacharacters', () => {
    expect(sanitizeFTS5Query('"quoted" (x)')).toBe('quoted AND x');
    expect(sanitizeFTS5Query('title:mind*')).toBe('titlemind');
  });

  it('rejects a query with no terms', () => {
    expect(() => sanitizeFTS5Query('***')).toThrow(ValidationError);
    expect(() => sanitizeFTS5Query('AND OR')).toThrow('Query contains no searchable terms');
  });
});
