import { describe, it, expect } from 'vitest';
import { Comment, Escape, Quote, characterOf, createDialect, dialectEquals } from '../../../src/domain/model/Dialect.js';
import type { Dialect } from '../../../src/domain/model/Dialect.js';

const base: Dialect = {
  delimiter: ',',
  header: { hasHeaderRow: true, numPreambleRows: 0 },
  quote: Quote.some('"'),
  escape: Escape.disabled(),
  comment: Comment.disabled(),
  flexible: false,
  isUtf8: true,
};

describe('Dialect', () => {
  it('should default to doubled quotes', () => {
    expect(Quote.some("'")).toEqual({ kind: 'some', character: "'", doubleQuote: true });
  });

  it('should expose the character of enabled settings only', () => {
    expect(characterOf(Quote.some('"'))).toBe('"');
    expect(characterOf(Escape.enabled('\\'))).toBe('\\');
    expect(characterOf(Comment.enabled('#'))).toBe('#');
    expect(characterOf(Quote.none())).toBeUndefined();
    expect(characterOf(Comment.disabled())).toBeUndefined();
  });

  it('should freeze dialects and their header', () => {
    const dialect = createDialect(base);

    expect(Object.isFrozen(dialect)).toBe(true);
    expect(Object.isFrozen(dialect.header)).toBe(true);
    expect(Object.isFrozen(dialect.quote)).toBe(true);
  });

  describe('dialectEquals()', () => {
    it('should compare structurally', () => {
      expect(dialectEquals(createDialect(base), createDialect({ ...base, quote: Quote.some('"') }))).toBe(true);
    });

    it('should detect a differing field', () => {
      expect(dialectEquals(base, { ...base, delimiter: ';' })).toBe(false);
      expect(dialectEquals(base, { ...base, quote: Quote.some('"', false) })).toBe(false);
      expect(dialectEquals(base, { ...base, quote: Quote.none() })).toBe(false);
      expect(dialectEquals(base, { ...base, comment: Comment.enabled('#') })).toBe(false);
      expect(dialectEquals(base, { ...base, header: { hasHeaderRow: true, numPreambleRows: 1 } })).toBe(false);
    });
  });
});
