import { describe, it, expect } from 'vitest';
import { DelimiterInferrer, isRealSplit } from '../../../src/domain/services/DelimiterInferrer.js';
import type { DelimiterInferrerOptions } from '../../../src/domain/services/DelimiterInferrer.js';

function createInferrer(overrides: Partial<DelimiterInferrerOptions> = {}): DelimiterInferrer {
  return new DelimiterInferrer({
    delimiters: [',', '\t', ';', '|'],
    quoteCandidates: ['"', "'"],
    discoverDelimiters: false,
    ...overrides,
  });
}

describe('DelimiterInferrer', () => {
  it('should rank a consistently splitting delimiter first', () => {
    const [best] = createInferrer().rank(['a;b;c', '1;2;3', '4;5;6']);

    expect(best).toEqual({ delimiter: ';', modalFieldCount: 3, score: 1, distinctFieldCounts: 1 });
  });

  it('should detect tab-separated lines', () => {
    const [best] = createInferrer().rank(['a\tb', '1\t2']);
    expect(best?.delimiter).toBe('\t');
  });

  it('should prefer the consistent delimiter over one that appears inside values', () => {
    const [best] = createInferrer().rank(['name|amount', 'Smith, J|1,5', 'Doe|2']);
    expect(best?.delimiter).toBe('|');
  });

  it('should use quote-aware counts when they are more consistent', () => {
    const [best] = createInferrer().rank(['name,city', '"Smith, John",Paris', 'Jane,Rome']);

    expect(best).toEqual({ delimiter: ',', modalFieldCount: 2, score: 1, distinctFieldCounts: 1, quote: '"' });
  });

  it('should break score ties by the smaller delimiter byte', () => {
    const lines = ['a,b;c', '1,2;3'];

    expect(createInferrer().rank(lines)[0]?.delimiter).toBe(',');
    expect(createInferrer({ delimiters: [';', ','] }).rank(lines)[0]?.delimiter).toBe(',');
  });

  it('should rank a real split above a higher-scoring non-split', () => {
    const ranked = createInferrer().rank(['a,b', 'c,d', 'e,f,g']);

    expect(ranked[0]).toMatchObject({ delimiter: ',', modalFieldCount: 2 });
    expect(ranked[0]?.score).toBeCloseTo(2 / 3);
    expect(ranked[1]?.score).toBe(1);
  });

  it('should report no real split for single-column lines', () => {
    const [best] = createInferrer().rank(['alpha', 'beta']);

    expect(best).toBeDefined();
    expect(isRealSplit(best!)).toBe(false);
    expect(best?.delimiter).toBe('\t');
  });

  it('should return every candidate once', () => {
    const ranked = createInferrer({ delimiters: [',', ',', ';'] }).rank(['a,b', '1,2']);
    expect(ranked.map((score) => score.delimiter)).toEqual([',', ';']);
  });

  describe('candidate discovery', () => {
    it('should add punctuation that occurs equally often on every line', () => {
      const inferrer = createInferrer({ delimiters: [','], discoverDelimiters: true });
      const lines = ['a^b^c', '1^2^3'];

      expect(inferrer.candidates(lines)).toEqual([',', '^']);
      expect(inferrer.rank(lines)[0]).toMatchObject({ delimiter: '^', modalFieldCount: 3 });
    });

    it('should skip punctuation with varying counts', () => {
      const inferrer = createInferrer({ delimiters: [','], discoverDelimiters: true });
      expect(inferrer.candidates(['a^b', '1^2^3'])).toEqual([',']);
    });

    it('should not discover anything when disabled', () => {
      expect(createInferrer({ delimiters: [','] }).candidates(['a^b^c', '1^2^3'])).toEqual([',']);
    });
  });
});
