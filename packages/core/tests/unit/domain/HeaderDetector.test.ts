import { describe, it, expect } from 'vitest';
import { HeaderDetector } from '../../../src/domain/services/HeaderDetector.js';
import { TypeInferrer } from '../../../src/domain/services/TypeInferrer.js';

describe('HeaderDetector', () => {
  const detector = new HeaderDetector(new TypeInferrer());

  it('should detect text labels above typed data', () => {
    const rows = [
      ['id', 'name', 'active'],
      ['1', 'Alice', 'true'],
      ['2', 'Bob', 'false'],
    ];
    expect(detector.detect(rows)).toBe(true);
  });

  it('should reject a first row typed like the data', () => {
    expect(
      detector.detect([
        ['1', '2'],
        ['3', '4'],
      ]),
    ).toBe(false);
  });

  it('should reject a first row above all-text data', () => {
    expect(
      detector.detect([
        ['name', 'city'],
        ['Alice', 'Paris'],
      ]),
    ).toBe(false);
  });

  it('should reject a single column', () => {
    expect(detector.detect([['id'], ['1'], ['2']])).toBe(false);
  });

  it('should reject a sample without data rows', () => {
    expect(detector.detect([['a', 'b']])).toBe(false);
  });

  it('should reject a tied vote', () => {
    expect(
      detector.detect([
        ['x', 'name'],
        ['1', 'Bob'],
      ]),
    ).toBe(false);
  });

  it('should not let blank labels vote', () => {
    expect(
      detector.detect([
        ['', 'b', 'c'],
        ['1', '2', '3'],
      ]),
    ).toBe(true);
  });
});
