import { describe, it, expect } from 'vitest';
import { QuoteDetector } from '../../../src/domain/services/QuoteDetector.js';

describe('QuoteDetector', () => {
  const detector = new QuoteDetector(['"', "'"]);

  it('should detect double quotes wrapping fields that contain the delimiter', () => {
    const result = detector.detect(['id,name', '1,"Smith, John"', '2,"Doe, Jane"'], ',');

    expect(result).toEqual({
      quote: { kind: 'some', character: '"', doubleQuote: false },
      escape: { kind: 'disabled' },
    });
  });

  it('should detect doubled quotes inside quoted fields', () => {
    const result = detector.detect(['"a ""b""",1', '"c",2'], ',');
    expect(result.quote).toEqual({ kind: 'some', character: '"', doubleQuote: true });
  });

  it('should detect single quotes', () => {
    const result = detector.detect(["'x',1", "'y',2"], ',');
    expect(result.quote).toEqual({ kind: 'some', character: "'", doubleQuote: false });
  });

  it('should detect backslash escapes', () => {
    const result = detector.detect(['"say \\"hi\\"",1', '"ok",2'], ',');

    expect(result.quote).toEqual({ kind: 'some', character: '"', doubleQuote: false });
    expect(result.escape).toEqual({ kind: 'enabled', character: '\\' });
  });

  it('should require the same position to be quoted in two rows', () => {
    const result = detector.detect(['"a",1', 'b,2', 'c,3'], ',');

    expect(result.quote).toEqual({ kind: 'none' });
    expect(result.escape).toEqual({ kind: 'disabled' });
  });

  it('should accept a one-row sample', () => {
    const result = detector.detect(['"a","b"'], ',');
    expect(result.quote).toEqual({ kind: 'some', character: '"', doubleQuote: false });
  });

  it('should ignore apostrophes inside words', () => {
    const result = detector.detect(["O'Brien,1", "D'Arcy,2"], ',');
    expect(result.quote).toEqual({ kind: 'none' });
  });

  it('should never pick the delimiter as the quote', () => {
    const result = new QuoteDetector(['|']).detect(['a|b', 'c|d'], '|');
    expect(result.quote).toEqual({ kind: 'none' });
  });
});
