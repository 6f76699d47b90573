import { describe, it, expect } from 'vitest';
import { CommentDetector, withoutComments } from '../../../src/domain/services/CommentDetector.js';
import { Comment } from '../../../src/domain/model/Dialect.js';

describe('CommentDetector', () => {
  const detector = new CommentDetector(['#']);

  it('should enable a comment character on off-width lines', () => {
    const comment = detector.detect(['a,b', '1,2', '# note', '3,4'], ',', 2);
    expect(comment).toEqual({ kind: 'enabled', character: '#' });
  });

  it('should stay disabled when no line starts with a candidate', () => {
    expect(detector.detect(['a,b', '1,2'], ',', 2)).toEqual({ kind: 'disabled' });
  });

  it('should stay disabled when such a line has the table width', () => {
    expect(detector.detect(['a,b', '#1,2', '3,4'], ',', 2)).toEqual({ kind: 'disabled' });
  });

  it('should stay disabled when every line starts with the candidate', () => {
    expect(detector.detect(['#a', '#b'], ',', 1)).toEqual({ kind: 'disabled' });
  });

  it('should skip a candidate that is the delimiter or the quote', () => {
    expect(new CommentDetector(['#']).detect(['a#b', '#x'], '#', 2)).toEqual({ kind: 'disabled' });
    expect(new CommentDetector(['"']).detect(['"a",b', 'c,d', 'e,f'], ',', 2, '"')).toEqual({ kind: 'disabled' });
  });

  describe('withoutComments()', () => {
    it('should drop comment lines', () => {
      expect(withoutComments(['a', '# b', 'c'], Comment.enabled('#'))).toEqual(['a', 'c']);
    });

    it('should keep every line when comments are disabled', () => {
      expect(withoutComments(['a', '# b'], Comment.disabled())).toEqual(['a', '# b']);
    });
  });
});
