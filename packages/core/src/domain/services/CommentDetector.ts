import { Comment } from '../model/Dialect.js';
import { countFields } from './splitFields.js';

/**
 * Domain service that decides whether the table carries line comments.
 *
 * A candidate is enabled when some, but not all, structural lines start with it
 * and none of those lines has the table's modal field count.
 */
export class CommentDetector {
  constructor(private readonly candidates: readonly string[]) {}

  detect(lines: readonly string[], delimiter: string, modalFieldCount: number, quote?: string): Comment {
    for (const character of this.candidates) {
      if (character === delimiter || character === quote) continue;

      const commented = lines.filter((line) => line.startsWith(character));
      if (commented.length === 0 || commented.length === lines.length) continue;

      if (commented.every((line) => countFields(line, delimiter, quote) !== modalFieldCount)) {
        return Comment.enabled(character);
      }
    }

    return Comment.disabled();
  }
}

/** Lines that are not comments under `comment`. */
export function withoutComments(lines: readonly string[], comment: Comment): string[] {
  if (comment.kind === 'disabled') return [...lines];
  return lines.filter((line) => !line.startsWith(comment.character));
}
