import { Escape, Quote } from '../model/Dialect.js';
import { splitFields } from './splitFields.js';

/** Quoting convention found for a delimiter. */
export interface QuoteDetection {
  readonly quote: Quote;
  readonly escape: Escape;
}

interface QuoteEvidence {
  readonly character: string;
  readonly wrappedFields: number;
  readonly bestPositionCount: number;
  readonly doubled: boolean;
  readonly backslashEscaped: boolean;
}

/**
 * Domain service that finds the quote character for an already chosen delimiter.
 *
 * A candidate qualifies when it wraps (first and last character) the field at
 * the same position in at least two rows, or in every row of a one-row sample.
 * Among qualifying candidates the one wrapping the most fields wins; ties go to
 * candidate order.
 */
export class QuoteDetector {
  constructor(private readonly candidates: readonly string[]) {}

  detect(lines: readonly string[], delimiter: string): QuoteDetection {
    const required = Math.min(2, lines.length);
    let best: QuoteEvidence | null = null;

    for (const character of this.candidates) {
      if (character === delimiter) continue;
      const evidence = this.collect(lines, delimiter, character);
      if (evidence.wrappedFields === 0 || evidence.bestPositionCount < required) continue;
      if (best === null || evidence.wrappedFields > best.wrappedFields) best = evidence;
    }

    if (best === null) {
      return { quote: Quote.none(), escape: Escape.disabled() };
    }

    return {
      quote: Quote.some(best.character, best.doubled),
      escape: best.backslashEscaped ? Escape.enabled('\\') : Escape.disabled(),
    };
  }

  private collect(lines: readonly string[], delimiter: string, character: string): QuoteEvidence {
    const perPosition = new Map<number, number>();
    let wrappedFields = 0;
    let doubled = false;
    let backslashEscaped = false;

    for (const line of lines) {
      if (!line.includes(character)) continue;

      splitFields(line, delimiter, character).forEach((raw, position) => {
        const field = raw.trim();
        if (field.length < 2 || !field.startsWith(character) || !field.endsWith(character)) return;

        wrappedFields++;
        perPosition.set(position, (perPosition.get(position) ?? 0) + 1);

        const inner = field.slice(1, -1);
        if (inner.includes(character + character)) doubled = true;
        if (inner.includes('\\' + character)) backslashEscaped = true;
      });
    }

    return {
      character,
      wrappedFields,
      bestPositionCount: Math.max(0, ...perPosition.values()),
      doubled,
      backslashEscaped,
    };
  }
}
