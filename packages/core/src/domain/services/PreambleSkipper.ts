import { isBlankLine } from '../model/Sample.js';
import { countFields } from './splitFields.js';

export interface PreambleSkipperOptions {
  /** Candidate delimiters tried on every line. */
  readonly delimiters: readonly string[];
  /** Quote characters honoured when counting fields (those absent from the sample are ignored). */
  readonly quoteCandidates: readonly string[];
  /** Longest preamble looked for, in lines. */
  readonly maxPreambleRows: number;
  /** Following non-blank lines used to confirm that a table starts. */
  readonly lookahead: number;
}

/**
 * Domain service that finds where the table starts.
 *
 * Only blank lines and lines that no candidate delimiter splits can be
 * preamble. The scan stops at the first line that splits into two or more
 * quote-aware fields. When lines were skipped to reach it, the skip holds only
 * if a strict majority of the lines from there on share one width of at least
 * two fields; otherwise the whole sample is data and the answer is 0.
 */
export class PreambleSkipper {
  constructor(private readonly options: PreambleSkipperOptions) {}

  /** Number of leading lines that are not part of the table. */
  skip(lines: readonly string[]): number {
    if (lines.length < 2) return 0;

    const limit = Math.min(lines.length, this.options.maxPreambleRows + 1);
    for (let i = 0; i < limit; i++) {
      const line = lines[i];
      if (line === undefined || isBlankLine(line)) continue;
      if (!this.splits(line)) continue;

      return i > 0 && this.startsTable(lines, i) ? i : 0;
    }

    return 0;
  }

  /** Whether `line` splits into at least two fields, reading quotes as it contains them. */
  splits(line: string): boolean {
    const quotes: (string | undefined)[] = this.options.quoteCandidates.filter((quote) => line.includes(quote));
    if (quotes.length === 0) quotes.push(undefined);

    return this.options.delimiters.some((delimiter) =>
      quotes.some((quote) => countFields(line, delimiter, quote) >= 2),
    );
  }

  /**
   * Whether the lines from `index` on look tabular: under one delimiter, a strict
   * majority of the next `lookahead` non-blank lines share a width of two or more.
   * Ragged rows below a wider header still count, as long as most rows agree.
   */
  startsTable(lines: readonly string[], index: number): boolean {
    const window = this.windowFrom(lines, index);
    if (window.length === 0) return false;

    const quotes = this.quotesIn(window);
    return this.options.delimiters.some((delimiter) =>
      quotes.some((quote) => {
        const widths = new Map<number, number>();
        for (const line of window) {
          const width = countFields(line, delimiter, quote);
          if (width >= 2) widths.set(width, (widths.get(width) ?? 0) + 1);
        }
        return Math.max(0, ...widths.values()) * 2 > window.length;
      }),
    );
  }

  /** A plain split, plus every quote character present in the lines. */
  private quotesIn(lines: readonly string[]): (string | undefined)[] {
    const present = this.options.quoteCandidates.filter((quote) => lines.some((line) => line.includes(quote)));
    return [undefined, ...present];
  }

  private windowFrom(lines: readonly string[], index: number): string[] {
    const window: string[] = [];
    for (let i = index; i < lines.length && window.length < this.options.lookahead; i++) {
      const line = lines[i];
      if (line !== undefined && !isBlankLine(line)) window.push(line);
    }
    return window;
  }
}
