import { countFields } from './splitFields.js';

/** How one candidate delimiter splits the sample. */
export interface DelimiterScore {
  readonly delimiter: string;
  /** Most frequent field count per line (ties go to the larger count). */
  readonly modalFieldCount: number;
  /** Fraction of lines whose field count equals the modal count, in `[0, 1]`. */
  readonly score: number;
  /** Number of distinct field counts observed. */
  readonly distinctFieldCounts: number;
  /** Quote character honoured while counting, when the quote-aware count scored better. */
  readonly quote?: string;
}

export interface DelimiterInferrerOptions {
  readonly delimiters: readonly string[];
  /** Quote characters tried for quote-aware counts. */
  readonly quoteCandidates: readonly string[];
  /** Add punctuation bytes that occur equally often on every line as extra candidates. */
  readonly discoverDelimiters: boolean;
}

interface Distribution {
  readonly modalFieldCount: number;
  readonly score: number;
  readonly distinctFieldCounts: number;
}

const PUNCTUATION = /[!-/:-@[-`{-~]/;

/**
 * Domain service that scores candidate delimiters for structural consistency.
 *
 * Every candidate is counted naively and, for each quote character present in
 * the sample, quote-aware; the better distribution represents the candidate.
 * Ranking: a real split (modal count >= 2) first, then higher score, fewer
 * distinct field counts, smaller delimiter byte, and candidate order.
 */
export class DelimiterInferrer {
  constructor(private readonly options: DelimiterInferrerOptions) {}

  /** Score every candidate and return them best first. `lines` must be non-blank. */
  rank(lines: readonly string[]): DelimiterScore[] {
    const candidates = this.candidates(lines);
    const quotes = this.options.quoteCandidates.filter((quote) => lines.some((line) => line.includes(quote)));

    const scored = candidates.map((delimiter, order) => ({ order, score: this.evaluate(lines, delimiter, quotes) }));
    scored.sort((a, b) => compareScores(a.score, b.score) || a.order - b.order);

    return scored.map((entry) => entry.score);
  }

  /** Candidate list: the configured delimiters, plus discovered ones when enabled. */
  candidates(lines: readonly string[]): string[] {
    const configured = [...new Set(this.options.delimiters)];
    if (!this.options.discoverDelimiters) return configured;

    return [...configured, ...this.discover(lines, configured)];
  }

  private evaluate(lines: readonly string[], delimiter: string, quotes: readonly string[]): DelimiterScore {
    let best: DelimiterScore = { delimiter, ...distribution(lines.map((line) => countFields(line, delimiter))) };

    for (const quote of quotes) {
      const quoted = distribution(lines.map((line) => countFields(line, delimiter, quote)));
      if (
        quoted.score > best.score ||
        (quoted.score === best.score && quoted.distinctFieldCounts < best.distinctFieldCounts)
      ) {
        best = { delimiter, ...quoted, quote };
      }
    }

    return best;
  }

  /**
   * Punctuation bytes that occur the same non-zero number of times on every
   * line. Quote characters and already configured delimiters are excluded.
   */
  private discover(lines: readonly string[], configured: readonly string[]): string[] {
    const first = lines[0];
    if (first === undefined) return [];

    const excluded = new Set([...configured, ...this.options.quoteCandidates]);
    const seen = new Set<string>();
    const discovered: string[] = [];

    for (const char of first) {
      if (seen.has(char) || excluded.has(char) || !PUNCTUATION.test(char)) continue;
      seen.add(char);

      const expected = occurrences(first, char);
      if (lines.every((line) => occurrences(line, char) === expected)) {
        discovered.push(char);
      }
    }

    return discovered.sort();
  }
}

/** Whether the candidate actually split the sample into more than one column. */
export function isRealSplit(score: DelimiterScore): boolean {
  return score.modalFieldCount >= 2;
}

function compareScores(a: DelimiterScore, b: DelimiterScore): number {
  return (
    Number(isRealSplit(b)) - Number(isRealSplit(a)) ||
    b.score - a.score ||
    a.distinctFieldCounts - b.distinctFieldCounts ||
    a.delimiter.charCodeAt(0) - b.delimiter.charCodeAt(0)
  );
}

function distribution(fieldCounts: readonly number[]): Distribution {
  const frequencies = new Map<number, number>();
  for (const count of fieldCounts) {
    frequencies.set(count, (frequencies.get(count) ?? 0) + 1);
  }

  let modalFieldCount = 0;
  let modalFrequency = 0;
  for (const [count, frequency] of frequencies) {
    if (frequency > modalFrequency || (frequency === modalFrequency && count > modalFieldCount)) {
      modalFieldCount = count;
      modalFrequency = frequency;
    }
  }

  return {
    modalFieldCount,
    score: fieldCounts.length === 0 ? 0 : modalFrequency / fieldCounts.length,
    distinctFieldCounts: frequencies.size,
  };
}

function occurrences(line: string, char: string): number {
  let count = 0;
  for (const c of line) {
    if (c === char) count++;
  }
  return count;
}
