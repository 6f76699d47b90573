import type { Quote } from '../domain/model/Dialect.js';
import type { DatePreference } from '../domain/services/TypeInferrer.js';
import { InvalidSnifferConfigError } from '../domain/errors/CsvDialectError.js';

/** Dialect facts known in advance. Each one given here skips its inference step. */
export interface DialectHints {
  readonly delimiter?: string;
  readonly quote?: Quote;
  readonly numPreambleRows?: number;
  readonly hasHeader?: boolean;
}

/** Configuration for a `Sniffer`. Every option has a default. */
export interface SnifferConfig {
  /** Bytes read from a source before sniffing. Default: `65536`. */
  readonly sampleBytes?: number;
  /** Maximum structural lines (after the preamble, blank lines excluded) examined. Default: `100`. */
  readonly maxRows?: number;
  /** Longest preamble looked for, in lines. Default: `20`. */
  readonly maxPreambleRows?: number;
  /** Following lines that must confirm a table start. Default: `10`. */
  readonly preambleLookahead?: number;
  /** Candidate delimiters, in tie-break order. Default: comma, tab, semicolon, pipe. */
  readonly delimiters?: readonly string[];
  /** Also try punctuation bytes that occur equally often on every line. Default: `false`. */
  readonly discoverDelimiters?: boolean;
  /** Candidate quote characters. Default: `"` then `'`. */
  readonly quoteCandidates?: readonly string[];
  /** Candidate comment characters. Default: `#`. */
  readonly commentCandidates?: readonly string[];
  /**
   * Minimum score (fraction of lines agreeing on the field count) the best
   * delimiter must reach, in `(0, 1]`. Default: `0.5`.
   */
  readonly minConfidence?: number;
  /** Reading of ambiguous `A/B/YYYY` dates. Default: `'MDY'`. */
  readonly datePreference?: DatePreference;
  /** Known dialect facts. Default: none. */
  readonly hints?: DialectHints;
}

/** `SnifferConfig` with every default applied. */
export interface SniffSettings {
  readonly sampleBytes: number;
  readonly maxRows: number;
  readonly maxPreambleRows: number;
  readonly preambleLookahead: number;
  readonly delimiters: readonly string[];
  readonly discoverDelimiters: boolean;
  readonly quoteCandidates: readonly string[];
  readonly commentCandidates: readonly string[];
  readonly minConfidence: number;
  readonly datePreference: DatePreference;
  readonly hints: DialectHints;
}

export const DEFAULT_DELIMITERS: readonly string[] = [',', '\t', ';', '|'];
export const DEFAULT_QUOTE_CANDIDATES: readonly string[] = ['"', "'"];
export const DEFAULT_COMMENT_CANDIDATES: readonly string[] = ['#'];
export const DEFAULT_MIN_CONFIDENCE = 0.5;

/** Apply defaults and reject settings the heuristics cannot work with. */
export function resolveSettings(config: SnifferConfig = {}): SniffSettings {
  const settings: SniffSettings = {
    sampleBytes: config.sampleBytes ?? 65536,
    maxRows: config.maxRows ?? 100,
    maxPreambleRows: config.maxPreambleRows ?? 20,
    preambleLookahead: config.preambleLookahead ?? 10,
    delimiters: config.delimiters ?? DEFAULT_DELIMITERS,
    discoverDelimiters: config.discoverDelimiters ?? false,
    quoteCandidates: config.quoteCandidates ?? DEFAULT_QUOTE_CANDIDATES,
    commentCandidates: config.commentCandidates ?? DEFAULT_COMMENT_CANDIDATES,
    minConfidence: config.minConfidence ?? DEFAULT_MIN_CONFIDENCE,
    datePreference: config.datePreference ?? 'MDY',
    hints: config.hints ?? {},
  };

  requirePositiveInteger('sampleBytes', settings.sampleBytes);
  requirePositiveInteger('maxRows', settings.maxRows);
  requirePositiveInteger('preambleLookahead', settings.preambleLookahead);
  if (!Number.isInteger(settings.maxPreambleRows) || settings.maxPreambleRows < 0) {
    throw new InvalidSnifferConfigError('maxPreambleRows', 'must be a non-negative integer');
  }

  if (settings.delimiters.length === 0) {
    throw new InvalidSnifferConfigError('delimiters', 'at least one candidate is required');
  }
  settings.delimiters.forEach((c) => requireSingleByte('delimiters', c));
  settings.quoteCandidates.forEach((c) => requireSingleByte('quoteCandidates', c));
  settings.commentCandidates.forEach((c) => requireSingleByte('commentCandidates', c));

  const clash = settings.delimiters.find((c) => settings.quoteCandidates.includes(c));
  if (clash !== undefined) {
    throw new InvalidSnifferConfigError('quoteCandidates', `${JSON.stringify(clash)} is also a delimiter candidate`);
  }

  if (!(settings.minConfidence > 0 && settings.minConfidence <= 1)) {
    throw new InvalidSnifferConfigError('minConfidence', 'must be in (0, 1]');
  }

  const { hints } = settings;
  if (hints.delimiter !== undefined) requireSingleByte('hints.delimiter', hints.delimiter);
  if (hints.quote?.kind === 'some') requireSingleByte('hints.quote', hints.quote.character);
  if (hints.numPreambleRows !== undefined && (!Number.isInteger(hints.numPreambleRows) || hints.numPreambleRows < 0)) {
    throw new InvalidSnifferConfigError('hints.numPreambleRows', 'must be a non-negative integer');
  }

  return settings;
}

function requirePositiveInteger(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidSnifferConfigError(option, 'must be a positive integer');
  }
}

function requireSingleByte(option: string, value: string): void {
  if (value.length !== 1 || value.charCodeAt(0) > 0x7f) {
    throw new InvalidSnifferConfigError(option, `${JSON.stringify(value)} is not a single ASCII character`);
  }
  if (value === '\n' || value === '\r') {
    throw new InvalidSnifferConfigError(option, 'line terminators cannot be used');
  }
}
