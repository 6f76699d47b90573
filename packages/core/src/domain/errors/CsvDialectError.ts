/** Machine-readable codes for every error raised by the sniffer and the reader. */
export type CsvDialectErrorCode =
  | 'SAMPLE_READ_FAILED'
  | 'INSUFFICIENT_SAMPLE'
  | 'NO_CONSISTENT_DELIMITER'
  | 'INVALID_CONFIG'
  | 'RAGGED_RECORD';

/** Base class for sniffing and reading errors. Catch this to handle all of them. */
export abstract class CsvDialectError extends Error {
  abstract readonly code: CsvDialectErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The sample could not be acquired from its source. Fatal to the sniff call. */
export class SampleReadError extends CsvDialectError {
  readonly code = 'SAMPLE_READ_FAILED' as const;

  constructor(sourceName: string, cause: unknown) {
    super(`Failed to read a sample from '${sourceName}': ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

/** The sample is too short or empty to infer any structure. */
export class InsufficientSampleError extends CsvDialectError {
  readonly code = 'INSUFFICIENT_SAMPLE' as const;

  constructor(reason: string) {
    super(`Cannot sniff: ${reason}`);
  }
}

/** Score of one delimiter candidate, as ranked by the delimiter inferrer. */
export interface CandidateScoreSummary {
  readonly delimiter: string;
  readonly score: number;
  readonly modalFieldCount: number;
}

/** No candidate delimiter splits the sample consistently enough to be trusted. */
export class NoConsistentDelimiterError extends CsvDialectError {
  readonly code = 'NO_CONSISTENT_DELIMITER' as const;

  constructor(
    readonly candidates: readonly CandidateScoreSummary[],
    readonly minConfidence: number,
  ) {
    const best = candidates[0];
    super(
      best
        ? `No consistent delimiter: best candidate ${JSON.stringify(best.delimiter)} scored ${best.score.toFixed(2)}, below the minimum confidence of ${String(minConfidence)}`
        : 'No consistent delimiter: no candidate delimiters were evaluated',
    );
  }
}

/** The sniffer configuration was rejected. */
export class InvalidSnifferConfigError extends CsvDialectError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(
    readonly option: string,
    reason: string,
  ) {
    super(`Invalid sniffer option '${option}': ${reason}`);
  }
}

/** A record's width differs from the table's while the dialect is not flexible. */
export class RaggedRecordError extends CsvDialectError {
  readonly code = 'RAGGED_RECORD' as const;

  constructor(
    readonly recordIndex: number,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `Record ${String(recordIndex)} has ${String(actual)} fields, expected ${String(expected)} (dialect is not flexible)`,
    );
  }
}
