import type { Metadata } from '../model/Metadata.js';
import type { DelimiterScore } from '../services/DelimiterInferrer.js';
import type { CsvDialectErrorCode } from '../errors/CsvDialectError.js';

/** Emitted when a sniff begins, once the sample is materialised. */
export interface SniffStartedEvent {
  readonly type: 'sniff:started';
  readonly sampleBytes: number;
  readonly timestamp: number;
}

/** Emitted once the preamble length is known. */
export interface PreambleDetectedEvent {
  readonly type: 'sniff:preamble';
  readonly numPreambleRows: number;
  readonly timestamp: number;
}

/** Emitted after delimiter candidates are ranked. `candidates` is best first. */
export interface DelimitersScoredEvent {
  readonly type: 'sniff:delimiters';
  readonly candidates: readonly DelimiterScore[];
  readonly delimiter: string;
  readonly timestamp: number;
}

/** Emitted with the final result. */
export interface SniffCompletedEvent {
  readonly type: 'sniff:completed';
  readonly metadata: Metadata;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when sniffing gives up. */
export interface SniffFailedEvent {
  readonly type: 'sniff:failed';
  readonly code: CsvDialectErrorCode | 'UNKNOWN';
  readonly error: string;
  readonly timestamp: number;
}

export type DomainEvent =
  | SniffStartedEvent
  | PreambleDetectedEvent
  | DelimitersScoredEvent
  | SniffCompletedEvent
  | SniffFailedEvent;

export type EventType = DomainEvent['type'];

/** Narrow `DomainEvent` to the payload of one event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
