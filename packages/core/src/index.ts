// Main entry point
export { Sniffer } from './Sniffer.js';
export type { SnifferDependencies } from './Sniffer.js';

// Configuration
export type { SnifferConfig, SniffSettings, DialectHints } from './application/SniffSettings.js';
export {
  resolveSettings,
  DEFAULT_DELIMITERS,
  DEFAULT_QUOTE_CANDIDATES,
  DEFAULT_COMMENT_CANDIDATES,
  DEFAULT_MIN_CONFIDENCE,
} from './application/SniffSettings.js';

// Domain model
export type { Metadata } from './domain/model/Metadata.js';
export { syntheticFieldName } from './domain/model/Metadata.js';
export type { Dialect, Header, TokenizerDialect } from './domain/model/Dialect.js';
export { Quote, Escape, Comment, createDialect, dialectEquals, characterOf } from './domain/model/Dialect.js';
export { ColumnType, joinTypes, joinAll, isAccommodatedBy } from './domain/model/ColumnType.js';
export type { Sample, SampleLine } from './domain/model/Sample.js';
export { decodeSample, dropPartialLine, isBlankLine } from './domain/model/Sample.js';

// Domain services (for building custom pipelines)
export { PreambleSkipper } from './domain/services/PreambleSkipper.js';
export type { PreambleSkipperOptions } from './domain/services/PreambleSkipper.js';
export { DelimiterInferrer, isRealSplit } from './domain/services/DelimiterInferrer.js';
export type { DelimiterScore, DelimiterInferrerOptions } from './domain/services/DelimiterInferrer.js';
export { QuoteDetector } from './domain/services/QuoteDetector.js';
export type { QuoteDetection } from './domain/services/QuoteDetector.js';
export { CommentDetector, withoutComments } from './domain/services/CommentDetector.js';
export { HeaderDetector } from './domain/services/HeaderDetector.js';
export { TypeInferrer, collectColumns } from './domain/services/TypeInferrer.js';
export type { DatePreference } from './domain/services/TypeInferrer.js';
export { MetadataAssembler } from './domain/services/MetadataAssembler.js';
export type { AssemblyInput } from './domain/services/MetadataAssembler.js';
export { splitFields, countFields } from './domain/services/splitFields.js';

// Errors
export {
  CsvDialectError,
  SampleReadError,
  InsufficientSampleError,
  NoConsistentDelimiterError,
  InvalidSnifferConfigError,
  RaggedRecordError,
} from './domain/errors/CsvDialectError.js';
export type { CsvDialectErrorCode, CandidateScoreSummary } from './domain/errors/CsvDialectError.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SniffStartedEvent,
  PreambleDetectedEvent,
  DelimitersScoredEvent,
  SniffCompletedEvent,
  SniffFailedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordTokenizer } from './domain/ports/RecordTokenizer.js';

// Infrastructure adapters (built-in sources and tokenizer)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { PapaRecordTokenizer, toPapaConfig } from './infrastructure/tokenizer/PapaRecordTokenizer.js';
export { detectMimeType } from './infrastructure/detectMimeType.js';
