// Main entry point
export { DialectReader } from './DialectReader.js';
export type { DialectReaderOptions } from './DialectReader.js';

// Domain model
export type { CsvRecord } from './domain/model/CsvRecord.js';

// Domain services
export { snipPreamble } from './domain/services/snipPreamble.js';
export { formatDialect, formatMetadata, printable } from './domain/services/formatReport.js';
