import { isUtf8 } from 'node:buffer';
import Papa from 'papaparse';
import type { Dialect, DataSource, Metadata } from '@csv-dialect/core';
import { FilePathSource, RaggedRecordError, syntheticFieldName, toPapaConfig } from '@csv-dialect/core';
import type { CsvRecord } from './domain/model/CsvRecord.js';
import { snipPreamble } from './domain/services/snipPreamble.js';

const BOM = '\uFEFF';

/** Options for `DialectReader.fromDialect()`. */
export interface DialectReaderOptions {
  /**
   * Column names used when the data has no header row.
   * Default: `field 0`, `field 1`, ...
   */
  readonly fieldNames?: readonly string[];
}

/**
 * Reads delimited text with a known (usually sniffed) dialect.
 *
 * Preamble lines are snipped, the header row (when the dialect has one) names
 * the columns, and every remaining record is yielded in order. A record whose
 * width differs from the table's throws `RaggedRecordError` unless the dialect
 * is flexible.
 *
 * @example
 * ```typescript
 * const metadata = await new Sniffer().sniffPath('orders.csv');
 * for await (const record of DialectReader.fromMetadata(metadata).openPath('orders.csv')) {
 *   console.log(record.values.id);
 * }
 * ```
 */
export class DialectReader {
  private constructor(
    readonly dialect: Dialect,
    private readonly fieldNames: readonly string[],
  ) {}

  static fromDialect(dialect: Dialect, options?: DialectReaderOptions): DialectReader {
    return new DialectReader(dialect, options?.fieldNames ?? []);
  }

  /** Reader for the dialect in `metadata`, naming headerless columns after `metadata.fields`. */
  static fromMetadata(metadata: Metadata): DialectReader {
    return new DialectReader(metadata.dialect, metadata.dialect.header.hasHeaderRow ? [] : metadata.fields);
  }

  /** Read every record of an in-memory document. */
  *parse(data: string | Uint8Array): Iterable<CsvRecord> {
    const text = snipPreamble(decode(data), this.dialect.header.numPreambleRows);
    if (text.trim() === '') return;

    const rows = Papa.parse<string[]>(text, toPapaConfig(this.dialect)).data;
    const [first] = rows;
    if (first === undefined) return;

    const hasHeaderRow = this.dialect.header.hasHeaderRow;
    const names = hasHeaderRow ? first.map((label, i) => (label.trim() === '' ? syntheticFieldName(i) : label)) : [];
    const dataRows = hasHeaderRow ? rows.slice(1) : rows;
    const width = first.length;

    for (const [index, fields] of dataRows.entries()) {
      if (!this.dialect.flexible && fields.length !== width) {
        throw new RaggedRecordError(index, width, fields.length);
      }
      yield { index, fields, values: this.valuesOf(fields, names) };
    }
  }

  /** Read every record of a source. The whole source is read before the first record is yielded. */
  async *readSource(source: DataSource): AsyncIterable<CsvRecord> {
    const chunks: Buffer[] = [];
    for await (const chunk of source.read()) {
      chunks.push(chunk);
    }

    yield* this.parse(Buffer.concat(chunks));
  }

  /** Read every record of a local file. */
  openPath(filePath: string): AsyncIterable<CsvRecord> {
    return this.readSource(new FilePathSource(filePath));
  }

  private valuesOf(fields: readonly string[], headerNames: readonly string[]): Record<string, string> {
    const values: Record<string, string> = {};
    fields.forEach((value, i) => {
      values[headerNames[i] ?? this.fieldNames[i] ?? syntheticFieldName(i)] = value;
    });
    return values;
  }
}

function decode(data: string | Uint8Array): string {
  if (typeof data === 'string') return data.startsWith(BOM) ? data.slice(BOM.length) : data;

  const bytes = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (!isUtf8(bytes)) return bytes.toString('latin1');

  const text = bytes.toString('utf-8');
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}
