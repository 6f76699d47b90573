/** One data record read with a dialect. */
export interface CsvRecord {
  /** Position among the data records (header and preamble excluded), from 0. */
  readonly index: number;
  /** Field values in column order. */
  readonly fields: readonly string[];
  /** Field values keyed by column name. */
  readonly values: Readonly<Record<string, string>>;
}
