import type { ColumnType } from './ColumnType.js';
import type { Dialect } from './Dialect.js';

/**
 * Result of sniffing a sample: the dialect plus the inferred column schema.
 *
 * `fields` and `types` are parallel and both have `numFields` entries.
 */
export interface Metadata {
  readonly dialect: Dialect;
  /** Mean byte length of the examined records, rounded down. Informational. */
  readonly avgRecordLen: number;
  /** Widest record seen in the sample. */
  readonly numFields: number;
  /** Column names, from the header row or synthesised (`field 0`, `field 1`, ...). */
  readonly fields: readonly string[];
  /** Inferred type per column. */
  readonly types: readonly ColumnType[];
}

/** Placeholder name for column `index` when the data carries no label for it. */
export function syntheticFieldName(index: number): string {
  return `field ${String(index)}`;
}
