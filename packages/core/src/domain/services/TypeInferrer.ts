import { ColumnType, joinTypes } from '../model/ColumnType.js';

/** How an ambiguous `A/B/YYYY` date is read. */
export type DatePreference = 'MDY' | 'DMY';

const BOOLEAN_LITERALS = new Set(['true', 'false', 'yes', 'no', 't', 'f', 'y', 'n']);
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;
const SLASH_DATE_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Domain service that classifies raw field values and joins them into column types.
 *
 * Values are classified most-specific first: empty, boolean, integer, float,
 * date, date-time, then text. A column's type is the join of its values' types.
 */
export class TypeInferrer {
  constructor(private readonly datePreference: DatePreference = 'MDY') {}

  /** Classify a single raw value. */
  classify(value: string): ColumnType {
    const trimmed = value.trim();
    if (trimmed === '') return ColumnType.NULL;
    if (BOOLEAN_LITERALS.has(trimmed.toLowerCase())) return ColumnType.BOOLEAN;

    if (INTEGER_PATTERN.test(trimmed)) {
      // Whole numbers beyond the exactly representable range widen to Float.
      return Number.isSafeInteger(Number(trimmed)) ? ColumnType.INTEGER : ColumnType.FLOAT;
    }
    if (FLOAT_PATTERN.test(trimmed) && Number.isFinite(Number(trimmed))) return ColumnType.FLOAT;

    if (this.isDate(trimmed)) return ColumnType.DATE;
    if (isDateTime(trimmed)) return ColumnType.DATETIME;

    return ColumnType.TEXT;
  }

  /** Join of the classifications of every value. An empty or all-blank column is `Null`. */
  inferColumn(values: Iterable<string>): ColumnType {
    let type: ColumnType = ColumnType.NULL;
    for (const value of values) {
      type = joinTypes(type, this.classify(value));
      if (type === ColumnType.TEXT) break;
    }
    return type;
  }

  /** One type per column index present in `columns`. */
  infer(columns: ReadonlyMap<number, readonly string[]>): Map<number, ColumnType> {
    const types = new Map<number, ColumnType>();
    for (const [index, values] of columns) {
      types.set(index, this.inferColumn(values));
    }
    return types;
  }

  private isDate(value: string): boolean {
    const iso = ISO_DATE_PATTERN.exec(value);
    if (iso) return isValidDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

    const slash = SLASH_DATE_PATTERN.exec(value);
    if (!slash) return false;

    const first = Number(slash[1]);
    const second = Number(slash[2]);
    const year = Number(slash[3]);
    return this.datePreference === 'DMY' ? isValidDate(year, second, first) : isValidDate(year, first, second);
  }
}

/** Group row values by column index. Rows shorter than a column contribute nothing to it. */
export function collectColumns(rows: readonly (readonly string[])[], numFields: number): Map<number, string[]> {
  const columns = new Map<number, string[]>();
  for (let index = 0; index < numFields; index++) {
    columns.set(index, []);
  }

  for (const row of rows) {
    row.forEach((value, index) => {
      columns.get(index)?.push(value);
    });
  }

  return columns;
}

function isDateTime(value: string): boolean {
  const match = DATETIME_PATTERN.exec(value);
  if (!match) return false;

  const hours = Number(match[4]);
  const minutes = Number(match[5]);
  const seconds = match[6] === undefined ? 0 : Number(match[6]);
  return (
    isValidDate(Number(match[1]), Number(match[2]), Number(match[3])) && hours < 24 && minutes < 60 && seconds < 60
  );
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}
