/**
 * Closed lattice of column value classifications, from most to least specific.
 *
 * ```
 *            Text
 *          /      \
 *       Float    DateTime
 *         |         |
 *      Integer     Date
 *         |         |
 *      Boolean      |
 *          \       /
 *            Null
 * ```
 *
 * `Null` is the empty value: it carries no information and joins to whatever it
 * meets. `Text` absorbs everything.
 */
export const ColumnType = {
  NULL: 'Null',
  BOOLEAN: 'Boolean',
  INTEGER: 'Integer',
  FLOAT: 'Float',
  DATE: 'Date',
  DATETIME: 'DateTime',
  TEXT: 'Text',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

const { NULL, BOOLEAN, INTEGER, FLOAT, DATE, DATETIME, TEXT } = ColumnType;

const JOIN_TABLE: Record<ColumnType, Record<ColumnType, ColumnType>> = {
  [NULL]: {
    [NULL]: NULL,
    [BOOLEAN]: BOOLEAN,
    [INTEGER]: INTEGER,
    [FLOAT]: FLOAT,
    [DATE]: DATE,
    [DATETIME]: DATETIME,
    [TEXT]: TEXT,
  },
  [BOOLEAN]: {
    [NULL]: BOOLEAN,
    [BOOLEAN]: BOOLEAN,
    [INTEGER]: INTEGER,
    [FLOAT]: FLOAT,
    [DATE]: TEXT,
    [DATETIME]: TEXT,
    [TEXT]: TEXT,
  },
  [INTEGER]: {
    [NULL]: INTEGER,
    [BOOLEAN]: INTEGER,
    [INTEGER]: INTEGER,
    [FLOAT]: FLOAT,
    [DATE]: TEXT,
    [DATETIME]: TEXT,
    [TEXT]: TEXT,
  },
  [FLOAT]: {
    [NULL]: FLOAT,
    [BOOLEAN]: FLOAT,
    [INTEGER]: FLOAT,
    [FLOAT]: FLOAT,
    [DATE]: TEXT,
    [DATETIME]: TEXT,
    [TEXT]: TEXT,
  },
  [DATE]: {
    [NULL]: DATE,
    [BOOLEAN]: TEXT,
    [INTEGER]: TEXT,
    [FLOAT]: TEXT,
    [DATE]: DATE,
    [DATETIME]: DATETIME,
    [TEXT]: TEXT,
  },
  [DATETIME]: {
    [NULL]: DATETIME,
    [BOOLEAN]: TEXT,
    [INTEGER]: TEXT,
    [FLOAT]: TEXT,
    [DATE]: DATETIME,
    [DATETIME]: DATETIME,
    [TEXT]: TEXT,
  },
  [TEXT]: {
    [NULL]: TEXT,
    [BOOLEAN]: TEXT,
    [INTEGER]: TEXT,
    [FLOAT]: TEXT,
    [DATE]: TEXT,
    [DATETIME]: TEXT,
    [TEXT]: TEXT,
  },
};

/** Most specific type that accommodates values of both `a` and `b`. */
export function joinTypes(a: ColumnType, b: ColumnType): ColumnType {
  return JOIN_TABLE[a][b];
}

/** Fold `joinTypes` over a sequence. An empty sequence joins to `Null`. */
export function joinAll(types: Iterable<ColumnType>): ColumnType {
  let result: ColumnType = NULL;
  for (const type of types) {
    result = joinTypes(result, type);
    if (result === TEXT) break;
  }
  return result;
}

/** Whether every value of type `narrow` is also a value of type `wide`. */
export function isAccommodatedBy(narrow: ColumnType, wide: ColumnType): boolean {
  return joinTypes(narrow, wide) === wide;
}
