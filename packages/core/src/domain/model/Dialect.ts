/** Whether the data has a label row, and how many lines precede it (or the first data row). */
export interface Header {
  /** `true` when the first structural row holds column labels. */
  readonly hasHeaderRow: boolean;
  /** Lines to discard before the header row (or the first data row). Never part of the table. */
  readonly numPreambleRows: number;
}

/** Record quoting convention. */
export type Quote =
  | { readonly kind: 'none' }
  | {
      readonly kind: 'some';
      /** Single-byte quote character. */
      readonly character: string;
      /** When `true`, a doubled quote inside a quoted field is a literal quote. */
      readonly doubleQuote: boolean;
    };

/** Escape character inside quoted fields, or disabled. */
export type Escape = { readonly kind: 'disabled' } | { readonly kind: 'enabled'; readonly character: string };

/** Line comment character, or disabled. */
export type Comment = { readonly kind: 'disabled' } | { readonly kind: 'enabled'; readonly character: string };

export const Quote = {
  none(): Quote {
    return NO_QUOTE;
  },
  some(character: string, doubleQuote = true): Quote {
    const quote: Quote = { kind: 'some', character, doubleQuote };
    return Object.freeze(quote);
  },
} as const;

export const Escape = {
  disabled(): Escape {
    return ESCAPE_DISABLED;
  },
  enabled(character: string): Escape {
    const escape: Escape = { kind: 'enabled', character };
    return Object.freeze(escape);
  },
} as const;

export const Comment = {
  disabled(): Comment {
    return COMMENT_DISABLED;
  },
  enabled(character: string): Comment {
    const comment: Comment = { kind: 'enabled', character };
    return Object.freeze(comment);
  },
} as const;

const NO_QUOTE: Quote = Object.freeze<Quote>({ kind: 'none' });
const ESCAPE_DISABLED: Escape = Object.freeze<Escape>({ kind: 'disabled' });
const COMMENT_DISABLED: Comment = Object.freeze<Comment>({ kind: 'disabled' });

/**
 * Structural parsing contract for a delimited text file.
 *
 * Everything a record tokenizer needs to read the data: field separator, header
 * and preamble, quoting, escaping, comments, and whether rows may vary in width.
 */
export interface Dialect {
  /** Single-byte field separator. */
  readonly delimiter: string;
  readonly header: Header;
  readonly quote: Quote;
  readonly escape: Escape;
  readonly comment: Comment;
  /** When `true`, records may have different field counts. */
  readonly flexible: boolean;
  /** Whether the sample validated as well-formed UTF-8. */
  readonly isUtf8: boolean;
}

/** Dialect facts that drive tokenization (no header or encoding information). */
export type TokenizerDialect = Pick<Dialect, 'delimiter' | 'quote' | 'escape' | 'comment'>;

/** Build a frozen `Dialect`. */
export function createDialect(dialect: Dialect): Dialect {
  return Object.freeze({ ...dialect, header: Object.freeze({ ...dialect.header }) });
}

/** Character of an enabled quote/escape/comment setting, or `undefined` when disabled. */
export function characterOf(setting: Quote | Escape | Comment): string | undefined {
  return setting.kind === 'some' || setting.kind === 'enabled' ? setting.character : undefined;
}

function quoteEquals(a: Quote, b: Quote): boolean {
  if (a.kind === 'none' || b.kind === 'none') return a.kind === b.kind;
  return a.character === b.character && a.doubleQuote === b.doubleQuote;
}

/** Structural equality over every dialect field. */
export function dialectEquals(a: Dialect, b: Dialect): boolean {
  return (
    a.delimiter === b.delimiter &&
    a.header.hasHeaderRow === b.header.hasHeaderRow &&
    a.header.numPreambleRows === b.header.numPreambleRows &&
    quoteEquals(a.quote, b.quote) &&
    a.escape.kind === b.escape.kind &&
    characterOf(a.escape) === characterOf(b.escape) &&
    a.comment.kind === b.comment.kind &&
    characterOf(a.comment) === characterOf(b.comment) &&
    a.flexible === b.flexible &&
    a.isUtf8 === b.isUtf8
  );
}
