import Papa from 'papaparse';
import type { ParseConfig } from 'papaparse';
import type { RecordTokenizer } from '../../domain/ports/RecordTokenizer.js';
import type { TokenizerDialect } from '../../domain/model/Dialect.js';
import { characterOf } from '../../domain/model/Dialect.js';

// Never found in text, so PapaParse sees no escapes at all.
const NO_ESCAPE = '\u0000';

/**
 * Translate a dialect into PapaParse options.
 *
 * PapaParse cannot switch quoting off; with no quote character it runs in fast
 * mode, which splits on the delimiter without looking for quotes. A doubled
 * quote is read as a literal quote only when the dialect says so: PapaParse does
 * that whenever the escape character is the quote character.
 */
export function toPapaConfig(dialect: TokenizerDialect): ParseConfig<string[]> {
  const quoteChar = characterOf(dialect.quote);
  const doubleQuote = dialect.quote.kind === 'some' && dialect.quote.doubleQuote;
  const escapeChar = characterOf(dialect.escape) ?? (doubleQuote ? quoteChar : NO_ESCAPE);
  const comments = characterOf(dialect.comment) ?? false;

  return {
    delimiter: dialect.delimiter,
    header: false,
    dynamicTyping: false,
    skipEmptyLines: true,
    comments,
    ...(quoteChar === undefined ? { fastMode: true } : { quoteChar, escapeChar, fastMode: false }),
  };
}

/** Record tokenizer adapter using PapaParse. */
export class PapaRecordTokenizer implements RecordTokenizer {
  tokenize(text: string, dialect: TokenizerDialect): string[][] {
    if (text === '') return [];
    const result = Papa.parse<string[]>(text, toPapaConfig(dialect));
    return result.data;
  }
}
