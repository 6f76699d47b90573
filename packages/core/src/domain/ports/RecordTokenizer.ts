import type { TokenizerDialect } from '../model/Dialect.js';

/**
 * Port for the record tokenizer the sniffer configures.
 *
 * Turns text into records honouring the dialect's quoting, escaping and
 * comments. Empty lines are skipped. The sniffer only uses it to get
 * quote-aware rows once the delimiter and quote are known.
 */
export interface RecordTokenizer {
  tokenize(text: string, dialect: TokenizerDialect): string[][];
}
