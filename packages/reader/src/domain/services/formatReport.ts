import type { Comment, Dialect, Escape, Metadata, Quote } from '@csv-dialect/core';

const PRINTABLE: Readonly<Record<string, string>> = {
  '\t': '\\t',
  ' ': 'space',
};

/** A character as it should appear in a report. */
export function printable(character: string): string {
  return PRINTABLE[character] ?? character;
}

function describeQuote(quote: Quote): string {
  return quote.kind === 'some' ? printable(quote.character) : 'none';
}

function describeSetting(setting: Escape | Comment): string {
  return setting.kind === 'enabled' ? printable(setting.character) : 'none';
}

/** Multi-line summary of a dialect, one tab-indented fact per line. */
export function formatDialect(dialect: Dialect): string {
  const lines = [
    'Dialect:',
    `\tDelimiter: ${printable(dialect.delimiter)}`,
    `\tHas header row?: ${String(dialect.header.hasHeaderRow)}`,
    `\tNumber of preamble rows: ${String(dialect.header.numPreambleRows)}`,
    `\tQuote character: ${describeQuote(dialect.quote)}`,
  ];
  if (dialect.quote.kind === 'some') {
    lines.push(`\tDoubled quotes?: ${String(dialect.quote.doubleQuote)}`);
  }
  lines.push(
    `\tEscape character: ${describeSetting(dialect.escape)}`,
    `\tComment character: ${describeSetting(dialect.comment)}`,
    `\tFlexible: ${String(dialect.flexible)}`,
    `\tIs utf-8 encoded?: ${String(dialect.isUtf8)}`,
  );

  return lines.join('\n');
}

/**
 * Full sniffing report: the dialect, record statistics, then one
 * `index: type name` line per column with the columns aligned.
 */
export function formatMetadata(metadata: Metadata): string {
  const indexWidth = `${String(Math.max(0, metadata.numFields - 1))}:`.length;
  const typeWidth = Math.max(0, ...metadata.types.map((type) => type.length));

  const columns = metadata.types.map((type, i) => {
    const index = `${String(i)}:`.padEnd(indexWidth);
    return `\t${index}  ${type.padEnd(typeWidth)}  ${metadata.fields[i] ?? ''}`;
  });

  return [
    'Metadata',
    '========',
    formatDialect(metadata.dialect),
    `Average record length (bytes): ${String(metadata.avgRecordLen)}`,
    `Number of fields: ${String(metadata.numFields)}`,
    'Fields:',
    ...columns,
  ].join('\n');
}
