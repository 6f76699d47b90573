const LINE_BREAK = /\r\n|\n|\r/g;

/**
 * Remove the first `numPreambleRows` lines from `text`.
 *
 * Lines end at CR LF, LF or a lone CR, the same way the sniffer counts them.
 * Text with fewer lines than that is snipped entirely.
 */
export function snipPreamble(text: string, numPreambleRows: number): string {
  if (numPreambleRows <= 0) return text;

  const lineBreak = new RegExp(LINE_BREAK);
  let snipped = 0;
  for (let match = lineBreak.exec(text); match !== null; match = lineBreak.exec(text)) {
    snipped++;
    if (snipped === numPreambleRows) return text.slice(match.index + match[0].length);
  }

  return '';
}
