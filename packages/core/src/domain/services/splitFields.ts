/**
 * Split a single line into raw fields. Quote characters are kept in the output.
 *
 * With a `quote` character, delimiters between an opening and a closing quote do
 * not split; a doubled quote toggles twice and so leaves the state unchanged.
 * Without one, every delimiter splits.
 */
export function splitFields(line: string, delimiter: string, quote?: string): string[] {
  if (quote === undefined || !line.includes(quote)) return line.split(delimiter);

  const fields: string[] = [];
  let start = 0;
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === quote) {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      fields.push(line.slice(start, i));
      start = i + 1;
    }
  }
  fields.push(line.slice(start));

  return fields;
}

/** Number of fields `line` splits into. */
export function countFields(line: string, delimiter: string, quote?: string): number {
  return splitFields(line, delimiter, quote).length;
}
