import { extname } from 'node:path';

const DELIMITED_TEXT_TYPES: Readonly<Record<string, string>> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.tab': 'text/tab-separated-values',
};

/** MIME type of a delimited-text file, by extension. Anything else is `text/plain`. */
export function detectMimeType(fileNameOrPath: string): string {
  return DELIMITED_TEXT_TYPES[extname(fileNameOrPath).toLowerCase()] ?? 'text/plain';
}
