import { isUtf8 } from 'node:buffer';

/** One line of the sample, without its terminator. */
export interface SampleLine {
  readonly text: string;
  /** Length of the line in sample bytes (terminator excluded). */
  readonly byteLength: number;
}

/** A bounded, already materialised sample decoded into lines. */
export interface Sample {
  readonly byteLength: number;
  readonly isUtf8: boolean;
  readonly lines: readonly SampleLine[];
}

const LINE_BREAK = /\r\n|\n|\r/;
const BOM = '\uFEFF';

/**
 * Decode raw sample bytes into lines.
 *
 * Invalid UTF-8 does not abort: the bytes are decoded one-to-one (latin1) so the
 * byte-level heuristics downstream still see every delimiter and quote.
 */
export function decodeSample(data: string | Uint8Array): Sample {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  const utf8 = isUtf8(bytes);
  const encoding: BufferEncoding = utf8 ? 'utf-8' : 'latin1';

  let text = bytes.toString(encoding);
  if (utf8 && text.startsWith(BOM)) text = text.slice(BOM.length);

  const parts = text.split(LINE_BREAK);
  if (parts.length > 0 && parts[parts.length - 1] === '') parts.pop();

  return {
    byteLength: bytes.length,
    isUtf8: utf8,
    lines: parts.map((line) => ({ text: line, byteLength: Buffer.byteLength(line, encoding) })),
  };
}

/** A line holding nothing but whitespace. */
export function isBlankLine(line: string): boolean {
  return line.trim() === '';
}

/**
 * Drop a trailing partial line from a truncated sample, so a record cut short
 * (or a multibyte character split in two) never reaches the heuristics.
 * Returns the input unchanged when it holds no line break at all.
 */
export function dropPartialLine(bytes: Uint8Array): Uint8Array {
  for (let i = bytes.length - 1; i >= 0; i--) {
    const byte = bytes[i];
    if (byte === 0x0a || byte === 0x0d) return bytes.subarray(0, i + 1);
  }
  return bytes;
}
