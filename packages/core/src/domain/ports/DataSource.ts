/** Metadata about the data source (optional, for logging and content-type detection). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading data from any origin (file, buffer, stream).
 *
 * Sources deal in raw bytes: the sniffer has to see the sample exactly as stored
 * to decide whether it is valid UTF-8. `sample()` takes `maxBytes` (not a record
 * count) because record boundaries are unknown until the dialect is.
 */
export interface DataSource {
  /** Yield the content as raw byte chunks. */
  read(): AsyncIterable<Buffer>;
  /** Return the first `maxBytes` bytes (all of them when omitted). */
  sample(maxBytes?: number): Promise<Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}
