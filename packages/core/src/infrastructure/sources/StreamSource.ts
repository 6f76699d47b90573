import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** MIME type for metadata. Default: 'text/plain'. */
  readonly mimeType?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

type ByteChunk = string | Uint8Array;

/**
 * Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. an upload.
 *
 * A stream can be consumed once: sampling it consumes it too, so sniff first and
 * hand the reader a fresh source afterwards.
 */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
      mimeType: options?.mimeType ?? 'text/plain',
    };
  }

  async *read(): AsyncIterable<Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = isReadableStream(this.stream) ? fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk);
    }
  }

  async sample(maxBytes?: number): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of this.read()) {
      chunks.push(chunk);
      totalBytes += chunk.length;

      if (maxBytes !== undefined && totalBytes >= maxBytes) {
        return Buffer.concat(chunks).subarray(0, maxBytes);
      }
    }

    return Buffer.concat(chunks);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}

function isReadableStream(
  stream: AsyncIterable<ByteChunk> | ReadableStream<ByteChunk>,
): stream is ReadableStream<ByteChunk> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

async function* fromReadableStream(stream: ReadableStream<ByteChunk>): AsyncIterable<ByteChunk> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
