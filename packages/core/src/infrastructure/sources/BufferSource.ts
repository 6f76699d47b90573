import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over content already held in memory. Strings are stored as UTF-8. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Uint8Array, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data);
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: this.content.length,
      mimeType: metadata?.mimeType ?? 'text/plain',
    };
  }

  async *read(): AsyncIterable<Buffer> {
    yield await Promise.resolve(this.content);
  }

  sample(maxBytes?: number): Promise<Buffer> {
    if (maxBytes !== undefined && maxBytes < this.content.length) {
      return Promise.resolve(this.content.subarray(0, maxBytes));
    }
    return Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
