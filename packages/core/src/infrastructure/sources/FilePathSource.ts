import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import { readFile } from 'node:fs/promises';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams raw bytes from a local file path. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }

  async sample(maxBytes?: number): Promise<Buffer> {
    if (maxBytes === undefined) return readFile(this.filePath);
    if (maxBytes <= 0) return Buffer.alloc(0);

    const chunks: Buffer[] = [];
    const stream = createReadStream(this.filePath, { start: 0, end: maxBytes - 1 });
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }

    return Buffer.concat(chunks);
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
      mimeType: detectMimeType(this.filePath),
    };
  }
}
