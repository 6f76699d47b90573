import type { Metadata } from '../../domain/model/Metadata.js';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import type { EventBus } from '../EventBus.js';
import type { SniffSample } from './SniffSample.js';
import { dropPartialLine } from '../../domain/model/Sample.js';
import { SampleReadError } from '../../domain/errors/CsvDialectError.js';

/** Use case: materialise a bounded sample from a source, then sniff it. */
export class SniffSource {
  constructor(
    private readonly sniffSample: SniffSample,
    private readonly sampleBytes: number,
    private readonly eventBus: EventBus,
  ) {}

  async execute(source: DataSource): Promise<Metadata> {
    const bytes = await this.acquire(source);

    // One byte past the limit tells a cut sample from a source of exactly `sampleBytes`.
    // A cut sample ends mid-record; only its whole lines are sniffed.
    if (bytes.length <= this.sampleBytes) return this.sniffSample.execute(bytes);
    return this.sniffSample.execute(dropPartialLine(bytes.subarray(0, this.sampleBytes)));
  }

  private async acquire(source: DataSource): Promise<Buffer> {
    let meta: SourceMetadata = {};
    try {
      meta = source.metadata();
      return await source.sample(this.sampleBytes + 1);
    } catch (cause) {
      const error = new SampleReadError(meta.fileName ?? 'data source', cause);
      this.eventBus.emit({ type: 'sniff:failed', code: error.code, error: error.message, timestamp: Date.now() });
      throw error;
    }
  }
}
