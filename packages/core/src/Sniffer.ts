import type { Metadata } from './domain/model/Metadata.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RecordTokenizer } from './domain/ports/RecordTokenizer.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { SnifferConfig, SniffSettings } from './application/SniffSettings.js';
import type { HandlerErrorListener } from './application/EventBus.js';
import { EventBus } from './application/EventBus.js';
import { resolveSettings } from './application/SniffSettings.js';
import { SniffSample } from './application/usecases/SniffSample.js';
import { SniffSource } from './application/usecases/SniffSource.js';
import { PapaRecordTokenizer } from './infrastructure/tokenizer/PapaRecordTokenizer.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';

/** Collaborators a `Sniffer` can be given instead of the defaults. */
export interface SnifferDependencies {
  /** Quote-aware tokenizer. Default: `PapaRecordTokenizer`. */
  readonly tokenizer?: RecordTokenizer;
  /** Receives errors thrown by event subscribers. Default: none. */
  readonly onHandlerError?: HandlerErrorListener;
}

/**
 * Facade over the inference pipeline: sample -> preamble -> dialect -> header -> schema.
 *
 * Configuration is validated once, in the constructor. Every sniff is
 * independent; a `Sniffer` can be reused for any number of samples.
 *
 * @example
 * ```typescript
 * const sniffer = new Sniffer({ maxRows: 50 });
 * const metadata = await sniffer.sniffPath('exports/orders.csv');
 * console.log(metadata.dialect.delimiter, metadata.fields);
 * ```
 */
export class Sniffer {
  readonly settings: SniffSettings;
  private readonly eventBus: EventBus;
  private readonly sampleUseCase: SniffSample;
  private readonly sourceUseCase: SniffSource;

  constructor(config: SnifferConfig = {}, dependencies: SnifferDependencies = {}) {
    this.settings = resolveSettings(config);
    this.eventBus = new EventBus(dependencies.onHandlerError);
    this.sampleUseCase = new SniffSample(
      this.settings,
      dependencies.tokenizer ?? new PapaRecordTokenizer(),
      this.eventBus,
    );
    this.sourceUseCase = new SniffSource(this.sampleUseCase, this.settings.sampleBytes, this.eventBus);
  }

  /** Sniff an already materialised sample. Synchronous; never reads beyond `sample`. */
  sniff(sample: string | Uint8Array): Metadata {
    return this.sampleUseCase.execute(sample);
  }

  /** Read up to `sampleBytes` from `source` and sniff them. */
  sniffSource(source: DataSource): Promise<Metadata> {
    return this.sourceUseCase.execute(source);
  }

  /** Sniff the beginning of a local file. */
  sniffPath(filePath: string): Promise<Metadata> {
    return this.sniffSource(new FilePathSource(filePath));
  }

  /** Subscribe to a sniffing event. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every sniffing event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
