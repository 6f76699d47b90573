import type { Metadata } from '../../domain/model/Metadata.js';
import type { Quote } from '../../domain/model/Dialect.js';
import type { SampleLine } from '../../domain/model/Sample.js';
import type { RecordTokenizer } from '../../domain/ports/RecordTokenizer.js';
import type { DelimiterScore } from '../../domain/services/DelimiterInferrer.js';
import type { QuoteDetection } from '../../domain/services/QuoteDetector.js';
import type { EventBus } from '../EventBus.js';
import type { SniffSettings } from '../SniffSettings.js';
import { characterOf, createDialect } from '../../domain/model/Dialect.js';
import { decodeSample, isBlankLine } from '../../domain/model/Sample.js';
import { CsvDialectError, InsufficientSampleError, NoConsistentDelimiterError } from '../../domain/errors/CsvDialectError.js';
import { PreambleSkipper } from '../../domain/services/PreambleSkipper.js';
import { DelimiterInferrer } from '../../domain/services/DelimiterInferrer.js';
import { QuoteDetector } from '../../domain/services/QuoteDetector.js';
import { CommentDetector, withoutComments } from '../../domain/services/CommentDetector.js';
import { HeaderDetector } from '../../domain/services/HeaderDetector.js';
import { TypeInferrer } from '../../domain/services/TypeInferrer.js';
import { MetadataAssembler } from '../../domain/services/MetadataAssembler.js';

/**
 * Use case: infer `Metadata` from a materialised sample.
 *
 * Pipeline: decode -> preamble -> delimiter ranking -> quote/escape -> comments
 * -> quote-aware tokenization -> flexible -> header -> column types -> assembly.
 * Pure apart from the events it emits: the same sample always yields an equal result.
 */
export class SniffSample {
  private readonly preamble: PreambleSkipper;
  private readonly delimiters: DelimiterInferrer;
  private readonly quotes: QuoteDetector;
  private readonly comments: CommentDetector;
  private readonly header: HeaderDetector;
  private readonly assembler: MetadataAssembler;

  constructor(
    private readonly settings: SniffSettings,
    private readonly tokenizer: RecordTokenizer,
    private readonly eventBus: EventBus,
  ) {
    const types = new TypeInferrer(settings.datePreference);
    const delimiters = settings.hints.delimiter !== undefined ? [settings.hints.delimiter] : settings.delimiters;

    this.preamble = new PreambleSkipper({
      delimiters,
      quoteCandidates: settings.quoteCandidates,
      maxPreambleRows: settings.maxPreambleRows,
      lookahead: settings.preambleLookahead,
    });
    this.delimiters = new DelimiterInferrer({
      delimiters,
      quoteCandidates: settings.quoteCandidates,
      discoverDelimiters: settings.hints.delimiter === undefined && settings.discoverDelimiters,
    });
    this.quotes = new QuoteDetector(settings.quoteCandidates);
    this.comments = new CommentDetector(settings.commentCandidates);
    this.header = new HeaderDetector(types);
    this.assembler = new MetadataAssembler(types);
  }

  execute(data: string | Uint8Array): Metadata {
    const startedAt = Date.now();
    try {
      const metadata = this.infer(data);
      this.eventBus.emit({
        type: 'sniff:completed',
        metadata,
        durationMs: Date.now() - startedAt,
        timestamp: Date.now(),
      });
      return metadata;
    } catch (error) {
      this.eventBus.emit({
        type: 'sniff:failed',
        code: error instanceof CsvDialectError ? error.code : 'UNKNOWN',
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private infer(data: string | Uint8Array): Metadata {
    const sample = decodeSample(data);
    this.eventBus.emit({ type: 'sniff:started', sampleBytes: sample.byteLength, timestamp: Date.now() });

    if (sample.byteLength === 0) throw new InsufficientSampleError('the sample is empty');
    const lines = sample.lines.map((line) => line.text);
    if (lines.every(isBlankLine)) throw new InsufficientSampleError('the sample holds only blank lines');

    const numPreambleRows = this.settings.hints.numPreambleRows ?? this.preamble.skip(lines);
    this.eventBus.emit({ type: 'sniff:preamble', numPreambleRows, timestamp: Date.now() });

    const structural = sample.lines
      .slice(numPreambleRows)
      .filter((line) => !isBlankLine(line.text))
      .slice(0, this.settings.maxRows);
    if (structural.length === 0) throw new InsufficientSampleError('no rows follow the preamble');
    const texts = structural.map((line) => line.text);

    const best = this.chooseDelimiter(texts);
    const { delimiter } = best;

    const { quote, escape } = this.detectQuote(texts, delimiter);
    const comment = this.comments.detect(texts, delimiter, best.modalFieldCount, characterOf(quote));

    const kept = new Set(withoutComments(texts, comment));
    const tableLines: SampleLine[] = structural.filter((line) => kept.has(line.text));
    const rows = this.tokenizer.tokenize(tableLines.map((line) => line.text).join('\n'), {
      delimiter,
      quote,
      escape,
      comment,
    });
    if (rows.length === 0) throw new InsufficientSampleError('no records could be read');

    const flexible = new Set(rows.map((row) => row.length)).size > 1;
    const hasHeaderRow = this.settings.hints.hasHeader ?? this.header.detect(rows);

    const dialect = createDialect({
      delimiter,
      header: { hasHeaderRow, numPreambleRows },
      quote,
      escape,
      comment,
      flexible,
      isUtf8: sample.isUtf8,
    });

    return this.assembler.assemble({
      dialect,
      rows,
      lineByteLengths: tableLines.map((line) => line.byteLength),
    });
  }

  private chooseDelimiter(lines: readonly string[]): DelimiterScore {
    const ranked = this.delimiters.rank(lines);
    const best = ranked[0];

    if (best === undefined || best.score < this.settings.minConfidence) {
      throw new NoConsistentDelimiterError(ranked, this.settings.minConfidence);
    }

    this.eventBus.emit({
      type: 'sniff:delimiters',
      candidates: ranked,
      delimiter: best.delimiter,
      timestamp: Date.now(),
    });
    return best;
  }

  private detectQuote(lines: readonly string[], delimiter: string): QuoteDetection {
    const hint: Quote | undefined = this.settings.hints.quote;
    if (hint === undefined) return this.quotes.detect(lines, delimiter);

    // A known quote character still gets its escape convention detected.
    const character = characterOf(hint);
    const detected = new QuoteDetector(character === undefined ? [] : [character]).detect(lines, delimiter);
    return { quote: hint, escape: detected.escape };
  }
}
