import { Command, InvalidArgumentError, Option } from 'commander';
import type { Logger } from 'pino';
import type { DomainEvent } from '@csv-dialect/core';
import { Sniffer } from '@csv-dialect/core';
import { formatMetadata } from '@csv-dialect/reader';
import { LOG_LEVELS } from '../logger.js';

/** Where the command writes. */
export interface CliIo {
  /** Standard output: the report or the JSON document. */
  readonly write: (text: string) => void;
  /** Diagnostics. The command adjusts its level from `--log-level`. */
  readonly logger: Logger;
}

interface SniffCommandOptions {
  readonly sampleBytes?: number;
  readonly maxRows?: number;
  readonly delimiters?: string[];
  readonly delimiter?: string;
  readonly discoverDelimiters?: boolean;
  readonly json?: boolean;
  readonly logLevel: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/** `",;\t"` as typed on a shell: a literal backslash-t stands for tab. */
function parseDelimiterList(value: string): string[] {
  const characters = [...value.replaceAll('\\t', '\t')];
  if (characters.length === 0) {
    throw new InvalidArgumentError('At least one delimiter is required.');
  }
  return characters;
}

function parseDelimiter(value: string): string {
  const [delimiter, ...rest] = parseDelimiterList(value);
  if (delimiter === undefined || rest.length > 0) {
    throw new InvalidArgumentError('Exactly one character is required.');
  }
  return delimiter;
}

function logEvent(logger: Logger, event: DomainEvent): void {
  switch (event.type) {
    case 'sniff:started':
      logger.debug({ sampleBytes: event.sampleBytes }, 'sniffing sample');
      break;
    case 'sniff:preamble':
      logger.debug({ numPreambleRows: event.numPreambleRows }, 'preamble detected');
      break;
    case 'sniff:delimiters':
      logger.debug(
        {
          delimiter: event.delimiter,
          candidates: event.candidates.map(({ delimiter, score, modalFieldCount }) => ({
            delimiter,
            score,
            modalFieldCount,
          })),
        },
        'delimiters scored',
      );
      break;
    case 'sniff:completed':
      logger.debug(
        { durationMs: event.durationMs, delimiter: event.metadata.dialect.delimiter, numFields: event.metadata.numFields },
        'sniff completed',
      );
      break;
    case 'sniff:failed':
      logger.debug({ code: event.code }, 'sniff failed');
      break;
  }
}

/** The `csv-dialect <file>` command. Errors are left to the caller. */
export function createProgram(io: CliIo): Command {
  return new Command('csv-dialect')
    .description('Infer the dialect, header and column types of a delimited text file')
    .argument('<file>', 'file to sniff')
    .option('--sample-bytes <n>', 'bytes read before sniffing (default: 65536)', parsePositiveInt)
    .option('--max-rows <n>', 'structural lines examined (default: 100)', parsePositiveInt)
    .option('--delimiters <chars>', 'candidate delimiters, e.g. ",;|\\t"', parseDelimiterList)
    .option('--delimiter <char>', 'known delimiter; skips delimiter inference', parseDelimiter)
    .option('--discover-delimiters', 'also try punctuation that occurs equally often on every line')
    .option('--json', 'print the metadata as JSON')
    .addOption(new Option('--log-level <level>', 'diagnostics written to stderr').choices(LOG_LEVELS).default('warn'))
    .action(async (file: string, options: SniffCommandOptions) => {
      io.logger.level = options.logLevel;

      const sniffer = new Sniffer(
        {
          sampleBytes: options.sampleBytes,
          maxRows: options.maxRows,
          delimiters: options.delimiters,
          discoverDelimiters: options.discoverDelimiters,
          hints: { delimiter: options.delimiter },
        },
        { onHandlerError: (error, event) => io.logger.warn({ err: error, event: event.type }, 'event listener failed') },
      );
      sniffer.onAny((event) => logEvent(io.logger, event));

      const metadata = await sniffer.sniffPath(file);
      io.write(options.json ? `${JSON.stringify(metadata, null, 2)}\n` : `${formatMetadata(metadata)}\n`);
    });
}
