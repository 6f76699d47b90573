import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** JSON logger for the command line. Writes to stderr unless given a destination, so stdout stays machine-readable. */
export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'csv-dialect',
    },
  };

  return pino(options, destination ?? pino.destination(2));
}
