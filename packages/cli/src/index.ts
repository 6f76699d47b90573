export { createProgram } from './commands/sniff.js';
export type { CliIo } from './commands/sniff.js';
export { createLogger, LOG_LEVELS } from './logger.js';
