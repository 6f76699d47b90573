#!/usr/bin/env node
import { createProgram } from './commands/sniff.js';
import { createLogger } from './logger.js';

const logger = createLogger('warn');
const program = createProgram({ write: (text) => process.stdout.write(text), logger });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ err: error }, error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
