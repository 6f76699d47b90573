import { describe, it, expect } from 'vitest';
import { createLogger } from '../../src/logger.js';

function capture(): { lines: string[]; write: (msg: string) => void } {
  const lines: string[] = [];
  return { lines, write: (msg) => lines.push(msg) };
}

describe('createLogger()', () => {
  it('should write JSON lines tagged with the service name', () => {
    const destination = capture();
    const logger = createLogger('info', destination);

    logger.info({ delimiter: ';' }, 'sniff completed');

    expect(destination.lines).toHaveLength(1);
    expect(JSON.parse(destination.lines[0] ?? '')).toMatchObject({
      level: 30,
      service: 'csv-dialect',
      delimiter: ';',
      msg: 'sniff completed',
    });
  });

  it('should drop messages below the level', () => {
    const destination = capture();
    const logger = createLogger('warn', destination);

    logger.debug('hidden');
    logger.info('hidden too');

    expect(destination.lines).toEqual([]);
  });
});
