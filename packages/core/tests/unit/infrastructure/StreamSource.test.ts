import { describe, it, expect } from 'vitest';
import { StreamSource } from '../../../src/infrastructure/sources/StreamSource.js';

function createAsyncIterable<T>(items: T[]): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]() {
      let i = 0;
      return {
        next() {
          if (i >= items.length) return Promise.resolve({ done: true as const, value: undefined });
          return Promise.resolve({ done: false as const, value: items[i++]! });
        },
      };
    },
  };
}

async function readText(source: StreamSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('StreamSource', () => {
  describe('read()', () => {
    it('should yield string chunks from AsyncIterable as bytes', async () => {
      const source = new StreamSource(createAsyncIterable(['hello', ' world']));

      const chunks: Buffer[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.map((chunk) => chunk.toString())).toEqual(['hello', ' world']);
    });

    it('should pass Buffer chunks through', async () => {
      const buffers = [Buffer.from('email,name\n'), Buffer.from('alice@test.com,Alice\n')];
      const source = new StreamSource(createAsyncIterable(buffers));

      expect(await readText(source)).toBe('email,name\nalice@test.com,Alice\n');
    });

    it('should throw when read twice', async () => {
      const source = new StreamSource(createAsyncIterable(['data']));
      await readText(source);

      await expect(readText(source)).rejects.toThrow('already been consumed');
    });
  });

  describe('sample()', () => {
    it('should return full content without maxBytes', async () => {
      const source = new StreamSource(createAsyncIterable(['hello', ' world']));
      const sample = await source.sample();
      expect(sample.toString()).toBe('hello world');
    });

    it('should return limited content with maxBytes', async () => {
      const source = new StreamSource(createAsyncIterable(['hello world, this is a long string']));
      const sample = await source.sample(5);
      expect(sample.toString()).toBe('hello');
    });

    it('should stop reading once maxBytes are buffered', async () => {
      let pulled = 0;
      async function* chunks(): AsyncIterable<string> {
        for (const chunk of ['abc', 'def', 'ghi']) {
          pulled++;
          yield await Promise.resolve(chunk);
        }
      }

      const sample = await new StreamSource(chunks()).sample(4);

      expect(sample.toString()).toBe('abcd');
      expect(pulled).toBe(2);
    });
  });

  describe('metadata()', () => {
    it('should return default metadata', () => {
      const meta = new StreamSource(createAsyncIterable<string>([])).metadata();

      expect(meta.fileName).toBe('stream-input');
      expect(meta.mimeType).toBe('text/plain');
      expect(meta.fileSize).toBeUndefined();
    });

    it('should return custom metadata', () => {
      const source = new StreamSource(createAsyncIterable<string>([]), {
        fileName: 'upload.csv',
        mimeType: 'text/csv',
        fileSize: 1024,
      });
      const meta = source.metadata();

      expect(meta.fileName).toBe('upload.csv');
      expect(meta.mimeType).toBe('text/csv');
      expect(meta.fileSize).toBe(1024);
    });
  });

  describe('ReadableStream input', () => {
    it('should yield chunks from a ReadableStream', async () => {
      const readable = new ReadableStream<string>({
        start(controller) {
          controller.enqueue('chunk1');
          controller.enqueue('chunk2');
          controller.close();
        },
      });

      expect(await readText(new StreamSource(readable))).toBe('chunk1chunk2');
    });

    it('should throw when ReadableStream is read twice', async () => {
      const readable = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('data'));
          controller.close();
        },
      });

      const source = new StreamSource(readable);
      await readText(source);

      await expect(readText(source)).rejects.toThrow('already been consumed');
    });
  });
});
