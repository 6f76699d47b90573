import { describe, it, expect } from 'vitest';
import { MetadataAssembler } from '../../../src/domain/services/MetadataAssembler.js';
import { TypeInferrer } from '../../../src/domain/services/TypeInferrer.js';
import { Comment, Escape, Quote, createDialect } from '../../../src/domain/model/Dialect.js';
import type { Dialect } from '../../../src/domain/model/Dialect.js';

function dialectWith(hasHeaderRow: boolean): Dialect {
  return createDialect({
    delimiter: ',',
    header: { hasHeaderRow, numPreambleRows: 0 },
    quote: Quote.none(),
    escape: Escape.disabled(),
    comment: Comment.disabled(),
    flexible: false,
    isUtf8: true,
  });
}

describe('MetadataAssembler', () => {
  const assembler = new MetadataAssembler(new TypeInferrer());

  it('should name fields from the header row and type the rows below it', () => {
    const metadata = assembler.assemble({
      dialect: dialectWith(true),
      rows: [
        ['id', 'price'],
        ['1', '9.99'],
        ['2', '10'],
      ],
      lineByteLengths: [8, 6, 4],
    });

    expect(metadata.numFields).toBe(2);
    expect(metadata.fields).toEqual(['id', 'price']);
    expect(metadata.types).toEqual(['Integer', 'Float']);
    expect(metadata.avgRecordLen).toBe(6);
  });

  it('should synthesise names and type every row without a header', () => {
    const metadata = assembler.assemble({
      dialect: dialectWith(false),
      rows: [
        ['1', 'x'],
        ['2', 'y'],
      ],
      lineByteLengths: [3, 4],
    });

    expect(metadata.fields).toEqual(['field 0', 'field 1']);
    expect(metadata.types).toEqual(['Integer', 'Text']);
    expect(metadata.avgRecordLen).toBe(3);
  });

  it('should size the schema to the widest row', () => {
    const metadata = assembler.assemble({
      dialect: dialectWith(true),
      rows: [
        ['a', ''],
        ['1', '2', '3'],
        ['4'],
      ],
      lineByteLengths: [2, 5, 1],
    });

    expect(metadata.numFields).toBe(3);
    expect(metadata.fields).toEqual(['a', 'field 1', 'field 2']);
    expect(metadata.types).toEqual(['Integer', 'Integer', 'Integer']);
    expect(metadata.types).toHaveLength(metadata.numFields);
  });

  it('should produce an empty schema for no rows', () => {
    const metadata = assembler.assemble({ dialect: dialectWith(false), rows: [], lineByteLengths: [] });

    expect(metadata.numFields).toBe(0);
    expect(metadata.fields).toEqual([]);
    expect(metadata.types).toEqual([]);
    expect(metadata.avgRecordLen).toBe(0);
  });

  it('should return frozen metadata', () => {
    const metadata = assembler.assemble({ dialect: dialectWith(false), rows: [['1']], lineByteLengths: [1] });

    expect(Object.isFrozen(metadata)).toBe(true);
    expect(Object.isFrozen(metadata.fields)).toBe(true);
    expect(Object.isFrozen(metadata.types)).toBe(true);
    expect(Object.isFrozen(metadata.dialect.header)).toBe(true);
  });
});
