import type { ColumnType } from '../model/ColumnType.js';
import type { Dialect } from '../model/Dialect.js';
import type { Metadata } from '../model/Metadata.js';
import { syntheticFieldName } from '../model/Metadata.js';
import type { TypeInferrer } from './TypeInferrer.js';
import { collectColumns } from './TypeInferrer.js';

/** Everything the assembler needs from one sniff pass. */
export interface AssemblyInput {
  readonly dialect: Dialect;
  /** Tokenized structural rows, header row included when there is one. */
  readonly rows: readonly (readonly string[])[];
  /** Byte length of every examined structural line, terminators excluded. */
  readonly lineByteLengths: readonly number[];
}

/** Domain service that packages a dialect and its column schema into one frozen `Metadata`. */
export class MetadataAssembler {
  constructor(private readonly types: TypeInferrer) {}

  assemble(input: AssemblyInput): Metadata {
    const { dialect, rows } = input;
    const numFields = rows.reduce((max, row) => Math.max(max, row.length), 0);

    const labels = dialect.header.hasHeaderRow ? (rows[0] ?? []) : [];
    const dataRows = dialect.header.hasHeaderRow ? rows.slice(1) : rows;

    const fields: string[] = [];
    for (let index = 0; index < numFields; index++) {
      const label = labels[index];
      fields.push(label !== undefined && label.trim() !== '' ? label : syntheticFieldName(index));
    }

    const inferred = this.types.infer(collectColumns(dataRows, numFields));
    const types: ColumnType[] = [];
    for (let index = 0; index < numFields; index++) {
      const type = inferred.get(index);
      if (type !== undefined) types.push(type);
    }

    return Object.freeze({
      dialect,
      avgRecordLen: averageLength(input.lineByteLengths),
      numFields,
      fields: Object.freeze(fields),
      types: Object.freeze(types),
    });
  }
}

function averageLength(lengths: readonly number[]): number {
  if (lengths.length === 0) return 0;
  const total = lengths.reduce((sum, length) => sum + length, 0);
  return Math.floor(total / lengths.length);
}
