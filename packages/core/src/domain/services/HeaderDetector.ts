import { ColumnType, isAccommodatedBy } from '../model/ColumnType.js';
import type { TypeInferrer } from './TypeInferrer.js';
import { collectColumns } from './TypeInferrer.js';

/**
 * Domain service that decides whether the first structural row is a label row.
 *
 * Each column of row 0 votes "label" when its value's type is not accommodated by
 * the joined type of the rows below it (row 0 says `Text`, the data says
 * `Integer`). A header is declared only on a strict majority of at least two
 * columns: treating a data row as a header silently loses data, so every
 * undecided case answers `false`.
 */
export class HeaderDetector {
  constructor(private readonly types: TypeInferrer) {}

  detect(rows: readonly (readonly string[])[]): boolean {
    const [first, ...data] = rows;
    if (first === undefined || data.length === 0 || first.length < 2) return false;

    const columns = collectColumns(data, first.length);
    let votes = 0;

    first.forEach((label, index) => {
      const labelType = this.types.classify(label);
      const dataType = this.types.inferColumn(columns.get(index) ?? []);
      if (labelType === ColumnType.NULL || dataType === ColumnType.NULL) return;
      if (!isAccommodatedBy(labelType, dataType)) votes++;
    });

    return votes * 2 > first.length;
  }
}
