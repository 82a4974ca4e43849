import { DataFormatError } from '../utils/ChartErrors.js';
import { parseNumericCell } from '../utils/ValueUtils.js';

export type CellValue = number | string | null;

export type ColumnKind = 'numeric' | 'categorical';

export class TableColumn {
  public Name: string;
  public Values: CellValue[];

  constructor(name: string, values: CellValue[]) {
    this.Name = name;
    this.Values = values;
  }

  /**
   * `numeric` when every non-null cell parses as a real number, `categorical` otherwise.
   * A column of nulls is numeric. Computed on every call, never cached.
   */
  public GetKind(): ColumnKind {
    for (const cell of this.Values) {
      if (cell !== null && parseNumericCell(cell) === null) return 'categorical';
    }
    return 'numeric';
  }

  /** Cells parsed as numbers; null (and unparseable text) become null. */
  public GetNumericValues(): Array<number | null> {
    return this.Values.map(parseNumericCell);
  }
}

/**
 * Column-oriented table every chart kind consumes. Column names are unique and
 * all columns share one length.
 */
export class CanonicalTable {
  public readonly Columns: TableColumn[];

  constructor(columns: TableColumn[]) {
    const seen = new Set<string>();
    for (const column of columns) {
      if (seen.has(column.Name)) {
        throw new DataFormatError(`duplicate column name "${column.Name}"`);
      }
      seen.add(column.Name);
    }
    if (columns.length > 0) {
      const length = columns[0].Values.length;
      const ragged = columns.find(c => c.Values.length !== length);
      if (ragged) {
        throw new DataFormatError(`column "${ragged.Name}" has ${ragged.Values.length} rows, expected ${length}`);
      }
    }
    this.Columns = columns;
  }

  static Empty(): CanonicalTable {
    return new CanonicalTable([]);
  }

  get RowCount(): number {
    return this.Columns.length === 0 ? 0 : this.Columns[0].Values.length;
  }

  get ColumnNames(): string[] {
    return this.Columns.map(c => c.Name);
  }

  public GetColumn(name: string): TableColumn | undefined {
    return this.Columns.find(c => c.Name === name);
  }
}
