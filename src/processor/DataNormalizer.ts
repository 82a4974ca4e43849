import Papa from 'papaparse';
import { CanonicalTable, CellValue, TableColumn } from '../interfaces/CanonicalTable.js';
import { DataFormatError } from '../utils/ChartErrors.js';
import { isPlainRecord, parseNumericCell } from '../utils/ValueUtils.js';

type InputShape =
  | { Tag: 'text'; Text: string }
  | { Tag: 'sequence'; Items: unknown[] }
  | { Tag: 'mapping'; Record: Record<string, unknown> }
  | { Tag: 'missing' }
  | { Tag: 'unsupported'; TypeName: string };

/**
 * One attempt at reading text. `skipped` means "not this format, try the next one";
 * content that is recognised but unusable throws DataFormatError instead.
 */
type TextParseResult =
  | { Status: 'parsed'; Table: CanonicalTable }
  | { Status: 'skipped'; Reason: string };

type TextParser = (text: string) => TextParseResult;

// Cell text read as missing in CSV input.
const CSV_NULL_TOKENS = new Set(['', 'NA', 'N/A', 'n/a', '#N/A', 'NaN', 'nan', 'null', 'NULL', 'None']);

export const INDEX_COLUMN = 'index';

function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

/**
 * Converts JSON text, CSV text, arrays and mappings into a CanonicalTable.
 */
export class DataNormalizer {

  public static Normalize(raw: unknown): CanonicalTable {
    const shape = DataNormalizer.detectShape(raw);
    switch (shape.Tag) {
      case 'text':
        return DataNormalizer.fromText(shape.Text);
      case 'sequence':
        return DataNormalizer.fromSequence(shape.Items);
      case 'mapping':
        return DataNormalizer.fromMapping(shape.Record);
      case 'missing':
        throw new DataFormatError('no data provided');
      case 'unsupported':
        throw new DataFormatError(`data must be a string (JSON/CSV), list, or dictionary, got ${shape.TypeName}`);
    }
  }

  private static detectShape(raw: unknown): InputShape {
    if (raw === null || raw === undefined) return { Tag: 'missing' };
    if (typeof raw === 'string') return { Tag: 'text', Text: raw };
    if (Array.isArray(raw)) return { Tag: 'sequence', Items: raw };
    if (isPlainRecord(raw)) return { Tag: 'mapping', Record: raw };
    return { Tag: 'unsupported', TypeName: typeof raw === 'object' ? raw.constructor.name : typeof raw };
  }

  /** Try JSON, then CSV; fail only when every parser skipped. */
  private static fromText(text: string): CanonicalTable {
    const parsers: TextParser[] = [DataNormalizer.tryJson, DataNormalizer.tryCsv];
    const reasons: string[] = [];
    for (const parser of parsers) {
      const result = parser(text);
      if (result.Status === 'parsed') return result.Table;
      reasons.push(result.Reason);
    }
    throw new DataFormatError(`could not parse string data as JSON or CSV (${reasons.join('; ')})`);
  }

  private static tryJson(text: string): TextParseResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      return { Status: 'skipped', Reason: `JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
    if (Array.isArray(parsed)) return { Status: 'parsed', Table: DataNormalizer.fromSequence(parsed) };
    if (isPlainRecord(parsed)) return { Status: 'parsed', Table: DataNormalizer.fromMapping(parsed) };
    throw new DataFormatError('JSON data must be an array or an object');
  }

  private static tryCsv(text: string): TextParseResult {
    const result = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: 'greedy' });
    if (result.errors.length > 0) {
      const first = result.errors[0];
      return { Status: 'skipped', Reason: `CSV: ${first.message} (row ${first.row ?? 0})` };
    }

    const [headerRow, ...rows] = result.data;
    if (!headerRow || headerRow.length === 0) {
      throw new DataFormatError('insufficient data');
    }

    const names = DataNormalizer.uniqueHeaderNames(headerRow);
    for (let r = 0; r < rows.length; r++) {
      if (rows[r].length > names.length) {
        return {
          Status: 'skipped',
          Reason: `CSV: expected ${names.length} fields in line ${r + 2}, saw ${rows[r].length}`,
        };
      }
    }

    const columns = names.map((name, c) => {
      const cells: Array<string | null> = rows.map(row => {
        const cell = row[c];
        return cell === undefined || CSV_NULL_TOKENS.has(cell.trim()) ? null : cell;
      });
      return new TableColumn(name, DataNormalizer.coerceCsvColumn(cells));
    });
    return { Status: 'parsed', Table: new CanonicalTable(columns) };
  }

  /** Numbers for the whole column when every non-null cell parses, text otherwise. */
  private static coerceCsvColumn(cells: Array<string | null>): CellValue[] {
    const numbers = cells.map(cell => (cell === null ? null : parseNumericCell(cell)));
    const allNumeric = cells.every((cell, i) => cell === null || numbers[i] !== null);
    return allNumeric ? numbers : cells;
  }

  /** Blank header names become "Unnamed: i"; repeats get ".1", ".2", ... */
  private static uniqueHeaderNames(header: string[]): string[] {
    const used = new Set<string>();
    return header.map((rawName, i) => {
      const base = rawName.trim().length === 0 ? `Unnamed: ${i}` : rawName;
      let name = base;
      let suffix = 1;
      while (used.has(name)) {
        name = `${base}.${suffix++}`;
      }
      used.add(name);
      return name;
    });
  }

  private static fromSequence(items: unknown[]): CanonicalTable {
    if (items.length === 0) return CanonicalTable.Empty();

    if (items.every(isPlainRecord)) {
      const names: string[] = [];
      const known = new Set<string>();
      for (const record of items) {
        for (const key of Object.keys(record)) {
          if (!known.has(key)) {
            known.add(key);
            names.push(key);
          }
        }
      }
      return new CanonicalTable(names.map(name =>
        new TableColumn(name, items.map((record, r) => DataNormalizer.toCell(record[name], `row ${r}, column "${name}"`)))
      ));
    }

    if (items.every(isList)) {
      const width = items.reduce((widest, row) => Math.max(widest, row.length), 0);
      const columns: TableColumn[] = [];
      for (let c = 0; c < width; c++) {
        columns.push(new TableColumn(String(c), items.map((row, r) => DataNormalizer.toCell(row[c], `row ${r}, column ${c}`))));
      }
      return new CanonicalTable(columns);
    }

    if (items.some(item => typeof item === 'object' && item !== null)) {
      throw new DataFormatError('list data must contain only records, only lists, or only scalar values');
    }
    return new CanonicalTable([
      new TableColumn('0', items.map((item, r) => DataNormalizer.toCell(item, `item ${r}`))),
    ]);
  }

  /**
   * Mapping input.
   *
   * NOTE: a mapping whose values are all bare numbers is read as an index -> value
   * series ({"A": 10, "B": 20} gives an "index" column of keys and a "0" column of
   * values); any other mapping is read as column name -> column values. So
   * {"x": 1, "y": 2} and {"x": 1, "y": "2"} land on different code paths.
   */
  private static fromMapping(record: Record<string, unknown>): CanonicalTable {
    const entries = Object.entries(record);
    if (entries.length === 0) return CanonicalTable.Empty();

    if (entries.every(([, value]) => typeof value === 'number')) {
      return new CanonicalTable([
        new TableColumn(INDEX_COLUMN, entries.map(([key]) => key)),
        new TableColumn('0', entries.map(([key, value]) => DataNormalizer.toCell(value, `key "${key}"`))),
      ]);
    }

    if (entries.every(([, value]) => isPlainRecord(value))) {
      return DataNormalizer.fromNestedMapping(entries);
    }

    const arrayLengths = entries.flatMap(([, value]) => (Array.isArray(value) ? [value.length] : []));
    if (arrayLengths.length === 0) {
      throw new DataFormatError('a dictionary of scalar values needs numeric values, or lists as column values');
    }
    const rowCount = arrayLengths[0];
    if (arrayLengths.some(length => length !== rowCount)) {
      throw new DataFormatError('all column lists must be the same length');
    }

    return new CanonicalTable(entries.map(([name, value]) => {
      if (Array.isArray(value)) {
        return new TableColumn(name, value.map((cell, r) => DataNormalizer.toCell(cell, `row ${r}, column "${name}"`)));
      }
      // Scalars broadcast over the rows of the list-valued columns.
      const cell = DataNormalizer.toCell(value, `column "${name}"`);
      return new TableColumn(name, new Array<CellValue>(rowCount).fill(cell));
    }));
  }

  /** {"sales": {"Jan": 1, "Feb": 2}}: inner keys become rows, outer keys columns. */
  private static fromNestedMapping(entries: Array<[string, unknown]>): CanonicalTable {
    const inner: Array<{ Name: string; Values: Record<string, unknown> }> = [];
    for (const [name, value] of entries) {
      if (isPlainRecord(value)) inner.push({ Name: name, Values: value });
    }
    const rowKeys: string[] = [];
    const known = new Set<string>();
    for (const { Values: values } of inner) {
      for (const key of Object.keys(values)) {
        if (!known.has(key)) {
          known.add(key);
          rowKeys.push(key);
        }
      }
    }
    if (inner.some(column => column.Name === INDEX_COLUMN)) {
      throw new DataFormatError(`column name "${INDEX_COLUMN}" is reserved for nested dictionaries`);
    }
    return new CanonicalTable([
      new TableColumn(INDEX_COLUMN, rowKeys),
      ...inner.map(({ Name: name, Values: values }) =>
        new TableColumn(name, rowKeys.map(key => DataNormalizer.toCell(values[key], `row "${key}", column "${name}"`)))
      ),
    ]);
  }

  private static toCell(value: unknown, where: string): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) throw new DataFormatError(`non-finite number at ${where}`);
      return value;
    }
    if (typeof value === 'string') return value;
    if (typeof value === 'boolean') return value ? 'true' : 'false';
    throw new DataFormatError(`unsupported cell value at ${where}`);
  }
}
