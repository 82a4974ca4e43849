import { DataNormalizer } from '../processor/DataNormalizer';
import { DataFormatError } from '../utils/ChartErrors';

describe('DataNormalizer - mappings', () => {

  it('reads a JSON object of numbers as an index/value series in key order', () => {
    const table = DataNormalizer.Normalize('{"A": 10, "B": 20, "C": 15, "D": 25}');

    expect(table.ColumnNames).toEqual(['index', '0']);
    expect(table.GetColumn('index')?.Values).toEqual(['A', 'B', 'C', 'D']);
    expect(table.GetColumn('0')?.Values).toEqual([10, 20, 15, 25]);
    expect(table.GetColumn('index')?.GetKind()).toBe('categorical');
    expect(table.GetColumn('0')?.GetKind()).toBe('numeric');
  });

  it('reads a dictionary of numbers the same way as its JSON text', () => {
    const fromObject = DataNormalizer.Normalize({ 'Product A': 30, 'Product B': 25 });
    const fromText = DataNormalizer.Normalize('{"Product A": 30, "Product B": 25}');

    expect(fromObject).toEqual(fromText);
    expect(fromObject.RowCount).toBe(2);
  });

  it('reads a dictionary of lists as columns', () => {
    const table = DataNormalizer.Normalize('{"x": [1, 2, 3, 4], "y": [10, 20, 15, 25]}');

    expect(table.ColumnNames).toEqual(['x', 'y']);
    expect(table.GetColumn('x')?.Values).toEqual([1, 2, 3, 4]);
    expect(table.GetColumn('y')?.Values).toEqual([10, 20, 15, 25]);
  });

  it('broadcasts scalar values next to list columns', () => {
    const table = DataNormalizer.Normalize({ x: [1, 2], unit: 'kg' });

    expect(table.GetColumn('unit')?.Values).toEqual(['kg', 'kg']);
  });

  it('rejects a dictionary of non-numeric scalars', () => {
    expect(() => DataNormalizer.Normalize({ A: 'text', B: 'more text' })).toThrow(DataFormatError);
  });

  it('rejects list columns of different lengths', () => {
    expect(() => DataNormalizer.Normalize({ x: [1, 2, 3], y: [1, 2] })).toThrow('all column lists must be the same length');
  });

  it('turns nested dictionaries into rows keyed by the inner keys', () => {
    const table = DataNormalizer.Normalize({ sales: { Jan: 1, Feb: 2 }, cost: { Feb: 5 } });

    expect(table.ColumnNames).toEqual(['index', 'sales', 'cost']);
    expect(table.GetColumn('index')?.Values).toEqual(['Jan', 'Feb']);
    expect(table.GetColumn('sales')?.Values).toEqual([1, 2]);
    expect(table.GetColumn('cost')?.Values).toEqual([null, 5]);
  });

  it('returns an empty table for an empty dictionary', () => {
    const table = DataNormalizer.Normalize({});

    expect(table.Columns).toHaveLength(0);
    expect(table.RowCount).toBe(0);
  });
});

describe('DataNormalizer - lists', () => {

  it('unions record keys in first-seen order and fills gaps with null', () => {
    const table = DataNormalizer.Normalize([{ a: 1, b: 'x' }, { a: 2 }, { b: 'y', c: 3 }]);

    expect(table.ColumnNames).toEqual(['a', 'b', 'c']);
    expect(table.GetColumn('a')?.Values).toEqual([1, 2, null]);
    expect(table.GetColumn('b')?.Values).toEqual(['x', null, 'y']);
    expect(table.GetColumn('c')?.Values).toEqual([null, null, 3]);
  });

  it('wraps a flat list in a single column named "0"', () => {
    const table = DataNormalizer.Normalize([1, 4, 2, null]);

    expect(table.ColumnNames).toEqual(['0']);
    expect(table.GetColumn('0')?.Values).toEqual([1, 4, 2, null]);
  });

  it('gives list rows positional column names and pads short rows', () => {
    const table = DataNormalizer.Normalize([[1, 2], [3]]);

    expect(table.ColumnNames).toEqual(['0', '1']);
    expect(table.GetColumn('0')?.Values).toEqual([1, 3]);
    expect(table.GetColumn('1')?.Values).toEqual([2, null]);
  });

  it('reads a very long list of single-value rows', () => {
    const rows = Array.from({ length: 300000 }, (_, i) => [i % 7]);

    const table = DataNormalizer.Normalize(JSON.stringify(rows));

    expect(table.ColumnNames).toEqual(['0']);
    expect(table.RowCount).toBe(300000);
    expect(table.GetColumn('0')?.Values[8]).toBe(1);
  });

  it('stores booleans as text', () => {
    const table = DataNormalizer.Normalize([{ ok: true }, { ok: false }]);

    expect(table.GetColumn('ok')?.Values).toEqual(['true', 'false']);
  });

  it('rejects nested values inside a cell', () => {
    expect(() => DataNormalizer.Normalize([{ a: { b: 1 } }])).toThrow('unsupported cell value at row 0, column "a"');
  });

  it('rejects lists that mix records and scalars', () => {
    expect(() => DataNormalizer.Normalize([{ a: 1 }, 2])).toThrow(DataFormatError);
  });

  it('returns an empty table for an empty list', () => {
    expect(DataNormalizer.Normalize([]).RowCount).toBe(0);
  });
});

describe('DataNormalizer - CSV text', () => {

  it('parses the header and coerces numeric columns', () => {
    const table = DataNormalizer.Normalize('category,value\nA,10\nB,20\nC,15\nD,25');

    expect(table.ColumnNames).toEqual(['category', 'value']);
    expect(table.GetColumn('category')?.Values).toEqual(['A', 'B', 'C', 'D']);
    expect(table.GetColumn('value')?.Values).toEqual([10, 20, 15, 25]);
  });

  it('reads blank and NA cells as null', () => {
    const table = DataNormalizer.Normalize('name,score\nx,1\ny,\nz,NA');

    expect(table.GetColumn('score')?.Values).toEqual([1, null, null]);
    expect(table.GetColumn('score')?.GetKind()).toBe('numeric');
  });

  it('keeps a column as text when any cell is not a number', () => {
    const table = DataNormalizer.Normalize('k,v\na,1\nb,two');

    expect(table.GetColumn('v')?.Values).toEqual(['1', 'two']);
    expect(table.GetColumn('v')?.GetKind()).toBe('categorical');
  });

  it('names blank headers and de-duplicates repeated ones', () => {
    const table = DataNormalizer.Normalize('a,a,\n1,2,3');

    expect(table.ColumnNames).toEqual(['a', 'a.1', 'Unnamed: 2']);
  });

  it('pads short rows with null', () => {
    const table = DataNormalizer.Normalize('a,b\n1\n2,3');

    expect(table.GetColumn('a')?.Values).toEqual([1, 2]);
    expect(table.GetColumn('b')?.Values).toEqual([null, 3]);
  });

  it('fails when a row has more fields than the header', () => {
    expect(() => DataNormalizer.Normalize('a,b\n1,2,3')).toThrow(DataFormatError);
  });

  it('fails with insufficient data for blank text', () => {
    expect(() => DataNormalizer.Normalize('')).toThrow('insufficient data');
  });
});

describe('DataNormalizer - rejected input', () => {

  it('rejects missing data', () => {
    expect(() => DataNormalizer.Normalize(null)).toThrow('no data provided');
    expect(() => DataNormalizer.Normalize(undefined)).toThrow(DataFormatError);
  });

  it('rejects values that are not text, lists or dictionaries', () => {
    expect(() => DataNormalizer.Normalize(42)).toThrow('data must be a string (JSON/CSV), list, or dictionary, got number');
  });

  it('rejects JSON text holding a single scalar', () => {
    expect(() => DataNormalizer.Normalize('42')).toThrow('JSON data must be an array or an object');
  });
});
