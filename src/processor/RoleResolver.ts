import type { CanonicalTable, CellValue, TableColumn } from '../interfaces/CanonicalTable.js';
import type { ChartKind, ColumnHints } from '../interfaces/ChartRequest.js';
import type {
  CategoryValueAssignment,
  HistogramAssignment,
  PieAssignment,
  RoleAssignment,
} from '../interfaces/RoleAssignment.js';
import { RoleAssignmentError } from '../utils/ChartErrors.js';
import { cellToLabel, parseNumericCell } from '../utils/ValueUtils.js';
import { HistogramBinner } from './HistogramBinner.js';

export interface ResolveOptions {
  /** Requested histogram bin count; DefaultBins when absent. */
  Bins?: number;
  DefaultBins: number;
  /** Distinct-value count at or below which a numeric histogram counts values instead of binning. */
  DiscreteThreshold: number;
  GroupByCategory: boolean;
}

export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = {
  DefaultBins: 30,
  DiscreteThreshold: 20,
  GroupByCategory: true,
};

/** Role names used in messages for each two-role chart kind. */
interface PairRoleNames {
  Category: string;
  Value: string;
}

interface ResolvedPair {
  Category: TableColumn | null;
  Value: TableColumn;
}

const INSUFFICIENT_DATA = 'insufficient data';

/**
 * Decides which columns of a table play which role for a chart kind.
 * Stateless: the same table, kind, hints and options always give the same assignment.
 */
export class RoleResolver {

  public static Resolve(
    table: CanonicalTable,
    kind: ChartKind,
    hints: ColumnHints,
    options: ResolveOptions = DEFAULT_RESOLVE_OPTIONS
  ): RoleAssignment {
    switch (kind) {
      case 'bar':
      case 'line':
        return RoleResolver.ResolveCategoryValue(table, kind, hints);
      case 'pie':
        return RoleResolver.ResolvePie(table, hints);
      case 'histogram':
        return RoleResolver.ResolveHistogram(table, hints, options);
    }
  }

  /** Bar and line charts: (category, value). Orientation plays no part here. */
  public static ResolveCategoryValue(table: CanonicalTable, kind: 'bar' | 'line', hints: ColumnHints): CategoryValueAssignment {
    const warnings: string[] = [];
    const pair = RoleResolver.resolvePair(table, hints.XColumn, hints.YColumn, { Category: 'x', Value: 'y' }, warnings);
    const category = pair.Category;
    const categoryKind = category ? category.GetKind() : 'numeric';

    return {
      Kind: kind,
      Category: category
        ? {
            Name: category.Name,
            Kind: categoryKind,
            Values: categoryKind === 'numeric' ? category.GetNumericValues() : [...category.Values],
            Synthetic: false,
          }
        : {
            Name: 'index',
            Kind: 'numeric',
            Values: pair.Value.Values.map((_, i) => i),
            Synthetic: true,
          },
      Value: { Name: pair.Value.Name, Values: pair.Value.GetNumericValues() },
      Warnings: warnings,
    };
  }

  /** Pie charts: (label, magnitude) with every non-positive magnitude dropped. */
  public static ResolvePie(table: CanonicalTable, hints: ColumnHints): PieAssignment {
    const warnings: string[] = [];
    const pair = RoleResolver.resolvePair(table, hints.LabelsColumn, hints.ValuesColumn, { Category: 'labels', Value: 'values' }, warnings);

    const allLabels = pair.Category
      ? pair.Category.Values.map(cellToLabel)
      : pair.Value.Values.map((_, i) => `Category ${i + 1}`);
    const allMagnitudes = pair.Value.GetNumericValues();

    const labels: string[] = [];
    const magnitudes: number[] = [];
    allMagnitudes.forEach((magnitude, i) => {
      if (magnitude !== null && magnitude > 0) {
        labels.push(allLabels[i]);
        magnitudes.push(magnitude);
      }
    });

    if (magnitudes.length === 0) {
      throw new RoleAssignmentError('no positive values');
    }

    return {
      Kind: 'pie',
      LabelsName: pair.Category ? pair.Category.Name : 'labels',
      MagnitudesName: pair.Value.Name,
      Labels: labels,
      Magnitudes: magnitudes,
      SyntheticLabels: pair.Category === null,
      Warnings: warnings,
    };
  }

  /**
   * Histograms take one of three paths:
   * - grouped: the hinted column is numeric and another column is categorical; totals per group
   * - discrete: few distinct values, or a categorical column; value -> count pairs
   * - continuous: equal-width bins over the numeric values
   */
  public static ResolveHistogram(table: CanonicalTable, hints: ColumnHints, options: ResolveOptions = DEFAULT_RESOLVE_OPTIONS): HistogramAssignment {
    RoleResolver.requireData(table);
    const warnings: string[] = [];
    const hinted = RoleResolver.lookupHint(table, hints.Column, 'histogram', warnings);

    if (options.GroupByCategory && hinted && hinted.GetKind() === 'numeric') {
      // NOTE: silently turns the histogram into a bar-of-values chart. Disable with histogram.groupByCategory.
      const group = table.Columns.find(c => c !== hinted && c.GetKind() === 'categorical');
      if (group) {
        return RoleResolver.groupTotals(group, hinted, warnings);
      }
    }

    const column = hinted ?? table.Columns[0];
    const kind = column.GetKind();

    if (kind === 'categorical') {
      const cells = column.Values.filter((cell): cell is number | string => cell !== null).map(String);
      if (cells.length === 0) throw new RoleAssignmentError(INSUFFICIENT_DATA);
      const [categories, counts] = RoleResolver.countDistinct(cells, RoleResolver.compareMixedLabels);
      return { Kind: 'histogram', Path: 'discrete', ColumnName: column.Name, ColumnKind: kind, Categories: categories, Counts: counts, Warnings: warnings };
    }

    const values = column.GetNumericValues().filter((v): v is number => v !== null);
    if (values.length === 0) throw new RoleAssignmentError(INSUFFICIENT_DATA);

    if (new Set(values).size <= options.DiscreteThreshold) {
      const [categories, counts] = RoleResolver.countDistinct(values, (a, b) => a - b);
      return { Kind: 'histogram', Path: 'discrete', ColumnName: column.Name, ColumnKind: kind, Categories: categories, Counts: counts, Warnings: warnings };
    }

    const bins = options.Bins ?? options.DefaultBins;
    if (!Number.isInteger(bins) || bins < 1) {
      throw new RoleAssignmentError(`bins must be a positive integer, got ${bins}`);
    }
    const binned = HistogramBinner.Bin(values, bins);
    return {
      Kind: 'histogram',
      Path: 'continuous',
      ColumnName: column.Name,
      Values: values,
      Bins: bins,
      BinEdges: binned.BinEdges,
      Counts: binned.Counts,
      Warnings: warnings,
    };
  }

  /**
   * Shared (category, value) selection for bar, line and pie.
   *
   * Hints are used only when both name existing columns. Otherwise the first two
   * columns are used, and when exactly one of them is categorical it becomes the
   * category whatever its position. A single column is the value; the caller supplies a synthetic category.
   */
  private static resolvePair(
    table: CanonicalTable,
    categoryHint: string | undefined,
    valueHint: string | undefined,
    roles: PairRoleNames,
    warnings: string[]
  ): ResolvedPair {
    RoleResolver.requireData(table);

    const hintedCategory = RoleResolver.lookupHint(table, categoryHint, roles.Category, warnings);
    const hintedValue = RoleResolver.lookupHint(table, valueHint, roles.Value, warnings);

    let pair: ResolvedPair;
    if (hintedCategory && hintedValue) {
      pair = { Category: hintedCategory, Value: hintedValue };
    } else {
      RoleResolver.ignoreLoneHint(hintedCategory, roles.Category, roles, warnings);
      RoleResolver.ignoreLoneHint(hintedValue, roles.Value, roles, warnings);
      pair = table.Columns.length === 1
        ? { Category: null, Value: table.Columns[0] }
        : RoleResolver.orderByKind(table.Columns[0], table.Columns[1]);
    }

    if (pair.Value.GetKind() !== 'numeric') {
      throw new RoleAssignmentError(`column "${pair.Value.Name}" is not numeric`);
    }
    return pair;
  }

  private static ignoreLoneHint(column: TableColumn | undefined, role: string, roles: PairRoleNames, warnings: string[]): void {
    if (column) {
      warnings.push(`${role} column "${column.Name}" ignored; ${roles.Category} and ${roles.Value} hints only apply together`);
    }
  }

  private static orderByKind(first: TableColumn, second: TableColumn): ResolvedPair {
    if (first.GetKind() === 'numeric' && second.GetKind() === 'categorical') {
      return { Category: second, Value: first };
    }
    return { Category: first, Value: second };
  }

  private static lookupHint(table: CanonicalTable, name: string | undefined, role: string, warnings: string[]): TableColumn | undefined {
    if (name === undefined || name === '') return undefined;
    const column = table.GetColumn(name);
    if (!column) {
      warnings.push(`${role} column "${name}" not found; inferring it from the data`);
    }
    return column;
  }

  private static requireData(table: CanonicalTable): void {
    if (table.Columns.length === 0 || table.RowCount === 0) {
      throw new RoleAssignmentError(INSUFFICIENT_DATA);
    }
  }

  /** Number-like labels first in numeric order, then the rest in code unit order. */
  private static compareMixedLabels(a: string, b: string): number {
    const x = parseNumericCell(a);
    const y = parseNumericCell(b);
    if (x !== null && y !== null && x !== y) return x - y;
    if (x !== null && y === null) return -1;
    if (x === null && y !== null) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  private static countDistinct<T extends number | string>(values: T[], compare: (a: T, b: T) => number): [T[], number[]] {
    const counts = new Map<T, number>();
    for (const v of values) {
      counts.set(v, (counts.get(v) ?? 0) + 1);
    }
    const keys = [...counts.keys()].sort(compare);
    return [keys, keys.map(k => counts.get(k) ?? 0)];
  }

  /** Sum of the value column per group, groups in order of first appearance. */
  private static groupTotals(group: TableColumn, value: TableColumn, warnings: string[]): HistogramAssignment {
    const numbers = value.GetNumericValues();
    const totals = new Map<CellValue, number>();
    group.Values.forEach((key, i) => {
      if (key === null) return;
      totals.set(key, (totals.get(key) ?? 0) + (numbers[i] ?? 0));
    });
    if (totals.size === 0) throw new RoleAssignmentError(INSUFFICIENT_DATA);

    return {
      Kind: 'histogram',
      Path: 'grouped',
      GroupColumnName: group.Name,
      ValueColumnName: value.Name,
      Categories: [...totals.keys()],
      Totals: [...totals.values()],
      Warnings: warnings,
    };
  }
}
