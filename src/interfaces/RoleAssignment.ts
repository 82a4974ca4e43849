import type { CellValue, ColumnKind } from './CanonicalTable.js';

/**
 * X/category series. `Kind` tells the renderer whether to place points by value
 * (`numeric`) or at ordinal positions 0..n-1 with the cells as tick labels (`categorical`).
 */
export interface CategorySeries {
  Name: string;
  Kind: ColumnKind;
  Values: CellValue[];
  /** True for the positional index made up when the table had a single column. */
  Synthetic: boolean;
}

export interface ValueSeries {
  Name: string;
  Values: Array<number | null>;
}

export interface CategoryValueAssignment {
  Kind: 'bar' | 'line';
  Category: CategorySeries;
  Value: ValueSeries;
  Warnings: string[];
}

export interface PieAssignment {
  Kind: 'pie';
  LabelsName: string;
  MagnitudesName: string;
  Labels: string[];
  Magnitudes: number[];
  SyntheticLabels: boolean;
  Warnings: string[];
}

export interface ContinuousHistogram {
  Kind: 'histogram';
  Path: 'continuous';
  ColumnName: string;
  Values: number[];
  Bins: number;
  /** Bins + 1 ascending edges; bin i covers [edge i, edge i+1), the last bin is closed. */
  BinEdges: number[];
  Counts: number[];
  Warnings: string[];
}

export interface DiscreteHistogram {
  Kind: 'histogram';
  Path: 'discrete';
  ColumnName: string;
  ColumnKind: ColumnKind;
  Categories: Array<number | string>;
  Counts: number[];
  Warnings: string[];
}

export interface GroupedHistogram {
  Kind: 'histogram';
  Path: 'grouped';
  GroupColumnName: string;
  ValueColumnName: string;
  Categories: CellValue[];
  Totals: number[];
  Warnings: string[];
}

export type HistogramAssignment = ContinuousHistogram | DiscreteHistogram | GroupedHistogram;

export type RoleAssignment = CategoryValueAssignment | PieAssignment | HistogramAssignment;
