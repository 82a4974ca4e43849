export type ChartKind = 'bar' | 'line' | 'histogram' | 'pie';

/**
 * Caller-supplied column names that override automatic role inference.
 * Only the fields relevant to the chart kind are read.
 */
export interface ColumnHints {
  XColumn?: string;
  YColumn?: string;
  Column?: string;
  LabelsColumn?: string;
  ValuesColumn?: string;
}

export interface BarStyle {
  Title: string;
  XLabel: string;
  YLabel: string;
  Color: string;
  Horizontal: boolean;
}

export type LineDash = '-' | '--' | '-.' | ':';

export interface LineStyle {
  Title: string;
  XLabel: string;
  YLabel: string;
  Color: string;
  LineStyle: LineDash;
  /** Marker code such as "o", "s" or "^"; empty for no markers. */
  Marker: string;
}

export interface HistogramStyle {
  Title: string;
  XLabel: string;
  YLabel: string;
  Color: string;
  Alpha: number;
}

export interface PieStyle {
  Title: string;
  Colors: string[] | null;
  /** printf-style percentage format, e.g. "%1.1f%%". Empty disables slice percentages. */
  Autopct: string;
  /** Degrees counter-clockwise from the positive x axis where the first slice starts. */
  StartAngle: number;
}

interface ChartRequestBase {
  Data: unknown;
  Hints: ColumnHints;
}

export type ChartRequest =
  | (ChartRequestBase & { Kind: 'bar'; Style: BarStyle })
  | (ChartRequestBase & { Kind: 'line'; Style: LineStyle })
  | (ChartRequestBase & { Kind: 'histogram'; Style: HistogramStyle; Bins?: number })
  | (ChartRequestBase & { Kind: 'pie'; Style: PieStyle });
