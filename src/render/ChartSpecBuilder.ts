import type { TopLevelSpec } from 'vega-lite';
import type { BarStyle, HistogramStyle, LineDash, LineStyle, PieStyle } from '../interfaces/ChartRequest.js';
import type { CategoryValueAssignment, HistogramAssignment, PieAssignment } from '../interfaces/RoleAssignment.js';
import type { RenderSettings } from '../utils/ChartsmithSettings.js';
import { AutopctFormatter } from './AutopctFormatter.js';
import type { RenderJob } from './ChartRenderer.js';

const SCHEMA = 'https://vega.github.io/schema/vega-lite/v5.json';

const DASHES: Record<LineDash, number[]> = {
  '-': [],
  '--': [6, 4],
  '-.': [6, 3, 1, 3],
  ':': [1, 3],
};

// Marker codes callers pass in, mapped to Vega point shapes.
const MARKER_SHAPES: Record<string, string> = {
  o: 'circle',
  '.': 'circle',
  s: 'square',
  '^': 'triangle-up',
  v: 'triangle-down',
  '<': 'triangle-left',
  '>': 'triangle-right',
  D: 'diamond',
  d: 'diamond',
  x: 'cross',
  '+': 'cross',
  '*': 'star',
};

/**
 * Builds Vega-Lite specifications from render jobs. Pure: no Vega runtime is loaded here.
 */
export class ChartSpecBuilder {

  public static Build(job: RenderJob, settings: RenderSettings): TopLevelSpec {
    switch (job.Kind) {
      case 'bar':
        return ChartSpecBuilder.bar(job.Assignment, job.Style, settings);
      case 'line':
        return ChartSpecBuilder.line(job.Assignment, job.Style, settings);
      case 'histogram':
        return ChartSpecBuilder.histogram(job.Assignment, job.Style, settings);
      case 'pie':
        return ChartSpecBuilder.pie(job.Assignment, job.Style, settings);
    }
  }

  /** Point shape for a marker code, or null when markers are off or the code is unknown. */
  public static MarkerShape(marker: string): string | null {
    return MARKER_SHAPES[marker] ?? null;
  }

  private static bar(a: CategoryValueAssignment, style: BarStyle, settings: RenderSettings): TopLevelSpec {
    const categorical = a.Category.Kind === 'categorical';
    const values = a.Category.Values.map((category, i) => ({ category, value: a.Value.Values[i] }));
    const mark = { type: 'bar', color: style.Color } as const;

    if (style.Horizontal) {
      return {
        $schema: SCHEMA,
        title: style.Title,
        width: settings.Width,
        height: settings.Height,
        background: 'white',
        config: { font: settings.FontFamily },
        data: { values },
        mark,
        encoding: {
          y: { field: 'category', type: categorical ? 'nominal' : 'ordinal', sort: null, title: style.XLabel },
          x: { field: 'value', type: 'quantitative', title: style.YLabel },
        },
      };
    }

    return {
      $schema: SCHEMA,
      title: style.Title,
      width: settings.Width,
      height: settings.Height,
      background: 'white',
      config: { font: settings.FontFamily },
      data: { values },
      mark,
      encoding: {
        x: {
          field: 'category',
          type: categorical ? 'nominal' : 'ordinal',
          sort: null,
          title: style.XLabel,
          axis: { labelAngle: categorical ? -45 : 0 },
        },
        y: { field: 'value', type: 'quantitative', title: style.YLabel },
      },
    };
  }

  /**
   * Categorical categories sit at positions 0..n-1 and only lend their text to the
   * tick labels; numeric categories are plotted by value.
   */
  private static line(a: CategoryValueAssignment, style: LineStyle, settings: RenderSettings): TopLevelSpec {
    const shape = ChartSpecBuilder.MarkerShape(style.Marker);
    const mark = {
      type: 'line',
      color: style.Color,
      strokeDash: DASHES[style.LineStyle],
      point: shape ? { shape, filled: true, size: 40, color: style.Color } : false,
    } as const;
    const y = { field: 'value', type: 'quantitative', title: style.YLabel } as const;

    if (a.Category.Kind === 'categorical') {
      const positions = a.Category.Values.map((_, i) => i);
      const labels = a.Category.Values.map(cell => (cell === null ? '' : String(cell)));
      return {
        $schema: SCHEMA,
        title: style.Title,
        width: settings.Width,
        height: settings.Height,
        background: 'white',
        config: { font: settings.FontFamily },
        data: { values: positions.map(position => ({ position, value: a.Value.Values[position] })) },
        mark,
        encoding: {
          x: {
            field: 'position',
            type: 'quantitative',
            title: style.XLabel,
            scale: { zero: false, nice: false },
            axis: { values: positions, labelExpr: `${JSON.stringify(labels)}[datum.value]` },
          },
          y,
        },
      };
    }

    return {
      $schema: SCHEMA,
      title: style.Title,
      width: settings.Width,
      height: settings.Height,
      background: 'white',
      config: { font: settings.FontFamily },
      data: { values: a.Category.Values.map((category, i) => ({ category, value: a.Value.Values[i] })) },
      mark,
      encoding: {
        x: { field: 'category', type: 'quantitative', title: style.XLabel, scale: { zero: false } },
        y,
      },
    };
  }

  private static histogram(a: HistogramAssignment, style: HistogramStyle, settings: RenderSettings): TopLevelSpec {
    const mark = {
      type: 'bar',
      color: style.Color,
      opacity: style.Alpha,
      stroke: 'black',
      strokeWidth: 0.5,
    } as const;
    const y = { field: 'count', type: 'quantitative', title: style.YLabel } as const;

    if (a.Path === 'continuous') {
      const last = a.BinEdges.length - 1;
      return {
        $schema: SCHEMA,
        title: style.Title,
        width: settings.Width,
        height: settings.Height,
        background: 'white',
        config: { font: settings.FontFamily },
        data: { values: a.Counts.map((count, i) => ({ start: a.BinEdges[i], end: a.BinEdges[i + 1], count })) },
        mark,
        encoding: {
          x: {
            field: 'start',
            type: 'quantitative',
            title: style.XLabel,
            scale: { domain: [a.BinEdges[0], a.BinEdges[last]], zero: false, nice: false },
          },
          x2: { field: 'end' },
          y,
        },
      };
    }

    const values = a.Path === 'discrete'
      ? a.Categories.map((category, i) => ({ category, count: a.Counts[i] }))
      : a.Categories.map((category, i) => ({ category, count: a.Totals[i] }));
    return {
      $schema: SCHEMA,
      title: style.Title,
      width: settings.Width,
      height: settings.Height,
      background: 'white',
      config: { font: settings.FontFamily },
      data: { values },
      mark,
      encoding: {
        x: { field: 'category', type: 'ordinal', sort: null, title: style.XLabel, axis: { labelAngle: 0 } },
        y,
      },
    };
  }

  /**
   * Slices run counter-clockwise from StartAngle (degrees from the positive x axis).
   * Vega measures theta clockwise from 12 o'clock, hence the reversed range.
   */
  private static pie(a: PieAssignment, style: PieStyle, settings: RenderSettings): TopLevelSpec {
    const total = a.Magnitudes.reduce((sum, m) => sum + m, 0);
    const start = ((90 - style.StartAngle) * Math.PI) / 180;
    const radius = Math.max(10, Math.min(settings.Width, settings.Height) / 2 - 40);
    const values = a.Labels.map((label, order) => ({
      label,
      value: a.Magnitudes[order],
      pct: style.Autopct ? AutopctFormatter.Format(style.Autopct, (a.Magnitudes[order] / total) * 100) : '',
      order,
    }));

    return {
      $schema: SCHEMA,
      title: style.Title,
      width: settings.Width,
      height: settings.Height,
      background: 'white',
      config: { font: settings.FontFamily, view: { stroke: null } },
      data: { values },
      encoding: {
        theta: { field: 'value', type: 'quantitative', stack: true, scale: { range: [start, start - 2 * Math.PI] } },
        order: { field: 'order', type: 'quantitative' },
        color: {
          field: 'label',
          type: 'nominal',
          sort: null,
          legend: null,
          scale: style.Colors && style.Colors.length > 0 ? { range: style.Colors } : { scheme: 'tableau10' },
        },
      },
      layer: [
        { mark: { type: 'arc', outerRadius: radius, stroke: 'white' } },
        {
          mark: { type: 'text', radius: radius + 20, fontSize: 12 },
          encoding: { text: { field: 'label', type: 'nominal' }, color: { value: 'black' } },
        },
        {
          mark: { type: 'text', radius: radius * 0.6, fontSize: 11 },
          encoding: { text: { field: 'pct', type: 'nominal' }, color: { value: 'black' } },
        },
      ],
    };
  }
}
