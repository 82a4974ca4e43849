import type { ChartRequest } from '../interfaces/ChartRequest.js';
import type { RoleAssignment } from '../interfaces/RoleAssignment.js';
import type { ChartRenderer, RenderJob } from '../render/ChartRenderer.js';
import type { HistogramSettings } from '../utils/ChartsmithSettings.js';
import { LogHelper } from '../utils/LogHelper.js';
import { DataNormalizer } from './DataNormalizer.js';
import { RoleResolver } from './RoleResolver.js';

export interface ChartResult {
  Assignment: RoleAssignment;
  Png: Buffer;
}

/**
 * normalize -> resolve -> render for one chart request. Holds only its collaborators;
 * every call parses its own table.
 */
export class ChartService {
  private readonly renderer: ChartRenderer;
  private readonly histogram: HistogramSettings;

  constructor(renderer: ChartRenderer, histogram: HistogramSettings) {
    this.renderer = renderer;
    this.histogram = histogram;
  }

  /** Normalize and resolve without rendering. Throws DataFormatError or RoleAssignmentError. */
  public Prepare(request: ChartRequest): RenderJob {
    const table = DataNormalizer.Normalize(request.Data);

    let job: RenderJob;
    switch (request.Kind) {
      case 'bar':
      case 'line': {
        const assignment = RoleResolver.ResolveCategoryValue(table, request.Kind, request.Hints);
        job = request.Kind === 'bar'
          ? { Kind: 'bar', Assignment: assignment, Style: request.Style }
          : { Kind: 'line', Assignment: assignment, Style: request.Style };
        break;
      }
      case 'histogram':
        job = {
          Kind: 'histogram',
          Assignment: RoleResolver.ResolveHistogram(table, request.Hints, {
            Bins: request.Bins,
            DefaultBins: this.histogram.DefaultBins,
            DiscreteThreshold: this.histogram.DiscreteThreshold,
            GroupByCategory: this.histogram.GroupByCategory,
          }),
          Style: request.Style,
        };
        break;
      case 'pie':
        job = { Kind: 'pie', Assignment: RoleResolver.ResolvePie(table, request.Hints), Style: request.Style };
        break;
    }

    LogHelper.LogForCloud(`${request.Kind} chart roles resolved`, {
      rows: table.RowCount,
      columns: table.ColumnNames,
      roles: ChartService.DescribeRoles(job.Assignment),
    });
    for (const warning of job.Assignment.Warnings) {
      LogHelper.WarnForCloud(warning, { kind: request.Kind });
    }
    return job;
  }

  public async CreateChart(request: ChartRequest): Promise<ChartResult> {
    const job = this.Prepare(request);
    const png = await this.renderer.Render(job);
    return { Assignment: job.Assignment, Png: png };
  }

  /** Short role summary for logs, e.g. "x=category, y=value". */
  public static DescribeRoles(assignment: RoleAssignment): string {
    switch (assignment.Kind) {
      case 'bar':
      case 'line':
        return `x=${assignment.Category.Synthetic ? '(index)' : assignment.Category.Name} (${assignment.Category.Kind}), y=${assignment.Value.Name}`;
      case 'pie':
        return `labels=${assignment.SyntheticLabels ? '(generated)' : assignment.LabelsName}, values=${assignment.MagnitudesName}`;
      case 'histogram':
        switch (assignment.Path) {
          case 'continuous':
            return `continuous column=${assignment.ColumnName} bins=${assignment.Bins}`;
          case 'discrete':
            return `discrete column=${assignment.ColumnName} (${assignment.ColumnKind})`;
          case 'grouped':
            return `grouped by=${assignment.GroupColumnName} values=${assignment.ValueColumnName}`;
        }
    }
  }
}
