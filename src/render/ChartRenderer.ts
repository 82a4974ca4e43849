import type { BarStyle, HistogramStyle, LineStyle, PieStyle } from '../interfaces/ChartRequest.js';
import type { CategoryValueAssignment, HistogramAssignment, PieAssignment } from '../interfaces/RoleAssignment.js';

/** A resolved assignment paired with the style parameters of the same chart kind. */
export type RenderJob =
  | { Kind: 'bar'; Assignment: CategoryValueAssignment; Style: BarStyle }
  | { Kind: 'line'; Assignment: CategoryValueAssignment; Style: LineStyle }
  | { Kind: 'histogram'; Assignment: HistogramAssignment; Style: HistogramStyle }
  | { Kind: 'pie'; Assignment: PieAssignment; Style: PieStyle };

export interface ChartRenderer {
  /** Draw the job and return PNG bytes. */
  Render(job: RenderJob): Promise<Buffer>;
}
