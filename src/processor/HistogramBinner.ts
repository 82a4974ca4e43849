import { RoleAssignmentError } from '../utils/ChartErrors.js';

export interface BinnedValues {
  BinEdges: number[];
  Counts: number[];
}

export class HistogramBinner {
  /**
   * Split values into `bins` equal-width bins over [min, max].
   * Every bin is half-open except the last, which also takes `max`.
   * A constant series is widened to [v - 0.5, v + 0.5] so the bins have width.
   * Throws RoleAssignmentError when max - min is not a finite number.
   */
  public static Bin(values: number[], bins: number): BinnedValues {
    let min = values.reduce((a, b) => Math.min(a, b), Infinity);
    let max = values.reduce((a, b) => Math.max(a, b), -Infinity);
    if (min === max) {
      min -= 0.5;
      max += 0.5;
    }

    const span = max - min;
    if (!Number.isFinite(span)) {
      throw new RoleAssignmentError(`values from ${min} to ${max} span too wide a range to bin`);
    }

    const width = span / bins;
    const edges: number[] = [];
    for (let i = 0; i < bins; i++) {
      edges.push(min + i * width);
    }
    edges.push(max);

    const counts = new Array<number>(bins).fill(0);
    for (const v of values) {
      const index = Math.min(bins - 1, Math.floor(((v - min) / span) * bins));
      counts[index]++;
    }

    return { BinEdges: edges, Counts: counts };
  }
}
