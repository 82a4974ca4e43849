// %% or a printf conversion: optional "-", width, ".precision", then d, i or f.
const FORMAT_PATTERN = /%(?:(%)|(-?)(\d*)(?:\.(\d+))?([dif]))/g;

export class AutopctFormatter {
  /**
   * Format a slice percentage (0-100) with a printf-style pattern.
   *
   * Examples:
   * ```ts
   * AutopctFormatter.Format('%1.1f%%', 100 / 3) // => '33.3%'
   * AutopctFormatter.Format('%d%%', 62.5)       // => '62%'
   * ```
   */
  public static Format(pattern: string, percent: number): string {
    return pattern.replace(
      FORMAT_PATTERN,
      (_match: string, literal: string | undefined, leftAlign: string, width: string, precision: string | undefined, conversion: string) => {
        if (literal) return '%';
        const text = conversion === 'f'
          ? percent.toFixed(precision === undefined ? 6 : Number(precision))
          : String(Math.trunc(percent));
        const minWidth = width ? Number(width) : 0;
        return leftAlign ? text.padEnd(minWidth) : text.padStart(minWidth);
      }
    );
  }
}
