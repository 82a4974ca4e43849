// ErrorHelper.ts
// Error log lines in the same Cloud Logging shape LogHelper writes

import { ChartError, ChartRenderError } from './ChartErrors.js';
import { LogHelper } from './LogHelper.js';

export class ErrorHelper {
  /**
   * One-line JSON log entry for a thrown value.
   * ChartErrors are expected input problems and are logged without a stack;
   * anything else keeps its stack. A render failure also records its cause.
   */
  static formatForCloud(err: unknown, context?: string): string {
    const logObj: Record<string, unknown> = {
      severity: 'ERROR',
      message: ErrorHelper.describe(err),
      filter: LogHelper.FILTER,
    };
    if (err instanceof Error) logObj.errorType = err.name;
    if (err instanceof ChartRenderError && err.Cause !== undefined) {
      logObj.cause = ErrorHelper.describe(err.Cause);
    }
    if (context) logObj.context = context;
    return JSON.stringify(logObj);
  }

  static LogErrorForCloud(err: unknown, context?: string): void {
    if (LogHelper.IsSilent()) return;
    console.error(ErrorHelper.formatForCloud(err, context));
  }

  /** Message text of an unknown thrown value, as shown to tool callers. */
  static MessageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
  }

  private static describe(err: unknown): string {
    if (err instanceof ChartError) return err.message;
    if (err instanceof Error) return err.stack ?? err.message;
    if (typeof err === 'string') return err;
    try {
      return JSON.stringify(err) ?? String(err);
    } catch {
      return String(err);
    }
  }
}
