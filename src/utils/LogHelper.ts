
/** Log formatting helpers for structured Cloud Logging. */

import { ChartsmithSettings } from './ChartsmithSettings.js';

export class LogHelper {
  static readonly FILTER = 'Chartsmith';

  /** True when `logging.level` is "silent" (the test config sets this). */
  static IsSilent(): boolean {
    return ChartsmithSettings.Load().Logging.Level === 'silent';
  }

  /** Build the structured log object for a message and optional key-value params. */
  static FormatForCloud(message: string, params?: Record<string, unknown>, severity: 'INFO' | 'WARNING' = 'INFO'): string {
    const logObj: Record<string, unknown> = {
      severity,
      message,
      filter: LogHelper.FILTER,
    };

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        try {
          if (value instanceof Error) {
            logObj[key] = value.stack || value.message;
          } else if (typeof value === 'object' && value !== null) {
            // Ensure we have a plain JSON serializable object/value
            logObj[key] = JSON.parse(JSON.stringify(value));
          } else {
            logObj[key] = value;
          }
        } catch {
          logObj[key] = String(value);
        }
      }
    }

    return JSON.stringify(logObj);
  }

  static LogForCloud(message: string, params?: Record<string, unknown>): void {
    if (LogHelper.IsSilent()) return;
    console.log(LogHelper.FormatForCloud(message, params));
  }

  static WarnForCloud(message: string, params?: Record<string, unknown>): void {
    if (LogHelper.IsSilent()) return;
    console.warn(LogHelper.FormatForCloud(message, params, 'WARNING'));
  }
}
