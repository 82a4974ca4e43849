/**
 * Errors raised while turning a chart request into an image. Each one ends the
 * current tool call; the message is reported to the caller as-is.
 */
export class ChartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raw input could not be turned into a table. */
export class DataFormatError extends ChartError {}

/** A table exists but no column assignment satisfies the chart kind. */
export class RoleAssignmentError extends ChartError {}

/** The renderer failed to produce an image. */
export class ChartRenderError extends ChartError {
  public readonly Cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.Cause = cause;
  }
}
