/**
 * The audit could not persist its report. The run is void.
 */
export class ReportPersistError extends Error {
  constructor(
    public readonly targetPath: string,
    public readonly cause?: unknown
  ) {
    super(`Failed to persist audit report to ${targetPath}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'ReportPersistError';
  }
}

/**
 * Configuration failed validation before an audit started
 */
export class ConfigValidationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}
