export interface ConfigIssue {
  /** Dotted path of the offending value, e.g. `noiseLayers[1].scaleX`. */
  field: string;
  constraint: string;
}

/**
 * Raised before any pixel is computed when a configuration cannot be rendered.
 */
export class ConfigurationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(formatIssues(issues));
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static single(field: string, constraint: string): ConfigurationError {
    return new ConfigurationError([{ field, constraint }]);
  }
}

function formatIssues(issues: ConfigIssue[]): string {
  if (issues.length === 0) return 'Invalid configuration';
  const lines = issues.map((issue) => `${issue.field}: ${issue.constraint}`);
  return `Invalid configuration (${issues.length} issue${issues.length === 1 ? '' : 's'}): ${lines.join('; ')}`;
}
