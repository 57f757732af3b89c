/**
 * Raised when a stage starts without the destinations it needs.
 * Fatal for the whole invocation: no record is touched.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly variables: readonly string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Raised by a trip source when the input file does not exist. Fatal for a producer run. */
export class SourceNotFoundError extends Error {
  constructor(readonly sourcePath: string) {
    super(`File '${sourcePath}' not found.`);
    this.name = 'SourceNotFoundError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
