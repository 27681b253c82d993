/**
 * Error classes
 */

export class DocdropError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid run configuration. Always fatal.
 */
export class ConfigurationError extends DocdropError {}

export class UnsupportedFormatError extends ConfigurationError {
  constructor(readonly format: string) {
    super(`Output format ${format} not supported`);
  }
}

/**
 * A source file could not be decoded or read.
 * Isolated to the group that contains the file.
 */
export class ExtractionError extends DocdropError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const details = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to extract ${path}: ${details}`, { cause });
  }
}

/**
 * Misuse of the stage chain
 */
export class PipelineError extends DocdropError {}

/**
 * A capability answered with something that cannot be used
 */
export class InvalidResponseError extends DocdropError {}
