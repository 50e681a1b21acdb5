/**
 * Error types raised by the extraction pipeline.
 *
 * Every error that aborts a dataset is an ExtractionError. Navigation misses
 * inside a decoded document are not errors and never reach this module.
 */

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/** The parent directory name does not follow the `<integer>th...` convention. */
export class IndexParseError extends ExtractionError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INDEX_PARSE_FAILED', context);
    this.name = 'IndexParseError';
  }
}

export class DocumentReadError extends ExtractionError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'DOCUMENT_READ_FAILED', context, options);
    this.name = 'DocumentReadError';
  }
}

export class DocumentDecodeError extends ExtractionError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'DOCUMENT_DECODE_FAILED', context, options);
    this.name = 'DocumentDecodeError';
  }
}

export class OutputWriteError extends ExtractionError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'OUTPUT_WRITE_FAILED', context, options);
    this.name = 'OutputWriteError';
  }
}

export class ConfigError extends ExtractionError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_CONFIG', context);
    this.name = 'ConfigError';
  }
}

/**
 * Render any thrown value as a single operator-facing line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
