/**
 * Core error definitions
 *
 * All error classes, codes, and factory functions used by the engine, the
 * completion providers, the text sources and the CLI.
 */

export class SummarizerError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SummarizerError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_PARAMETER: 'E1001',
  INVALID_CONFIG: 'E1002',

  // Input errors (2000-2999)
  EXTRACTION_FAILED: 'E2000',
  UNSUPPORTED_SOURCE: 'E2001',

  // Output errors (3000-3999)
  OUTPUT_REMOVE_FAILED: 'E3000',
  OUTPUT_WRITE_FAILED: 'E3001',

  // Backend errors (4000-4999)
  SERVICE_ERROR: 'E4000',
  UNKNOWN_SERVICE_ERROR: 'E4001',
  RETRIES_EXHAUSTED: 'E4002',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
} as const;

/** Failure classes the retry controller can recover from */
export type RetryableFailureKind = 'rate_limited' | 'timeout';

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Raised when source text cannot be read, downloaded or decoded.
 */
export class ExtractionError extends SummarizerError {
  constructor(
    public readonly source: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(`Failed to extract text from ${source}: ${message}`, ErrorCodes.EXTRACTION_FAILED, {
      ...context,
      source,
    });
    this.name = 'ExtractionError';
  }
}

/**
 * Backend rejected the request with an error that has no retry policy.
 */
export class ServiceError extends SummarizerError {
  constructor(
    public readonly provider: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(`${provider} request failed: ${message}`, ErrorCodes.SERVICE_ERROR, {
      ...context,
      provider,
    });
    this.name = 'ServiceError';
  }
}

/**
 * Backend signalled throttling without saying how long to wait.
 */
export class UnknownServiceError extends SummarizerError {
  constructor(
    public readonly backendMessage: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Unrecognized rate limit response from backend: ${backendMessage}`,
      ErrorCodes.UNKNOWN_SERVICE_ERROR,
      { ...context, backendMessage }
    );
    this.name = 'UnknownServiceError';
  }
}

/**
 * Retry exhausted error, tagged with the failure class that used up the attempts
 */
export class RetriesExhaustedError extends SummarizerError {
  constructor(
    public readonly failureKind: RetryableFailureKind,
    public readonly attempts: number,
    public readonly lastMessage: string,
    context?: Record<string, unknown>
  ) {
    const label = failureKind === 'timeout' ? 'Timeout error' : 'Rate limit error';
    super(
      `${label}. All ${attempts} attempts failed: ${lastMessage}`,
      ErrorCodes.RETRIES_EXHAUSTED,
      { ...context, failureKind, attempts, lastMessage }
    );
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * Output file could not be prepared or written
 */
export class OutputError extends SummarizerError {
  constructor(
    public readonly outputPath: string,
    message: string,
    code: string = ErrorCodes.OUTPUT_WRITE_FAILED,
    context?: Record<string, unknown>
  ) {
    super(`${message}: ${outputPath}`, code, { ...context, outputPath });
    this.name = 'OutputError';
  }
}

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): SummarizerError {
  return new SummarizerError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.INVALID_PARAMETER,
    { field, suggestion }
  );
}

/**
 * Create a configuration error listing every invalid option
 */
export function createConfigError(issues: string[]): SummarizerError {
  return new SummarizerError(
    `Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    ErrorCodes.INVALID_CONFIG,
    { issues, suggestion: 'Check the environment variables listed above' }
  );
}

/**
 * Create an error for a source location no registered text source accepts
 */
export function createUnsupportedSourceError(location: string): SummarizerError {
  return new SummarizerError(`No text source can read ${location}`, ErrorCodes.UNSUPPORTED_SOURCE, {
    location,
    suggestion: 'Use a URL, a .pdf or .docx document, or a plain text file',
  });
}
