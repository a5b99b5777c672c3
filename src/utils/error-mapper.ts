import { SummarizerError, ErrorCodes } from '../core/errors.js';
import { maskCredentials, sanitizeRecord } from './sanitize.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Known SummarizerError
  if (error instanceof SummarizerError) {
    return {
      message: maskCredentials(error.message),
      code: error.code,
      details: error.context ? sanitizeRecord(error.context) : undefined,
    };
  }

  // 2. Node system errors carry an errno-style code (ENOENT, EACCES, ...)
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return {
      message: maskCredentials(error.message),
      code: error.code,
    };
  }

  // 3. Standard errors
  if (error instanceof Error) {
    logger.warn({ error: error.message }, 'Unmapped internal error');
    return {
      message: maskCredentials(error.message),
      code: ErrorCodes.INTERNAL_ERROR,
    };
  }

  // 4. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: maskCredentials(String(error)),
    code: ErrorCodes.UNKNOWN_ERROR,
  };
}
