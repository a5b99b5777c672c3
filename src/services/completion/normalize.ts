/**
 * Completion outcome normalization
 *
 * Providers report throttling and timeouts in different shapes: HTTP status
 * codes, SDK error classes, abort errors, or plain text in the response body.
 * These helpers turn all of them into a CompletionOutcome so the retry
 * controller only branches on a closed set of cases.
 */

import type { CompletionOutcome } from './types.js';

/** Phrase backends use when throttling, e.g. "exceeded token rate limit" */
export const RATE_LIMIT_PATTERN = /exceeded (?:token |call |request )?rate limit/i;

/** Delay hint inside a throttling message, e.g. "Please retry after 6 seconds" */
export const RETRY_AFTER_PATTERN = /retry after (\d+)/i;

/** Transport timeout phrase, e.g. "Request timed out" */
const TIMEOUT_PATTERN = /\btimed out\b/i;
const TIMEOUT_ERROR_NAMES = new Set(['AbortError', 'TimeoutError', 'APIConnectionTimeoutError']);

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Read a header from either a fetch Headers object or a plain record,
 * as the SDK error classes expose them.
 */
export function readHeader(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (typeof headers !== 'object' || headers === null) return undefined;

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Seconds to wait, from a retry-after header value or a throttling message.
 * Returns null when neither carries a usable number.
 */
export function parseRetryAfterSeconds(
  headerValue: string | undefined,
  message: string
): number | null {
  if (headerValue !== undefined) {
    const seconds = Number(headerValue.trim());
    if (headerValue.trim() !== '' && Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds);
    }
  }

  const match = RETRY_AFTER_PATTERN.exec(message);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

export function isRateLimitMessage(message: string): boolean {
  return RATE_LIMIT_PATTERN.test(message);
}

/**
 * Classify a thrown SDK or transport error
 */
export function classifyCompletionError(error: unknown): CompletionOutcome {
  const message = errorMessage(error);
  const status = readStatus(error);

  if (status === 429 || isRateLimitMessage(message)) {
    const headers =
      typeof error === 'object' && error !== null && 'headers' in error ? error.headers : undefined;
    return {
      kind: 'rate_limited',
      retryAfterSeconds: parseRetryAfterSeconds(readHeader(headers, 'retry-after'), message),
      message,
    };
  }

  // Timeout text only counts when no HTTP status came back
  const isTimeoutError = error instanceof Error && TIMEOUT_ERROR_NAMES.has(error.name);
  const isTimeoutText = status === undefined && TIMEOUT_PATTERN.test(message);
  if (isTimeoutError || status === 408 || isTimeoutText) {
    return { kind: 'timeout', message };
  }

  return { kind: 'service_error', message };
}

/**
 * Classify a completion body. Some gateways return the throttling notice as
 * the generated text instead of an error status.
 */
export function classifyResponseText(text: string): CompletionOutcome {
  if (isRateLimitMessage(text)) {
    return {
      kind: 'rate_limited',
      retryAfterSeconds: parseRetryAfterSeconds(undefined, text),
      message: text,
    };
  }
  return { kind: 'success', text };
}
