/**
 * Sanitization utilities for logging
 * Keeps provider credentials out of log lines and CLI error output.
 */

/**
 * Key names whose values are always redacted
 */
const SENSITIVE_KEY_PATTERNS = [
  /api[-_]?key/i,
  /^token$/i,
  /(?:access|refresh|auth|bearer)[-_]?token/i,
  /secret/i,
  /password/i,
  /authorization/i,
];

/**
 * Credential formats used by the supported completion providers
 */
const CREDENTIAL_PATTERNS = [
  // Anthropic API keys: sk-ant-... (checked before the generic sk- form)
  /sk-ant-[a-zA-Z0-9\-_]{20,}/g,

  // OpenAI API keys: sk-... (including project keys sk-proj-...)
  /sk-[a-zA-Z0-9\-_]{20,}/g,

  // Azure OpenAI resource keys (32 hex characters)
  /\b[a-f0-9]{32}\b/g,

  // Bearer tokens
  /bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,

  // JWT tokens (Azure AD access tokens)
  /eyJ[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}\.[a-zA-Z0-9_-]{10,}/g,
];

/**
 * Redaction placeholder
 */
export const REDACTED = '***REDACTED***';

/**
 * Sanitize a value for safe logging.
 * Recursively processes objects and arrays.
 */
export function sanitizeForLogging(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return maskCredentials(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLogging(item));
  }

  if (value instanceof Error) {
    return sanitizeError(value);
  }

  if (typeof value === 'object') {
    return sanitizeRecord(value);
  }

  return value;
}

/**
 * Sanitize the own properties of an object, such as an error context
 */
export function sanitizeRecord(value: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeForLogging(val);
  }
  return sanitized;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Mask credentials inside free text, keeping a short prefix for context
 */
export function maskCredentials(str: string): string {
  let masked = str;

  for (const pattern of CREDENTIAL_PATTERNS) {
    masked = masked.replace(pattern, (match) => `${match.substring(0, 3)}...${REDACTED}`);
  }

  return masked;
}

/**
 * Sanitize error objects for logging.
 * Preserves name, message and stack while masking credentials.
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: maskCredentials(error.message),
    stack: error.stack ? maskCredentials(error.stack) : undefined,
    ...Object.fromEntries(
      Object.entries(error).map(([key, value]) => [
        key,
        isSensitiveKey(key) ? REDACTED : sanitizeForLogging(value),
      ])
    ),
  };
}
