/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// PROJECT ROOT
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const projectRoot = resolve(__dirname, '../../..');

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  if (allowedValues && !allowedValues.includes(lower)) {
    return defaultValue;
  }
  return lower;
}

// =============================================================================
// PROVIDER DETECTION
// =============================================================================

/**
 * Determine the completion provider.
 * An explicit SUMMARIZER_PROVIDER wins; otherwise the first configured
 * credential decides (Azure > OpenAI > Anthropic), falling back to openai.
 */
export function getCompletionProvider(): 'openai' | 'azure' | 'anthropic' | 'ollama' {
  const providerEnv = process.env.SUMMARIZER_PROVIDER?.toLowerCase();
  if (providerEnv === 'ollama') return 'ollama';
  if (providerEnv === 'anthropic') return 'anthropic';
  if (providerEnv === 'azure') return 'azure';
  if (providerEnv === 'openai') return 'openai';
  if (process.env.AZURE_OPENAI_ENDPOINT) return 'azure';
  if (process.env.SUMMARIZER_OPENAI_API_KEY) return 'openai';
  if (process.env.SUMMARIZER_ANTHROPIC_API_KEY) return 'anthropic';
  return 'openai';
}
