/**
 * Zod Schema Builder
 *
 * Builds config values from registry metadata and validates them with the
 * section schemas. Also provides documentation helpers.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString } from './parsers.js';
import { createConfigError } from '../../core/errors.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

/**
 * Validate a config object against a schema.
 * Returns the parsed config or throws with clear error messages.
 */
export function validateConfig<T extends z.ZodTypeAny>(config: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(config);

  if (!result.success) {
    throw createConfigError(formatZodErrors(result.error));
  }

  return result.data;
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

/**
 * Get a human-readable type string from a Zod schema.
 */
export function getZodTypeString(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional) {
    return `${getZodTypeString(schema.unwrap())} (optional)`;
  }
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((v: string) => `\`${v}\``).join(' | ');
  }
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';

  return 'unknown';
}

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  type: string;
  sensitive: boolean;
  section: string;
}

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDoc[] {
  const envVars: EnvVarDoc[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        type: getZodTypeString(option.schema),
        sensitive: option.sensitive ?? false,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodTypeAny): ParserType {
  if (schema instanceof z.ZodOptional) return inferParserFromSchema(schema.unwrap());
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNumber) return 'number';

  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 * The result is not trusted; the section schema validates it afterwards.
 */
export function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  // If custom parser function is provided, use it
  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);

    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : NaN);

    case 'string':
      if (option.allowedValues) {
        return parseString(envValue, String(defaultValue), option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
export function buildSectionFromRegistry(section: ConfigSectionMeta): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, process.env[option.envKey]);
  }

  return result;
}

/**
 * Build raw config values from registry metadata.
 * This is the single source of truth - no manual env var reading needed.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section);
  }

  return result;
}
