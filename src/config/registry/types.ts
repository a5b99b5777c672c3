/**
 * Config Registry Type Definitions
 *
 * Provides metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for common env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int'; // parseInt

/**
 * Custom parser function type
 */
export type CustomParser = (envValue: string | undefined, defaultValue: unknown) => unknown;

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta {
  /** Environment variable key (e.g., 'SUMMARIZER_MODEL') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: unknown;

  /** Description for documentation */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodTypeAny;

  /** Parser type or custom parser function */
  parse?: ParserType | CustomParser;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];

  /** Whether this is a sensitive value (keys) - hidden in docs */
  sensitive?: boolean;
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options).
 *
 * `schema` is the section's object schema; it must list the same keys as
 * `options` and is what gives the built config its static type.
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'backend', 'retry') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;

  schema: z.AnyZodObject;
}

// =============================================================================
// CONFIG REGISTRY TYPE
// =============================================================================

/**
 * Complete registry of all configuration options
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
