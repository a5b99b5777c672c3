/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Add the key to the section's object schema
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.retry.maxAttempts);
 */

import { z } from 'zod';
import { configRegistry, buildConfigFromRegistry, validateConfig } from './registry/index.js';

// =============================================================================
// CONFIG SCHEMA (built from registry sections)
// =============================================================================

const configSchema = z.object({
  logging: configRegistry.sections.logging.schema,
  backend: configRegistry.sections.backend.schema,
  retry: configRegistry.sections.retry.schema,
  summarizer: configRegistry.sections.summarizer.schema,
  runtime: configRegistry.sections.runtime.schema,
});

export type Config = z.infer<typeof configSchema>;
export type BackendConfig = Config['backend'];

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata and validate it.
 * Invalid environment values fail fast with every offending option listed.
 */
export function buildConfig(): Config {
  return validateConfig(buildConfigFromRegistry(configRegistry), configSchema);
}

// Create the singleton config instance
export const config: Config = buildConfig();

/**
 * Reload configuration from environment variables.
 * WARNING: This mutates the config object. Only use in tests.
 * Prefer using snapshotConfig/restoreConfig for test isolation.
 */
export function reloadConfig(): void {
  assignSections(buildConfig());
}

// =============================================================================
// TEST UTILITIES - Config snapshot and restore for test isolation
// =============================================================================

function assignSections(source: Config): void {
  Object.assign(config.logging, source.logging);
  Object.assign(config.backend, source.backend);
  Object.assign(config.retry, source.retry);
  Object.assign(config.summarizer, source.summarizer);
  Object.assign(config.runtime, source.runtime);
}

/**
 * Create a snapshot of the current config state.
 * Use with restoreConfig() for test isolation.
 */
export function snapshotConfig(): Config {
  return structuredClone(config);
}

/**
 * Restore config from a previously saved snapshot.
 * Does NOT modify environment variables - only the config object.
 */
export function restoreConfig(snapshot: Config): void {
  assignSections(snapshot);
}

/**
 * Run a test function with temporary environment variable overrides.
 * Automatically saves config state, applies env changes, and restores on completion.
 *
 * @param envOverrides - Environment variables to set (use undefined to delete)
 *
 * @example
 * await withTestEnv({ SUMMARIZER_RETRY_MAX_ATTEMPTS: '2' }, () => {
 *   expect(config.retry.maxAttempts).toBe(2);
 * });
 */
export async function withTestEnv<T>(
  envOverrides: Record<string, string | undefined>,
  testFn: () => T | Promise<T>
): Promise<T> {
  const configSnapshot = snapshotConfig();
  const envSnapshot: Record<string, string | undefined> = {};

  for (const key of Object.keys(envOverrides)) {
    envSnapshot[key] = process.env[key];
  }

  const applyEnv = (values: Record<string, string | undefined>): void => {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  };

  try {
    applyEnv(envOverrides);
    reloadConfig();
    return await testFn();
  } finally {
    applyEnv(envSnapshot);
    restoreConfig(configSnapshot);
  }
}

// Re-export registry for documentation generation
export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';

export default config;
