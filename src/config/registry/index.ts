/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { loggingSection } from './sections/logging.js';
import { backendSection } from './sections/backend.js';
import { retrySection } from './sections/retry.js';
import { summarizerSection } from './sections/summarizer.js';
import { runtimeSection } from './sections/runtime.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry = {
  sections: {
    logging: loggingSection,
    backend: backendSection,
    retry: retrySection,
    summarizer: summarizerSection,
    runtime: runtimeSection,
  },
} satisfies ConfigRegistry;

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export {
  validateConfig,
  getAllEnvVars,
  buildConfigFromRegistry,
  buildSectionFromRegistry,
  parseEnvValue,
  formatZodErrors,
} from './schema-builder.js';
