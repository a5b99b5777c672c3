/**
 * Logging Configuration Section
 *
 * Log level and debug settings.
 */

import { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta } from '../types.js';

const options = {
  level: {
    envKey: 'LOG_LEVEL',
    defaultValue: 'info',
    description: 'Log level: fatal, error, warn, info, debug, trace, or silent.',
    schema: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    allowedValues: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
  },
  debug: {
    envKey: 'SUMMARIZER_DEBUG',
    defaultValue: false,
    description: 'Enable debug logging, which includes each prompt and raw completion.',
    schema: z.boolean(),
  },
} satisfies Record<string, ConfigOptionMeta>;

export const loggingSection = {
  name: 'logging',
  description: 'Logging configuration.',
  options,
  schema: z.object({
    level: options.level.schema,
    debug: options.debug.schema,
  }),
} satisfies ConfigSectionMeta;
