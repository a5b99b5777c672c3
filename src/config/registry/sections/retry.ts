/**
 * Retry Configuration Section
 *
 * Backoff settings for throttled and timed-out completion requests.
 */

import { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta } from '../types.js';

const options = {
  maxAttempts: {
    envKey: 'SUMMARIZER_RETRY_MAX_ATTEMPTS',
    defaultValue: 5,
    description: 'Maximum attempts per chunk request, including the first.',
    schema: z.number().int().min(1),
    parse: 'int',
  },
  timeoutDelayMs: {
    envKey: 'SUMMARIZER_RETRY_TIMEOUT_DELAY_MS',
    defaultValue: 5000,
    description: 'Fixed delay before resubmitting a request that timed out.',
    schema: z.number().int().min(0),
    parse: 'int',
  },
} satisfies Record<string, ConfigOptionMeta>;

export const retrySection = {
  name: 'retry',
  description: 'Completion retry configuration.',
  options,
  schema: z.object({
    maxAttempts: options.maxAttempts.schema,
    timeoutDelayMs: options.timeoutDelayMs.schema,
  }),
} satisfies ConfigSectionMeta;
