/**
 * Summarizer Configuration Section
 *
 * Context window bounds and the default summary level.
 */

import { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta } from '../types.js';
import {
  SUMMARY_LEVEL_NAMES,
  resolveSummaryLevelName,
} from '../../../services/summarization/levels.js';

const options = {
  maxContextParagraphs: {
    envKey: 'SUMMARIZER_CONTEXT_PARAGRAPHS',
    defaultValue: 3,
    description: 'Summary paragraphs carried forward into the next request.',
    schema: z.number().int().min(1),
    parse: 'int',
  },
  requestTokenBudget: {
    envKey: 'SUMMARIZER_REQUEST_TOKEN_BUDGET',
    defaultValue: 16000,
    description: 'Estimated input tokens a single request may use before context is evicted.',
    schema: z.number().int().min(1),
    parse: 'int',
  },
  defaultLevel: {
    envKey: 'SUMMARIZER_DEFAULT_LEVEL',
    defaultValue: 'verbose',
    description: 'Summary level used when the CLI is not given one.',
    schema: z.enum(SUMMARY_LEVEL_NAMES),
    // Accepts aliases; unknown names fall back to the default
    parse: (value: string | undefined, defaultValue: unknown) =>
      value ? (resolveSummaryLevelName(value.toLowerCase()) ?? defaultValue) : defaultValue,
  },
} satisfies Record<string, ConfigOptionMeta>;

export const summarizerSection = {
  name: 'summarizer',
  description: 'Incremental summarization configuration.',
  options,
  schema: z.object({
    maxContextParagraphs: options.maxContextParagraphs.schema,
    requestTokenBudget: options.requestTokenBudget.schema,
    defaultLevel: options.defaultLevel.schema,
  }),
} satisfies ConfigSectionMeta;
