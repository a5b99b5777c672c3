/**
 * Summary Levels
 *
 * A level bundles chunk size, output token budget and prompt template, and
 * decides whether prior summary paragraphs are sent with each chunk.
 */

import { LEVEL_PROMPTS } from './prompts.js';
import { createValidationError } from '../../core/errors.js';

export const SUMMARY_LEVEL_NAMES = ['verbose', 'concise', 'terse', 'simple', 'transcribe'] as const;

export type SummaryLevelName = (typeof SUMMARY_LEVEL_NAMES)[number];

export interface SummaryLevel {
  name: SummaryLevelName;
  /** Characters of source text per request */
  chunkSize: number;
  /** Requested output token budget */
  maxOutputTokens: number;
  /** Instruction template */
  prompt: string;
  /** False for stateless levels that transform each chunk on its own */
  includeContext: boolean;
}

export const SUMMARY_LEVELS: Record<SummaryLevelName, SummaryLevel> = {
  verbose: {
    name: 'verbose',
    chunkSize: 20000,
    maxOutputTokens: 10000,
    prompt: LEVEL_PROMPTS.verbose,
    includeContext: true,
  },
  concise: {
    name: 'concise',
    chunkSize: 20000,
    maxOutputTokens: 5000,
    prompt: LEVEL_PROMPTS.concise,
    includeContext: true,
  },
  terse: {
    name: 'terse',
    chunkSize: 20000,
    maxOutputTokens: 1000,
    prompt: LEVEL_PROMPTS.terse,
    includeContext: true,
  },
  simple: {
    name: 'simple',
    chunkSize: 5000,
    maxOutputTokens: 3000,
    prompt: LEVEL_PROMPTS.simple,
    includeContext: true,
  },
  transcribe: {
    name: 'transcribe',
    chunkSize: 10000,
    maxOutputTokens: 10000,
    prompt: LEVEL_PROMPTS.transcribe,
    includeContext: false,
  },
};

/** Earlier names still accepted wherever a level name is */
export const SUMMARY_LEVEL_ALIASES: ReadonlyMap<string, SummaryLevelName> = new Map([
  ['barney', 'simple'],
]);

/** Every name a user may pass, aliases included */
export const SUMMARY_LEVEL_CHOICES: readonly string[] = [
  ...SUMMARY_LEVEL_NAMES,
  ...SUMMARY_LEVEL_ALIASES.keys(),
];

export function isSummaryLevelName(value: string): value is SummaryLevelName {
  return SUMMARY_LEVEL_NAMES.some((name) => name === value);
}

export function resolveSummaryLevelName(value: string): SummaryLevelName | undefined {
  return isSummaryLevelName(value) ? value : SUMMARY_LEVEL_ALIASES.get(value);
}

/**
 * Look up a level by name
 *
 * @throws SummarizerError when the name is not a known level
 */
export function getSummaryLevel(name: string): SummaryLevel {
  const resolved = resolveSummaryLevelName(name);
  if (resolved === undefined) {
    throw createValidationError(
      'summaryLevel',
      `unknown level "${name}"`,
      `Use one of: ${SUMMARY_LEVEL_NAMES.join(', ')}`
    );
  }
  return SUMMARY_LEVELS[resolved];
}
