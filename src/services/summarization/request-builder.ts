/**
 * Request Builder
 *
 * Assembles the prompt for one chunk: the level's instructions, an optional
 * caller-supplied addition, the carried-forward summary and the chunk text.
 */

import type { SummaryLevel } from './levels.js';

export const PREVIOUS_SUMMARY_LABEL = '[PREVIOUS_SUMMARY]';
export const CURRENT_CHUNK_LABEL = '[CURRENT_CHUNK]';

export interface PromptInput {
  level: SummaryLevel;
  /** Resident window paragraphs, oldest first */
  context: readonly string[];
  chunk: string;
  customPrompt?: string;
}

/**
 * Rough token estimate (1 token ~ 4 characters)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function buildPrompt(input: PromptInput): string {
  const { level, context, chunk, customPrompt } = input;

  const instructions = customPrompt?.trim()
    ? `${level.prompt}\n\n${customPrompt.trim()}`
    : level.prompt;

  if (!level.includeContext) {
    return `${instructions}\n\n${CURRENT_CHUNK_LABEL}\n${chunk}`;
  }

  return [
    instructions,
    `${PREVIOUS_SUMMARY_LABEL}\n${context.join('\n\n')}`,
    `${CURRENT_CHUNK_LABEL}\n${chunk}`,
  ].join('\n\n');
}
