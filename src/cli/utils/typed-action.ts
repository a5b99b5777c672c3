/**
 * Typed option parsing for Commander.js
 *
 * Commander hands actions loosely typed option bags. Options are validated
 * with zod so handlers work with real types.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { z } from 'zod';
import { createValidationError } from '../../core/errors.js';
import type { OutputFormat } from './output.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export interface GlobalOptions {
  format: OutputFormat;
}

const globalOptionsSchema = z.object({
  format: z.enum(['json', 'table']).default('json'),
});

export function parseGlobalOptions(cmd: Command): GlobalOptions {
  return parseOptions(globalOptionsSchema, cmd.optsWithGlobals());
}

/**
 * Validate a Commander option bag against a schema
 *
 * @throws SummarizerError listing every invalid option
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issues = result.error.errors.map(
      (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`
    );
    throw createValidationError('options', issues.join('; '));
  }
  return result.data;
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
