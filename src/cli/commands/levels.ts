/**
 * Levels CLI Command
 *
 * List the built-in summary levels.
 */

import { Command } from 'commander';
import { SUMMARY_LEVELS } from '../../services/summarization/levels.js';
import { handleCliError } from '../utils/errors.js';
import { formatOutput } from '../utils/output.js';
import { parseGlobalOptions } from '../utils/typed-action.js';

export function listLevels(): Array<{
  name: string;
  chunkSize: number;
  maxOutputTokens: number;
  includeContext: boolean;
}> {
  return Object.values(SUMMARY_LEVELS).map(({ name, chunkSize, maxOutputTokens, includeContext }) => ({
    name,
    chunkSize,
    maxOutputTokens,
    includeContext,
  }));
}

export function addLevelsCommand(program: Command): void {
  program
    .command('levels')
    .description('List summary levels with their chunk sizes and output budgets')
    .action((_options: unknown, cmd: Command) => {
      try {
        const globalOpts = parseGlobalOptions(cmd);
        console.log(formatOutput(listLevels(), globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
