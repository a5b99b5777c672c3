/**
 * CLI Main Program
 *
 * Commander.js program setup for the summarize-doc CLI.
 */

import { Command, Option } from 'commander';
import { VERSION } from '../version.js';
import { addSummarizeCommand } from './commands/summarize.js';
import { addLevelsCommand } from './commands/levels.js';
import { addEnvCommand } from './commands/env.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('summarize-doc')
    .description('Summarize long documents chunk by chunk with a rolling summary context')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    );

  addSummarizeCommand(program);
  addLevelsCommand(program);
  addEnvCommand(program);

  return program;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
