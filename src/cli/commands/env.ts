/**
 * Env CLI Command
 *
 * Document the environment variables the tool reads.
 */

import { Command } from 'commander';
import { configRegistry, getAllEnvVars } from '../../config/index.js';
import { handleCliError } from '../utils/errors.js';
import { formatOutput } from '../utils/output.js';
import { parseGlobalOptions } from '../utils/typed-action.js';

export function addEnvCommand(program: Command): void {
  program
    .command('env')
    .description('List supported environment variables and their defaults')
    .action((_options: unknown, cmd: Command) => {
      try {
        const globalOpts = parseGlobalOptions(cmd);
        const rows = getAllEnvVars(configRegistry).map((envVar) => ({
          envKey: envVar.envKey,
          type: envVar.type,
          default: envVar.defaultValue,
          section: envVar.section,
          description: envVar.description,
        }));
        console.log(formatOutput(rows, globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
