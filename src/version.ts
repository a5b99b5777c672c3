/**
 * Package version, read from package.json so it has a single source of truth
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

export const VERSION: string = packageJson.version;
