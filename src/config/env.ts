import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from .env files
 *
 * Call this before anything imports the config module. A `.env` in the
 * working directory wins over one in the project root; variables already
 * present in the environment are never overwritten.
 */
export function loadEnv(projectRoot: string, cwd: string = process.cwd()): string[] {
  // Guard: only load once
  if (process.env.__SUMMARIZER_ENV_LOADED) return [];

  const loaded: string[] = [];
  for (const envPath of [resolve(cwd, '.env'), resolve(projectRoot, '.env')]) {
    if (!loaded.includes(envPath) && existsSync(envPath)) {
      dotenvConfig({ path: envPath });
      loaded.push(envPath);
    }
  }

  process.env.__SUMMARIZER_ENV_LOADED = '1';
  return loaded;
}
