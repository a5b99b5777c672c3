#!/usr/bin/env node
// CLI entry point for summarize-doc
// Environment files are loaded before any module reads configuration

import { loadEnv } from './config/env.js';
import { projectRoot } from './config/registry/parsers.js';

async function main(): Promise<void> {
  loadEnv(projectRoot);

  // Config is built at import time, so everything that reads it loads after .env
  const { runCli } = await import('./cli/index.js');
  const { handleCliError } = await import('./cli/utils/errors.js');

  try {
    await runCli(process.argv.slice(2));
  } catch (error) {
    handleCliError(error);
  }
}

void main();
