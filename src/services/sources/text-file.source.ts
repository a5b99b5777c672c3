/**
 * Plain text file source. Accepts any location, so it is registered last.
 */

import { readFile } from 'node:fs/promises';
import { ExtractionError } from '../../core/errors.js';
import type { TextSource } from './types.js';

export class TextFileSource implements TextSource {
  readonly name = 'text-file';

  canHandle(_location: string): boolean {
    return true;
  }

  async extract(location: string): Promise<string> {
    try {
      return await readFile(location, 'utf8');
    } catch (error) {
      const code =
        error instanceof Error && 'code' in error && typeof error.code === 'string'
          ? error.code
          : undefined;
      throw new ExtractionError(location, error instanceof Error ? error.message : String(error), {
        code,
      });
    }
  }
}
