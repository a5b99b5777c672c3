/**
 * PDF text source
 *
 * PDF.js is loaded lazily so plain-text runs never pay for it.
 */

import { readFile } from 'node:fs/promises';
import { ExtractionError } from '../../core/errors.js';
import type { TextSource } from './types.js';

export class PdfTextSource implements TextSource {
  readonly name = 'pdf';

  canHandle(location: string): boolean {
    return location.toLowerCase().endsWith('.pdf');
  }

  async extract(location: string): Promise<string> {
    try {
      const data = new Uint8Array(await readFile(location));
      const { getDocumentProxy, extractText } = await import('unpdf');
      const pdf = await getDocumentProxy(data);
      const { text } = await extractText(pdf, { mergePages: true });
      return Array.isArray(text) ? text.join('\n') : text;
    } catch (error) {
      throw new ExtractionError(location, error instanceof Error ? error.message : String(error));
    }
  }
}
