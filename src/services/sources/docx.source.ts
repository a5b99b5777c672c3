/**
 * Word (.docx) text source
 */

import { ExtractionError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { TextSource } from './types.js';

const logger = createComponentLogger('docx-source');

export class DocxTextSource implements TextSource {
  readonly name = 'docx';

  canHandle(location: string): boolean {
    return location.toLowerCase().endsWith('.docx');
  }

  async extract(location: string): Promise<string> {
    try {
      const mammoth = await import('mammoth');
      const result = await mammoth.extractRawText({ path: location });
      if (result.messages.length > 0) {
        logger.debug({ location, messages: result.messages.length }, 'Word conversion reported messages');
      }
      return result.value;
    } catch (error) {
      throw new ExtractionError(location, error instanceof Error ? error.message : String(error));
    }
  }
}
