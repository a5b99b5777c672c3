/**
 * Registry that dispatches extraction to the first source accepting a location.
 * Sources are consulted in registration order.
 */

import { createUnsupportedSourceError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { TextSource } from './types.js';

const logger = createComponentLogger('text-sources');

export class TextSourceRegistry {
  private sources: TextSource[] = [];

  register(source: TextSource): this {
    this.sources.push(source);
    return this;
  }

  getSource(location: string): TextSource | undefined {
    return this.sources.find((source) => source.canHandle(location));
  }

  names(): string[] {
    return this.sources.map((source) => source.name);
  }

  async extract(location: string): Promise<string> {
    const source = this.getSource(location);
    if (!source) {
      throw createUnsupportedSourceError(location);
    }

    const startTime = Date.now();
    const text = await source.extract(location);
    logger.info(
      { source: source.name, location, chars: text.length, durationMs: Date.now() - startTime },
      'Text extracted'
    );
    return text;
  }
}
