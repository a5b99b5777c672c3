/**
 * Progress Tracker
 *
 * Counts processed characters of the source text. Percent is computed from
 * the same unit as the total, so it reaches exactly 100 after the last chunk.
 */

import { createValidationError } from '../../core/errors.js';

export interface ProgressState {
  processedChars: number;
  totalChars: number;
  percent: number;
}

export class ProgressTracker {
  private processed = 0;

  constructor(readonly totalChars: number) {
    if (!Number.isInteger(totalChars) || totalChars < 0) {
      throw createValidationError('totalChars', `must be a non-negative integer (got ${totalChars})`);
    }
  }

  get state(): ProgressState {
    return {
      processedChars: this.processed,
      totalChars: this.totalChars,
      percent: this.totalChars === 0 ? 100 : (this.processed * 100) / this.totalChars,
    };
  }

  /**
   * Record a finished chunk
   */
  advance(chunkLength: number): ProgressState {
    if (!Number.isInteger(chunkLength) || chunkLength < 0) {
      throw createValidationError('chunkLength', `must be a non-negative integer (got ${chunkLength})`);
    }
    if (this.processed + chunkLength > this.totalChars) {
      throw createValidationError(
        'chunkLength',
        `advancing by ${chunkLength} would pass the document length ${this.totalChars}`
      );
    }

    this.processed += chunkLength;
    return this.state;
  }
}
