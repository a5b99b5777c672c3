/**
 * Context Window Manager
 *
 * Holds the most recent summary paragraphs, oldest first, so they can be sent
 * with the next chunk. Paragraphs leave the window only by eviction or by the
 * final drain, and every paragraph that leaves is handed back to the caller
 * exactly once, in order, for writing.
 */

import { createValidationError } from '../../core/errors.js';

/**
 * Split model output into paragraphs on blank lines.
 * Each paragraph is trimmed; empty fragments are dropped.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\r?\n[^\S\r\n]*\r?\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export class ContextWindow {
  private paragraphs: string[] = [];

  constructor(readonly maxParagraphs: number) {
    if (!Number.isInteger(maxParagraphs) || maxParagraphs < 1) {
      throw createValidationError(
        'maxParagraphs',
        `must be a positive integer (got ${maxParagraphs})`
      );
    }
  }

  get size(): number {
    return this.paragraphs.length;
  }

  /** Snapshot of the resident paragraphs, oldest first */
  snapshot(): string[] {
    return [...this.paragraphs];
  }

  /**
   * Append the paragraphs of a new summary, then evict the oldest ones
   * until the window is back within its bound.
   *
   * @returns Evicted paragraphs, oldest first
   */
  append(summaryText: string): string[] {
    this.paragraphs.push(...splitParagraphs(summaryText));

    const overflow = this.paragraphs.length - this.maxParagraphs;
    if (overflow <= 0) return [];

    return this.paragraphs.splice(0, overflow);
  }

  /**
   * Evict the oldest paragraph, one at a time, while `measure` of the
   * remaining window exceeds `budget`. Stops when it fits or the window is empty.
   *
   * @returns Evicted paragraphs, oldest first
   */
  trimToBudget(measure: (paragraphs: readonly string[]) => number, budget: number): string[] {
    const evicted: string[] = [];

    while (this.paragraphs.length > 0 && measure(this.paragraphs) > budget) {
      const oldest = this.paragraphs.shift();
      if (oldest !== undefined) evicted.push(oldest);
    }

    return evicted;
  }

  /**
   * Remove and return everything left in the window
   */
  drain(): string[] {
    return this.paragraphs.splice(0, this.paragraphs.length);
  }
}
