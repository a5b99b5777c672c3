/**
 * Chunk Segmenter
 *
 * Splits source text into contiguous, non-overlapping slices of at most
 * `chunkSize` characters. Boundaries fall purely on character count and may
 * land mid-word or mid-sentence, but never between the two halves of a
 * surrogate pair.
 */

import { createValidationError } from '../../core/errors.js';

export interface Chunk {
  /** Zero-based position in the sequence */
  index: number;
  /** Offset of the first character in the source text */
  offset: number;
  text: string;
}

function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw createValidationError('chunkSize', `must be a positive integer (got ${chunkSize})`);
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * End of the chunk starting at `offset`. A boundary that would split a
 * surrogate pair moves back one unit, or forward when the chunk would
 * otherwise be empty (chunkSize 1).
 */
function chunkEnd(text: string, offset: number, chunkSize: number): number {
  const end = Math.min(offset + chunkSize, text.length);
  if (end >= text.length) return end;
  if (!isHighSurrogate(text.charCodeAt(end - 1)) || !isLowSurrogate(text.charCodeAt(end))) {
    return end;
  }
  return end - 1 > offset ? end - 1 : end + 1;
}

/**
 * Lazily yield chunks of `text`, starting at `startOffset`.
 * Passing the offset of an earlier chunk restarts the sequence from there.
 */
export function* segmentText(
  text: string,
  chunkSize: number,
  startOffset = 0
): Generator<Chunk, void, undefined> {
  assertChunkSize(chunkSize);
  if (!Number.isInteger(startOffset) || startOffset < 0) {
    throw createValidationError('startOffset', `must be a non-negative integer (got ${startOffset})`);
  }

  let offset = startOffset;
  let index = Math.ceil(startOffset / chunkSize);

  while (offset < text.length) {
    const slice = text.slice(offset, chunkEnd(text, offset, chunkSize));

    yield { index, offset, text: slice };
    offset += slice.length;
    index++;
  }
}

/**
 * Chunk count for a text of `length` characters, assuming no boundary has to
 * move off a surrogate pair. `countTextChunks` gives the exact figure.
 */
export function countChunks(length: number, chunkSize: number): number {
  assertChunkSize(chunkSize);
  return Math.ceil(length / chunkSize);
}

/**
 * Exact number of chunks `segmentText` yields for `text`
 */
export function countTextChunks(text: string, chunkSize: number): number {
  assertChunkSize(chunkSize);
  let count = 0;
  for (let offset = 0; offset < text.length; offset = chunkEnd(text, offset, chunkSize)) {
    count++;
  }
  return count;
}
