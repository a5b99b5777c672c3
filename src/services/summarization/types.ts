/**
 * Summarization service types
 */

import type { TextSourceRegistry } from '../sources/registry.js';
import type { SummaryLevel, SummaryLevelName } from './levels.js';
import type { ProgressState } from './progress.js';
import type { RetryNotice, SleepFn } from './retry-controller.js';

export interface SummarizerServiceOptions {
  /** Maximum paragraphs carried forward between chunks */
  maxContextParagraphs: number;
  /** Estimated input tokens a request may use before the oldest context is evicted */
  requestTokenBudget: number;
  temperature: number;
  topP: number;
  retry: {
    maxAttempts: number;
    timeoutDelayMs: number;
  };
  /** Registry used by summarizeSource; defaults to the built-in sources */
  sources?: TextSourceRegistry;
  sleep?: SleepFn;
  onProgress?: (event: ProgressEvent) => void;
  onRetry?: (notice: RetryNotice & { chunkIndex: number }) => void;
}

export interface SummarizeOptions {
  /** Level name or a custom level definition. Defaults to verbose. */
  level?: SummaryLevelName | SummaryLevel;
  /** Extra instructions appended to the level prompt */
  customPrompt?: string;
}

export interface ProgressEvent extends ProgressState {
  chunkIndex: number;
  chunkCount: number;
}

export interface SummarizeResult {
  outputPath: string;
  level: SummaryLevelName;
  /** Chunks sent to the backend */
  chunks: number;
  paragraphsWritten: number;
  totalChars: number;
  /** Backend calls across all chunks, retries included */
  attempts: number;
}
