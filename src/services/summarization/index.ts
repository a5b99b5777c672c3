/**
 * Incremental Summarization Module
 */

export { SummarizerService, createSummarizerService } from './summarizer.service.js';
export type {
  SummarizerServiceOptions,
  SummarizeOptions,
  SummarizeResult,
  ProgressEvent,
} from './types.js';

export { segmentText, countChunks, countTextChunks } from './segmenter.js';
export type { Chunk } from './segmenter.js';
export { ContextWindow, splitParagraphs } from './context-window.js';
export {
  buildPrompt,
  estimateTokens,
  PREVIOUS_SUMMARY_LABEL,
  CURRENT_CHUNK_LABEL,
} from './request-builder.js';
export type { PromptInput } from './request-builder.js';
export { RetryController, defaultSleep } from './retry-controller.js';
export type {
  RetryControllerOptions,
  RetryNotice,
  RetryPhase,
  RetryResult,
  RetryState,
  SleepFn,
} from './retry-controller.js';
export { ProgressTracker } from './progress.js';
export type { ProgressState } from './progress.js';
export { SummaryOutputWriter, PARAGRAPH_SEPARATOR } from './output-writer.js';
export {
  SUMMARY_LEVELS,
  SUMMARY_LEVEL_NAMES,
  getSummaryLevel,
  isSummaryLevelName,
} from './levels.js';
export type { SummaryLevel, SummaryLevelName } from './levels.js';
