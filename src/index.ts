// Library entry point for incremental-summarizer.
// The CLI lives in cli.ts; importing this module never reads .env files.

export {
  SummarizerService,
  createSummarizerService,
  segmentText,
  countChunks,
  countTextChunks,
  ContextWindow,
  splitParagraphs,
  buildPrompt,
  estimateTokens,
  RetryController,
  ProgressTracker,
  SummaryOutputWriter,
  SUMMARY_LEVELS,
  SUMMARY_LEVEL_NAMES,
  getSummaryLevel,
} from './services/summarization/index.js';
export type {
  SummarizerServiceOptions,
  SummarizeOptions,
  SummarizeResult,
  ProgressEvent,
  Chunk,
  RetryNotice,
  RetryState,
  ProgressState,
  SummaryLevel,
  SummaryLevelName,
} from './services/summarization/index.js';

export {
  createCompletionClient,
  OpenAICompletionClient,
  AnthropicCompletionClient,
  OllamaCompletionClient,
  classifyCompletionError,
  classifyResponseText,
} from './services/completion/index.js';
export type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
  CompletionProviderName,
} from './services/completion/index.js';

export { TextSourceRegistry, createDefaultTextSources } from './services/sources/index.js';
export type { TextSource } from './services/sources/index.js';

export {
  SummarizerError,
  ExtractionError,
  ServiceError,
  UnknownServiceError,
  RetriesExhaustedError,
  OutputError,
  ErrorCodes,
} from './core/errors.js';

export { config, type Config } from './config/index.js';
export { VERSION } from './version.js';
