/**
 * Completion backends
 */

export type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
  CompletionProviderName,
} from './types.js';
export {
  classifyCompletionError,
  classifyResponseText,
  parseRetryAfterSeconds,
  readHeader,
  isRateLimitMessage,
  RATE_LIMIT_PATTERN,
  RETRY_AFTER_PATTERN,
} from './normalize.js';
export { createCompletionClient, getDefaultModel, isValidModelName } from './factory.js';
export {
  OpenAICompletionClient,
  createOpenAICompletionClient,
  createAzureCompletionClient,
} from './providers/openai.provider.js';
export type { OpenAIClientOptions, AzureClientOptions } from './providers/openai.provider.js';
export { AnthropicCompletionClient } from './providers/anthropic.provider.js';
export type { AnthropicClientOptions } from './providers/anthropic.provider.js';
export { OllamaCompletionClient } from './providers/ollama.provider.js';
export type { OllamaClientOptions } from './providers/ollama.provider.js';
