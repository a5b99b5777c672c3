/**
 * Completion client types
 *
 * Every backend is reduced to a single call that never throws for the failure
 * classes the retry controller knows about. Those come back as tagged outcomes.
 */

export type CompletionProviderName = 'openai' | 'azure' | 'anthropic' | 'ollama';

export interface CompletionOptions {
  /** Upper bound on generated tokens */
  maxOutputTokens: number;
  temperature: number;
  topP: number;
}

export type CompletionOutcome =
  | { kind: 'success'; text: string }
  | { kind: 'rate_limited'; retryAfterSeconds: number | null; message: string }
  | { kind: 'timeout'; message: string }
  | { kind: 'service_error'; message: string };

export interface CompletionClient {
  readonly provider: CompletionProviderName;
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<CompletionOutcome>;
}
