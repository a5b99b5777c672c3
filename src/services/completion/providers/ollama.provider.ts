/**
 * Ollama completion client
 *
 * Talks to a local Ollama server over its REST API; no SDK involved.
 */

import { z } from 'zod';
import { classifyCompletionError, classifyResponseText, readHeader, parseRetryAfterSeconds } from '../normalize.js';
import type { CompletionClient, CompletionOptions, CompletionOutcome } from '../types.js';

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

const generateResponseSchema = z.object({
  response: z.string(),
});

export class OllamaCompletionClient implements CompletionClient {
  readonly provider = 'ollama' as const;
  readonly model: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaClientOptions) {
    this.model = options.model;
    this.url = `${options.baseUrl.replace(/\/+$/, '')}/api/generate`;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<CompletionOutcome> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        signal: abortController.signal,
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: {
            temperature: options.temperature,
            top_p: options.topP,
            num_predict: options.maxOutputTokens,
          },
        }),
      });

      if (response.status === 429) {
        const message = await response.text();
        return {
          kind: 'rate_limited',
          retryAfterSeconds: parseRetryAfterSeconds(
            readHeader(response.headers, 'retry-after'),
            message
          ),
          message: message || 'Too Many Requests',
        };
      }

      if (!response.ok) {
        const detail = await response.text();
        return classifyCompletionError(
          new Error(`${response.status} ${response.statusText}${detail ? `: ${detail}` : ''}`)
        );
      }

      const parsed = generateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { kind: 'service_error', message: 'Ollama returned a response without text' };
      }

      return classifyResponseText(parsed.data.response);
    } catch (error) {
      if (abortController.signal.aborted) {
        return { kind: 'timeout', message: `Request timed out after ${this.timeoutMs}ms` };
      }
      return classifyCompletionError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
