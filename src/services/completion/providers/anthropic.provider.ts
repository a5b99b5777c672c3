/**
 * Anthropic completion client
 */

import Anthropic from '@anthropic-ai/sdk';
import { classifyCompletionError, classifyResponseText } from '../normalize.js';
import type { CompletionClient, CompletionOptions, CompletionOutcome } from '../types.js';

export interface AnthropicClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<CompletionOutcome> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxOutputTokens,
        temperature: options.temperature,
        top_p: options.topP,
        messages: [{ role: 'user', content: prompt }],
      });

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n\n');

      return classifyResponseText(text);
    } catch (error) {
      return classifyCompletionError(error);
    }
  }
}
