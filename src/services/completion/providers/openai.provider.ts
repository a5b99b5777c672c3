/**
 * OpenAI and Azure OpenAI completion clients
 *
 * Both go through the openai SDK's chat completions endpoint. SDK retries are
 * disabled; throttling and timeouts surface as outcomes for the retry controller.
 */

import { OpenAI, AzureOpenAI } from 'openai';
import { createComponentLogger } from '../../../utils/logger.js';
import { classifyCompletionError, classifyResponseText } from '../normalize.js';
import type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
  CompletionProviderName,
} from '../types.js';

const logger = createComponentLogger('openai-completion');

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs: number;
}

export interface AzureClientOptions {
  endpoint: string;
  deployment: string;
  apiKey: string;
  apiVersion: string;
  timeoutMs: number;
}

export class OpenAICompletionClient implements CompletionClient {
  constructor(
    private readonly client: OpenAI,
    readonly model: string,
    readonly provider: Extract<CompletionProviderName, 'openai' | 'azure'> = 'openai'
  ) {}

  async complete(prompt: string, options: CompletionOptions): Promise<CompletionOutcome> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: options.maxOutputTokens,
        temperature: options.temperature,
        top_p: options.topP,
      });

      const choice = response.choices[0];
      if (choice?.finish_reason === 'length') {
        logger.warn({ model: this.model }, 'Completion stopped at the output token limit');
      }

      return classifyResponseText(choice?.message?.content ?? '');
    } catch (error) {
      return classifyCompletionError(error);
    }
  }
}

export function createOpenAICompletionClient(options: OpenAIClientOptions): OpenAICompletionClient {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
  return new OpenAICompletionClient(client, options.model, 'openai');
}

/**
 * Azure routes requests by deployment, so the deployment name doubles as the model.
 */
export function createAzureCompletionClient(options: AzureClientOptions): OpenAICompletionClient {
  const client = new AzureOpenAI({
    endpoint: options.endpoint,
    deployment: options.deployment,
    apiKey: options.apiKey,
    apiVersion: options.apiVersion,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
  return new OpenAICompletionClient(client, options.deployment, 'azure');
}
