/**
 * Completion client factory
 *
 * Builds the client for the configured provider, checking that the
 * credentials it needs are present.
 */

import { createValidationError } from '../../core/errors.js';
import type { BackendConfig } from '../../config/index.js';
import { createComponentLogger } from '../../utils/logger.js';
import { AnthropicCompletionClient } from './providers/anthropic.provider.js';
import { OllamaCompletionClient } from './providers/ollama.provider.js';
import {
  createAzureCompletionClient,
  createOpenAICompletionClient,
} from './providers/openai.provider.js';
import type { CompletionClient, CompletionProviderName } from './types.js';

const logger = createComponentLogger('completion');

/**
 * Validate model name to prevent injection into request URLs and bodies
 */
export function isValidModelName(modelName: string): boolean {
  const validPattern = /^[a-zA-Z0-9._:/-]+$/;
  return validPattern.test(modelName) && modelName.length <= 100;
}

export function getDefaultModel(provider: Exclude<CompletionProviderName, 'azure'>): string {
  switch (provider) {
    case 'openai':
      return 'gpt-4o-mini';
    case 'anthropic':
      return 'claude-3-5-haiku-20241022';
    case 'ollama':
      return 'llama3.2';
  }
}

function requireSetting(value: string | undefined, field: string, envKey: string, provider: string): string {
  if (!value) {
    throw createValidationError(
      field,
      `is required when provider is "${provider}"`,
      `Set ${envKey} or choose a different provider`
    );
  }
  return value;
}

function resolveModel(backend: BackendConfig, provider: Exclude<CompletionProviderName, 'azure'>): string {
  const model = backend.model ?? getDefaultModel(provider);
  if (!isValidModelName(model)) {
    throw createValidationError(
      'model',
      `invalid model name "${model}"`,
      'Model names may only contain letters, digits, and . _ : / -'
    );
  }
  return model;
}

export function createCompletionClient(backend: BackendConfig): CompletionClient {
  const timeoutMs = backend.requestTimeoutMs;
  let client: CompletionClient;

  switch (backend.provider) {
    case 'openai':
      client = createOpenAICompletionClient({
        apiKey: requireSetting(backend.openaiApiKey, 'openaiApiKey', 'SUMMARIZER_OPENAI_API_KEY', 'openai'),
        model: resolveModel(backend, 'openai'),
        baseUrl: backend.openaiBaseUrl,
        timeoutMs,
      });
      break;

    case 'azure':
      client = createAzureCompletionClient({
        endpoint: requireSetting(backend.azureEndpoint, 'azureEndpoint', 'AZURE_OPENAI_ENDPOINT', 'azure'),
        deployment: requireSetting(
          backend.azureDeployment,
          'azureDeployment',
          'AZURE_OPENAI_DEPLOYMENT_NAME',
          'azure'
        ),
        apiKey: requireSetting(backend.azureApiKey, 'azureApiKey', 'AZURE_OPENAI_API_KEY', 'azure'),
        apiVersion: backend.azureApiVersion,
        timeoutMs,
      });
      break;

    case 'anthropic':
      client = new AnthropicCompletionClient({
        apiKey: requireSetting(
          backend.anthropicApiKey,
          'anthropicApiKey',
          'SUMMARIZER_ANTHROPIC_API_KEY',
          'anthropic'
        ),
        model: resolveModel(backend, 'anthropic'),
        timeoutMs,
      });
      break;

    case 'ollama':
      client = new OllamaCompletionClient({
        baseUrl: backend.ollamaBaseUrl,
        model: resolveModel(backend, 'ollama'),
        timeoutMs,
      });
      break;
  }

  logger.debug({ provider: client.provider, model: client.model }, 'Completion client initialized');
  return client;
}
