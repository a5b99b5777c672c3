/**
 * Backend Configuration Section
 *
 * Which completion provider summarizes each chunk, and how to reach it.
 */

import { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta } from '../types.js';
import { getCompletionProvider } from '../parsers.js';

const options = {
  provider: {
    envKey: 'SUMMARIZER_PROVIDER',
    defaultValue: 'openai',
    description: 'Completion provider: openai, azure, anthropic, or ollama.',
    schema: z.enum(['openai', 'azure', 'anthropic', 'ollama']),
    // Custom parser with auto-detection based on configured credentials
    parse: () => getCompletionProvider(),
  },
  model: {
    envKey: 'SUMMARIZER_MODEL',
    defaultValue: undefined,
    description:
      'Model name sent to the provider. Defaults per provider; azure always uses the deployment name.',
    schema: z.string().min(1).optional(),
  },
  openaiApiKey: {
    envKey: 'SUMMARIZER_OPENAI_API_KEY',
    defaultValue: undefined,
    description: 'OpenAI API key.',
    schema: z.string().optional(),
    sensitive: true,
  },
  openaiBaseUrl: {
    envKey: 'SUMMARIZER_OPENAI_BASE_URL',
    defaultValue: undefined,
    description: 'Custom OpenAI-compatible API base URL.',
    schema: z.string().url().optional(),
  },
  azureEndpoint: {
    envKey: 'AZURE_OPENAI_ENDPOINT',
    defaultValue: undefined,
    description: 'Azure OpenAI resource endpoint.',
    schema: z.string().url().optional(),
  },
  azureDeployment: {
    envKey: 'AZURE_OPENAI_DEPLOYMENT_NAME',
    defaultValue: undefined,
    description: 'Azure OpenAI deployment name.',
    schema: z.string().optional(),
  },
  azureApiKey: {
    envKey: 'AZURE_OPENAI_API_KEY',
    defaultValue: undefined,
    description: 'Azure OpenAI API key.',
    schema: z.string().optional(),
    sensitive: true,
  },
  azureApiVersion: {
    envKey: 'AZURE_OPENAI_API_VERSION',
    defaultValue: '2024-05-01-preview',
    description: 'Azure OpenAI REST API version.',
    schema: z.string().min(1),
  },
  anthropicApiKey: {
    envKey: 'SUMMARIZER_ANTHROPIC_API_KEY',
    defaultValue: undefined,
    description: 'Anthropic API key.',
    schema: z.string().optional(),
    sensitive: true,
  },
  ollamaBaseUrl: {
    envKey: 'SUMMARIZER_OLLAMA_BASE_URL',
    defaultValue: 'http://localhost:11434',
    description: 'Ollama server URL.',
    schema: z.string().url(),
  },
  temperature: {
    envKey: 'SUMMARIZER_TEMPERATURE',
    defaultValue: 0.4,
    description: 'Sampling temperature for every request.',
    schema: z.number().min(0).max(2),
  },
  topP: {
    envKey: 'SUMMARIZER_TOP_P',
    defaultValue: 0.4,
    description: 'Nucleus sampling cutoff for every request.',
    schema: z.number().min(0).max(1),
  },
  requestTimeoutMs: {
    envKey: 'SUMMARIZER_REQUEST_TIMEOUT_MS',
    defaultValue: 120000,
    description: 'Transport timeout for a single completion request.',
    schema: z.number().int().min(1000),
    parse: 'int',
  },
} satisfies Record<string, ConfigOptionMeta>;

export const backendSection = {
  name: 'backend',
  description: 'Completion backend configuration.',
  options,
  schema: z.object({
    provider: options.provider.schema,
    model: options.model.schema,
    openaiApiKey: options.openaiApiKey.schema,
    openaiBaseUrl: options.openaiBaseUrl.schema,
    azureEndpoint: options.azureEndpoint.schema,
    azureDeployment: options.azureDeployment.schema,
    azureApiKey: options.azureApiKey.schema,
    azureApiVersion: options.azureApiVersion.schema,
    anthropicApiKey: options.anthropicApiKey.schema,
    ollamaBaseUrl: options.ollamaBaseUrl.schema,
    temperature: options.temperature.schema,
    topP: options.topP.schema,
    requestTimeoutMs: options.requestTimeoutMs.schema,
  }),
} satisfies ConfigSectionMeta;
