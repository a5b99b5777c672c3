/**
 * OpenAI Completion Client Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAI, AzureOpenAI } from 'openai';
import {
  createAzureCompletionClient,
  createOpenAICompletionClient,
} from '../../src/services/completion/providers/openai.provider.js';

const mockCreate = vi.fn();

vi.mock('openai', () => ({
  OpenAI: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockCreate } } };
  }),
  AzureOpenAI: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockCreate } } };
  }),
}));

const options = { maxOutputTokens: 500, temperature: 0.4, topP: 0.4 };

function chatResponse(content: string | null, finishReason = 'stop') {
  return { choices: [{ message: { content }, finish_reason: finishReason }] };
}

describe('OpenAI Completion Client', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should disable SDK retries and pass the transport timeout', () => {
    createOpenAICompletionClient({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      baseUrl: 'http://localhost:8080/v1',
      timeoutMs: 30000,
    });

    expect(vi.mocked(OpenAI)).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'http://localhost:8080/v1',
      timeout: 30000,
      maxRetries: 0,
    });
  });

  it('should send the prompt as a single user message with the sampling settings', async () => {
    mockCreate.mockResolvedValue(chatResponse('Summary.'));
    const client = createOpenAICompletionClient({
      apiKey: 'test-key',
      model: 'gpt-4o-mini',
      timeoutMs: 30000,
    });

    const outcome = await client.complete('Summarize this.', options);

    expect(outcome).toEqual({ kind: 'success', text: 'Summary.' });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'Summarize this.' }],
      max_tokens: 500,
      temperature: 0.4,
      top_p: 0.4,
    });
  });

  it('should return empty text when the response has no content', async () => {
    mockCreate.mockResolvedValue(chatResponse(null));
    const client = createOpenAICompletionClient({ apiKey: 'test-key', model: 'm', timeoutMs: 1000 });

    expect(await client.complete('p', options)).toEqual({ kind: 'success', text: '' });
  });

  it('should keep truncated output as a success', async () => {
    mockCreate.mockResolvedValue(chatResponse('Cut off', 'length'));
    const client = createOpenAICompletionClient({ apiKey: 'test-key', model: 'm', timeoutMs: 1000 });

    expect(await client.complete('p', options)).toEqual({ kind: 'success', text: 'Cut off' });
  });

  it('should map a throttled request to a rate limit outcome', async () => {
    const error = Object.assign(new Error('429 Requests have exceeded token rate limit.'), {
      status: 429,
      headers: { 'retry-after': '20' },
    });
    mockCreate.mockRejectedValue(error);
    const client = createOpenAICompletionClient({ apiKey: 'test-key', model: 'm', timeoutMs: 1000 });

    expect(await client.complete('p', options)).toEqual({
      kind: 'rate_limited',
      retryAfterSeconds: 20,
      message: '429 Requests have exceeded token rate limit.',
    });
  });

  it('should map a transport timeout to a timeout outcome', async () => {
    const error = new Error('Request timed out.');
    error.name = 'APIConnectionTimeoutError';
    mockCreate.mockRejectedValue(error);
    const client = createOpenAICompletionClient({ apiKey: 'test-key', model: 'm', timeoutMs: 1000 });

    expect(await client.complete('p', options)).toEqual({
      kind: 'timeout',
      message: 'Request timed out.',
    });
  });

  it('should map other failures to a service error', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('400 Bad request'), { status: 400 }));
    const client = createOpenAICompletionClient({ apiKey: 'test-key', model: 'm', timeoutMs: 1000 });

    expect(await client.complete('p', options)).toEqual({
      kind: 'service_error',
      message: '400 Bad request',
    });
  });

  describe('Azure', () => {
    it('should use the deployment name as the model', async () => {
      mockCreate.mockResolvedValue(chatResponse('Azure summary.'));
      const client = createAzureCompletionClient({
        endpoint: 'https://example.openai.azure.com',
        deployment: 'summaries',
        apiKey: 'test-key',
        apiVersion: '2024-05-01-preview',
        timeoutMs: 60000,
      });

      const outcome = await client.complete('p', options);

      expect(client.provider).toBe('azure');
      expect(client.model).toBe('summaries');
      expect(outcome).toEqual({ kind: 'success', text: 'Azure summary.' });
      expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'summaries' }));
      expect(vi.mocked(AzureOpenAI)).toHaveBeenCalledWith({
        endpoint: 'https://example.openai.azure.com',
        deployment: 'summaries',
        apiKey: 'test-key',
        apiVersion: '2024-05-01-preview',
        timeout: 60000,
        maxRetries: 0,
      });
    });
  });
});
