import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SummarizerService } from '../../src/services/summarization/summarizer.service.js';
import type { SummaryLevel } from '../../src/services/summarization/levels.js';
import type { SummarizerServiceOptions } from '../../src/services/summarization/types.js';
import { TextSourceRegistry } from '../../src/services/sources/registry.js';
import type { TextSource } from '../../src/services/sources/types.js';
import type {
  CompletionClient,
  CompletionOptions,
  CompletionOutcome,
} from '../../src/services/completion/types.js';
import { ExtractionError, RetriesExhaustedError, ServiceError } from '../../src/core/errors.js';
import {
  ScriptedCompletionClient,
  rateLimited,
  serviceError,
  success,
  timedOut,
} from '../fixtures/scripted-client.js';

const level100: SummaryLevel = {
  name: 'concise',
  chunkSize: 100,
  maxOutputTokens: 64,
  prompt: 'S',
  includeContext: true,
};

function createService(
  client: CompletionClient,
  overrides: Partial<SummarizerServiceOptions> = {}
): SummarizerService {
  return new SummarizerService(client, {
    maxContextParagraphs: 2,
    requestTokenBudget: 10000,
    temperature: 0.4,
    topP: 0.4,
    retry: { maxAttempts: 5, timeoutDelayMs: 5000 },
    sleep: () => Promise.resolve(),
    sources: new TextSourceRegistry(),
    ...overrides,
  });
}

describe('Summarizer Service', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'summarizer-service-'));
    outputPath = join(dir, 'summary.txt');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('summarizeText', () => {
    it('should write evicted paragraphs as it goes and flush the window at the end', async () => {
      const client = new ScriptedCompletionClient([
        success('A1\n\nA2'),
        success('B1\n\nB2\n\nB3'),
        success('C1'),
      ]);
      const onProgress = vi.fn();
      const service = createService(client, { onProgress });

      const result = await service.summarizeText('x'.repeat(250), outputPath, { level: level100 });

      expect(await readFile(outputPath, 'utf8')).toBe('A1\n\nA2\n\nB1\n\nB2\n\nB3\n\nC1\n\n');
      expect(result).toEqual({
        outputPath,
        level: 'concise',
        chunks: 3,
        paragraphsWritten: 6,
        totalChars: 250,
        attempts: 3,
      });
      expect(onProgress.mock.calls.map(([event]) => event)).toEqual([
        { processedChars: 100, totalChars: 250, percent: 40, chunkIndex: 0, chunkCount: 3 },
        { processedChars: 200, totalChars: 250, percent: 80, chunkIndex: 1, chunkCount: 3 },
        { processedChars: 250, totalChars: 250, percent: 100, chunkIndex: 2, chunkCount: 3 },
      ]);
    });

    it('should send the surviving window with each chunk', async () => {
      const client = new ScriptedCompletionClient([
        success('A1\n\nA2'),
        success('B1\n\nB2\n\nB3'),
        success('C1'),
      ]);
      const service = createService(client);
      const text = 'a'.repeat(100) + 'b'.repeat(100) + 'c'.repeat(50);

      await service.summarizeText(text, outputPath, { level: level100 });

      expect(client.calls.map((call) => call.prompt)).toEqual([
        `S\n\n[PREVIOUS_SUMMARY]\n\n\n[CURRENT_CHUNK]\n${'a'.repeat(100)}`,
        `S\n\n[PREVIOUS_SUMMARY]\nA1\n\nA2\n\n[CURRENT_CHUNK]\n${'b'.repeat(100)}`,
        `S\n\n[PREVIOUS_SUMMARY]\nB2\n\nB3\n\n[CURRENT_CHUNK]\n${'c'.repeat(50)}`,
      ]);
      expect(client.calls[0]?.options).toEqual({ maxOutputTokens: 64, temperature: 0.4, topP: 0.4 });
    });

    it('should evict context that would push the request over budget before sending it', async () => {
      const snapshots: string[] = [];
      const outcomes: CompletionOutcome[] = [
        success(`${'P'.repeat(40)}\n\n${'Q'.repeat(40)}`),
        success('R'),
      ];
      const client: CompletionClient = {
        provider: 'ollama',
        model: 'test-model',
        complete: async (_prompt: string, _options: CompletionOptions) => {
          snapshots.push(readFileSync(outputPath, 'utf8'));
          return outcomes.shift() ?? success('');
        },
      };
      // Prompt with both paragraphs estimates 56 tokens, with Q only 45
      const service = createService(client, { requestTokenBudget: 50 });

      await service.summarizeText('x'.repeat(200), outputPath, { level: level100 });

      expect(snapshots).toEqual(['', `${'P'.repeat(40)}\n\n`]);
      expect(await readFile(outputPath, 'utf8')).toBe(`${'P'.repeat(40)}\n\n${'Q'.repeat(40)}\n\nR\n\n`);
    });

    it('should leave the window unchanged when a chunk produces no summary', async () => {
      const client = new ScriptedCompletionClient([success('A'), success('   '), success('B')]);
      const service = createService(client, { maxContextParagraphs: 3 });

      const result = await service.summarizeText('x'.repeat(300), outputPath, { level: level100 });

      expect(await readFile(outputPath, 'utf8')).toBe('A\n\nB\n\n');
      expect(client.calls[2]?.prompt).toContain('[PREVIOUS_SUMMARY]\nA\n\n[CURRENT_CHUNK]');
      expect(result.paragraphsWritten).toBe(2);
    });

    it('should send only the chunk for a stateless level but still write every paragraph', async () => {
      const transcribe: SummaryLevel = { ...level100, name: 'transcribe', includeContext: false };
      const client = new ScriptedCompletionClient([success('T1\n\nT2\n\nT3'), success('T4')]);
      const service = createService(client);

      await service.summarizeText('y'.repeat(150), outputPath, { level: transcribe });

      expect(client.calls.map((call) => call.prompt)).toEqual([
        `S\n\n[CURRENT_CHUNK]\n${'y'.repeat(100)}`,
        `S\n\n[CURRENT_CHUNK]\n${'y'.repeat(50)}`,
      ]);
      expect(await readFile(outputPath, 'utf8')).toBe('T1\n\nT2\n\nT3\n\nT4\n\n');
    });

    it('should append the custom prompt to every request', async () => {
      const client = new ScriptedCompletionClient([success('A')]);
      const service = createService(client);

      await service.summarizeText('short', outputPath, {
        level: level100,
        customPrompt: 'Keep names.',
      });

      expect(client.calls[0]?.prompt.startsWith('S\n\nKeep names.\n\n[PREVIOUS_SUMMARY]')).toBe(true);
    });

    it('should use the verbose level by default', async () => {
      const client = new ScriptedCompletionClient([success('A')]);
      const service = createService(client);

      const result = await service.summarizeText('short', outputPath);

      expect(result.level).toBe('verbose');
      expect(client.calls[0]?.options.maxOutputTokens).toBe(10000);
    });

    it('should accept a level by name', async () => {
      const client = new ScriptedCompletionClient([success('A')]);
      const service = createService(client);

      const result = await service.summarizeText('short', outputPath, { level: 'terse' });

      expect(result.level).toBe('terse');
      expect(client.calls[0]?.options.maxOutputTokens).toBe(1000);
    });

    it('should count retried attempts and report the chunk being retried', async () => {
      const client = new ScriptedCompletionClient([success('A'), rateLimited(3), timedOut(), success('B')]);
      const sleep = vi.fn((_ms: number) => Promise.resolve());
      const onRetry = vi.fn();
      const service = createService(client, { sleep, onRetry });

      const result = await service.summarizeText('z'.repeat(200), outputPath, { level: level100 });

      expect(result.attempts).toBe(4);
      expect(sleep.mock.calls).toEqual([[3000], [5000]]);
      expect(onRetry.mock.calls.map(([notice]) => [notice.chunkIndex, notice.failureKind])).toEqual([
        [1, 'rate_limited'],
        [1, 'timeout'],
      ]);
    });

    it('should keep flushed paragraphs and drop resident ones when a chunk fails', async () => {
      const client = new ScriptedCompletionClient([
        success('A1\n\nA2\n\nA3'),
        serviceError('401 Unauthorized'),
      ]);
      const service = createService(client);

      const error = await service
        .summarizeText('x'.repeat(200), outputPath, { level: level100 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceError);
      expect(await readFile(outputPath, 'utf8')).toBe('A1\n\n');
    });

    it('should abort the run when retries are exhausted', async () => {
      const client = new ScriptedCompletionClient([timedOut(), timedOut()]);
      const service = createService(client, { retry: { maxAttempts: 2, timeoutDelayMs: 1 } });

      await expect(
        service.summarizeText('x'.repeat(50), outputPath, { level: level100 })
      ).rejects.toBeInstanceOf(RetriesExhaustedError);
      expect(await readFile(outputPath, 'utf8')).toBe('');
    });

    it('should leave only the latest run in the output file', async () => {
      const first = createService(new ScriptedCompletionClient([success('First run.')]));
      const second = createService(new ScriptedCompletionClient([success('Second run.')]));

      await first.summarizeText('one', outputPath, { level: level100 });
      await second.summarizeText('two', outputPath, { level: level100 });

      expect(await readFile(outputPath, 'utf8')).toBe('Second run.\n\n');
    });

    it('should produce an empty file for an empty document', async () => {
      const client = new ScriptedCompletionClient([]);
      const service = createService(client);

      const result = await service.summarizeText('', outputPath, { level: level100 });

      expect(result).toMatchObject({ chunks: 0, paragraphsWritten: 0, totalChars: 0, attempts: 0 });
      expect(await readFile(outputPath, 'utf8')).toBe('');
    });
  });

  describe('summarizeSource', () => {
    const staticSource = (text: string): TextSource => ({
      name: 'static',
      canHandle: (location) => location.startsWith('memo:'),
      extract: async () => text,
    });

    it('should extract text through the registry before summarizing', async () => {
      const client = new ScriptedCompletionClient([success('Memo summary.')]);
      const sources = new TextSourceRegistry().register(staticSource('memo body'));
      const service = createService(client, { sources });

      const result = await service.summarizeSource('memo:42', outputPath, { level: level100 });

      expect(client.calls[0]?.prompt.endsWith('[CURRENT_CHUNK]\nmemo body')).toBe(true);
      expect(result.totalChars).toBe(9);
      expect(await readFile(outputPath, 'utf8')).toBe('Memo summary.\n\n');
    });

    it('should leave an existing output untouched when extraction fails', async () => {
      await writeFile(outputPath, 'previous\n\n');
      const failing: TextSource = {
        name: 'failing',
        canHandle: () => true,
        extract: async (location) => {
          throw new ExtractionError(location, 'corrupt file');
        },
      };
      const service = createService(new ScriptedCompletionClient([]), {
        sources: new TextSourceRegistry().register(failing),
      });

      await expect(service.summarizeSource('broken.pdf', outputPath)).rejects.toThrow(
        'Failed to extract text from broken.pdf: corrupt file'
      );
      expect(await readFile(outputPath, 'utf8')).toBe('previous\n\n');
    });

    it('should reject a location no source accepts', async () => {
      const service = createService(new ScriptedCompletionClient([]));

      await expect(service.summarizeSource('nowhere', outputPath)).rejects.toThrow(
        'No text source can read nowhere'
      );
    });
  });

  it('should reject invalid window and budget settings', () => {
    const client = new ScriptedCompletionClient([]);
    expect(() => createService(client, { maxContextParagraphs: 0 })).toThrow('maxContextParagraphs');
    expect(() => createService(client, { requestTokenBudget: -1 })).toThrow('requestTokenBudget');
  });
});
