/**
 * CLI Tests
 *
 * Drives the commander program in-process with console and process.exit spied.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram, runCli } from '../../src/cli/index.js';
import { applyCommandOverrides } from '../../src/cli/commands/summarize.js';
import { listLevels } from '../../src/cli/commands/levels.js';
import { parsePositiveInt } from '../../src/cli/utils/typed-action.js';
import { formatOutput } from '../../src/cli/utils/output.js';
import { config, snapshotConfig } from '../../src/config/index.js';
import { ErrorCodes } from '../../src/core/errors.js';

describe('CLI', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'summarize-cli-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('should register the summarize, levels and env commands', () => {
    const names = createProgram().commands.map((command) => command.name());

    expect(names).toEqual(['summarize', 'levels', 'env']);
  });

  describe('summarize', () => {
    it('should summarize a text file through the selected provider and print the result', async () => {
      const input = join(dir, 'notes.txt');
      const output = join(dir, 'summary.txt');
      await writeFile(input, 'The meeting covered the release plan.');
      const fetchMock = vi.fn<typeof fetch>();
      fetchMock.mockResolvedValueOnce(Response.json({ response: 'Release plan discussed.' }));
      vi.stubGlobal('fetch', fetchMock);

      await runCli(['summarize', input, output, '--provider', 'ollama', '-l', 'terse']);

      expect(await readFile(output, 'utf8')).toBe('Release plan discussed.\n\n');
      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
        outputPath: output,
        level: 'terse',
        chunks: 1,
        paragraphsWritten: 1,
        totalChars: 37,
        attempts: 1,
      });
    });

    it('should accept the barney alias for the simple level', async () => {
      const input = join(dir, 'notes.txt');
      const output = join(dir, 'summary.txt');
      await writeFile(input, 'Plain words.');
      const fetchMock = vi.fn<typeof fetch>();
      fetchMock.mockResolvedValueOnce(Response.json({ response: 'Easy words.' }));
      vi.stubGlobal('fetch', fetchMock);

      await runCli(['summarize', input, output, '--provider', 'ollama', '-l', 'barney']);

      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toMatchObject({ level: 'simple' });
      expect(await readFile(output, 'utf8')).toBe('Easy words.\n\n');
    });

    it('should print a JSON error and exit with status 1 when the input is missing', async () => {
      const input = join(dir, 'missing.txt');

      await expect(
        runCli(['summarize', input, join(dir, 'out.txt'), '--provider', 'ollama'])
      ).rejects.toThrow('process.exit');

      expect(process.exit).toHaveBeenCalledWith(1);
      expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
        code: ErrorCodes.EXTRACTION_FAILED,
        details: { source: input, code: 'ENOENT' },
      });
    });
  });

  describe('levels', () => {
    it('should list every level as JSON', async () => {
      await runCli(['levels']);

      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual(listLevels());
      expect(listLevels()[4]).toEqual({
        name: 'transcribe',
        chunkSize: 10000,
        maxOutputTokens: 10000,
        includeContext: false,
      });
    });

    it('should print a table when asked', async () => {
      await runCli(['--format', 'table', 'levels']);

      const [header] = String(logSpy.mock.calls[0]?.[0]).split('\n');
      expect(header).toBe(`${'name'.padEnd(10)} | chunkSize | maxOutputTokens | includeContext`);
    });
  });

  describe('env', () => {
    it('should document the environment variables', async () => {
      await runCli(['env']);

      const rows: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(rows).toEqual(
        expect.arrayContaining([
          {
            envKey: 'SUMMARIZER_CONTEXT_PARAGRAPHS',
            type: 'number',
            default: 3,
            section: 'summarizer',
            description: 'Summary paragraphs carried forward into the next request.',
          },
        ])
      );
    });
  });

  describe('applyCommandOverrides', () => {
    it('should layer command options over the environment config', () => {
      const base = snapshotConfig();

      const settings = applyCommandOverrides(base, {
        provider: 'anthropic',
        model: 'claude-3-5-sonnet-latest',
        maxAttempts: 2,
        contextParagraphs: 5,
        summaryLevel: 'simple',
      });

      expect(settings.backend.provider).toBe('anthropic');
      expect(settings.backend.model).toBe('claude-3-5-sonnet-latest');
      expect(settings.retry).toEqual({ ...base.retry, maxAttempts: 2 });
      expect(settings.summarizer.maxContextParagraphs).toBe(5);
      expect(settings.summarizer.defaultLevel).toBe('simple');
      expect(config.retry.maxAttempts).toBe(base.retry.maxAttempts);
    });

    it('should keep the environment values when no options are given', () => {
      const base = snapshotConfig();

      expect(applyCommandOverrides(base, {})).toEqual(base);
    });
  });

  describe('parsePositiveInt', () => {
    it('should accept positive integers only', () => {
      expect(parsePositiveInt('3')).toBe(3);
      expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer.');
      expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer.');
    });
  });

  describe('formatOutput', () => {
    it('should print objects as key value lines in table mode', () => {
      expect(formatOutput({ chunks: 2, level: 'terse', skipped: undefined }, 'table')).toBe(
        'chunks: 2\nlevel: terse'
      );
    });

    it('should report empty lists', () => {
      expect(formatOutput([], 'table')).toBe('(no results)');
    });
  });
});
