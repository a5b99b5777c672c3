/**
 * Incremental Summarizer Service
 *
 * Walks a document chunk by chunk. Each request carries the chunk plus the
 * most recent summary paragraphs; paragraphs that fall out of the context
 * window are written to the output file immediately, and whatever remains
 * in the window is written once the last chunk is done.
 *
 * Chunks are processed strictly in order because every request depends on
 * the window left behind by the chunks before it.
 *
 * @example
 * ```typescript
 * const service = createSummarizerService();
 * const result = await service.summarizeSource('notes/meeting.pdf', 'meeting-summary.txt', {
 *   level: 'concise',
 * });
 * console.log(`${result.paragraphsWritten} paragraphs from ${result.chunks} chunks`);
 * ```
 */

import { config as appConfig, type Config } from '../../config/index.js';
import { createValidationError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { createCompletionClient } from '../completion/factory.js';
import type { CompletionClient, CompletionOptions } from '../completion/types.js';
import { createDefaultTextSources } from '../sources/index.js';
import type { TextSourceRegistry } from '../sources/registry.js';
import { ContextWindow } from './context-window.js';
import { getSummaryLevel, type SummaryLevel } from './levels.js';
import { SummaryOutputWriter } from './output-writer.js';
import { ProgressTracker } from './progress.js';
import { buildPrompt, estimateTokens } from './request-builder.js';
import { RetryController } from './retry-controller.js';
import { countTextChunks, segmentText } from './segmenter.js';
import type { SummarizeOptions, SummarizeResult, SummarizerServiceOptions } from './types.js';

const logger = createComponentLogger('summarizer');

const DEFAULT_LEVEL = 'verbose';

function resolveLevel(level: SummarizeOptions['level']): SummaryLevel {
  if (level === undefined) return getSummaryLevel(DEFAULT_LEVEL);
  if (typeof level === 'string') return getSummaryLevel(level);
  return level;
}

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw createValidationError(field, `must be a positive integer (got ${value})`);
  }
}

export class SummarizerService {
  private readonly sources: TextSourceRegistry;

  constructor(
    private readonly client: CompletionClient,
    private readonly options: SummarizerServiceOptions
  ) {
    assertPositiveInteger(options.maxContextParagraphs, 'maxContextParagraphs');
    assertPositiveInteger(options.requestTokenBudget, 'requestTokenBudget');
    this.sources = options.sources ?? createDefaultTextSources();
  }

  /**
   * Extract text from a URL or file, then summarize it.
   * Extraction happens before the output file is touched.
   */
  async summarizeSource(
    location: string,
    outputPath: string,
    options: SummarizeOptions = {}
  ): Promise<SummarizeResult> {
    const text = await this.sources.extract(location);
    return this.summarizeText(text, outputPath, options);
  }

  async summarizeText(
    text: string,
    outputPath: string,
    options: SummarizeOptions = {}
  ): Promise<SummarizeResult> {
    const level = resolveLevel(options.level);
    const chunkCount = countTextChunks(text, level.chunkSize);
    const progress = new ProgressTracker(text.length);
    const window = new ContextWindow(this.options.maxContextParagraphs);
    const completionOptions: CompletionOptions = {
      maxOutputTokens: level.maxOutputTokens,
      temperature: this.options.temperature,
      topP: this.options.topP,
    };

    let chunkIndex = 0;
    const controller = new RetryController(this.client, {
      maxAttempts: this.options.retry.maxAttempts,
      timeoutDelayMs: this.options.retry.timeoutDelayMs,
      sleep: this.options.sleep,
      onRetry: (notice) => this.options.onRetry?.({ ...notice, chunkIndex }),
    });

    const writer = await SummaryOutputWriter.open(outputPath);
    let chunks = 0;
    let attempts = 0;

    logger.info(
      {
        level: level.name,
        totalChars: text.length,
        chunkCount,
        provider: this.client.provider,
        model: this.client.model,
        outputPath,
      },
      'Summarization started'
    );

    try {
      for (const chunk of segmentText(text, level.chunkSize)) {
        chunkIndex = chunk.index;

        const prompt = await this.preparePrompt(level, window, writer, chunk.text, options.customPrompt);
        logger.debug({ chunkIndex: chunk.index, prompt }, 'Request prompt');
        const result = await controller.execute(prompt, completionOptions);
        logger.debug({ chunkIndex: chunk.index, summary: result.text }, 'Summary window');
        attempts += result.attempts;
        chunks++;

        if (result.text.trim() === '') {
          logger.warn({ chunkIndex: chunk.index }, 'No summary generated for chunk');
        } else {
          await writer.writeAll(window.append(result.text));
        }

        const state = progress.advance(chunk.text.length);
        logger.info(
          {
            chunk: chunk.index + 1,
            chunkCount,
            processedChars: state.processedChars,
            totalChars: state.totalChars,
            percent: Number(state.percent.toFixed(2)),
          },
          'Progress'
        );
        this.options.onProgress?.({ ...state, chunkIndex: chunk.index, chunkCount });
      }

      await writer.writeAll(window.drain());
    } catch (error) {
      logger.error(
        {
          error: error instanceof Error ? error.message : String(error),
          chunkIndex,
          paragraphsWritten: writer.paragraphsWritten,
        },
        'Summarization aborted'
      );
      throw error;
    } finally {
      await writer.close();
    }

    logger.info(
      { chunks, attempts, paragraphsWritten: writer.paragraphsWritten, outputPath },
      'Summarization complete'
    );

    return {
      outputPath,
      level: level.name,
      chunks,
      paragraphsWritten: writer.paragraphsWritten,
      totalChars: text.length,
      attempts,
    };
  }

  /**
   * Build the request for one chunk. For contextual levels the window is
   * first trimmed until the estimated request fits the token budget, and the
   * evicted paragraphs are written before the request goes out.
   */
  private async preparePrompt(
    level: SummaryLevel,
    window: ContextWindow,
    writer: SummaryOutputWriter,
    chunk: string,
    customPrompt: string | undefined
  ): Promise<string> {
    if (!level.includeContext) {
      return buildPrompt({ level, context: [], chunk, customPrompt });
    }

    const evicted = window.trimToBudget(
      (paragraphs) => estimateTokens(buildPrompt({ level, context: paragraphs, chunk, customPrompt })),
      this.options.requestTokenBudget
    );
    if (evicted.length > 0) {
      logger.debug({ evicted: evicted.length }, 'Context trimmed to fit request budget');
      await writer.writeAll(evicted);
    }

    return buildPrompt({ level, context: window.snapshot(), chunk, customPrompt });
  }
}

/**
 * Create a service wired to the configured completion backend
 */
export function createSummarizerService(
  overrides: Partial<SummarizerServiceOptions> = {},
  settings: Config = appConfig
): SummarizerService {
  const client = createCompletionClient(settings.backend);

  return new SummarizerService(client, {
    maxContextParagraphs: settings.summarizer.maxContextParagraphs,
    requestTokenBudget: settings.summarizer.requestTokenBudget,
    temperature: settings.backend.temperature,
    topP: settings.backend.topP,
    retry: {
      maxAttempts: settings.retry.maxAttempts,
      timeoutDelayMs: settings.retry.timeoutDelayMs,
    },
    ...overrides,
  });
}
