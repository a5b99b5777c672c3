/**
 * Summarize CLI Command
 *
 * Summarize a document (file path or URL) into a plain text output file.
 */

import { Command, Option } from 'commander';
import { z } from 'zod';
import { config, type Config } from '../../config/index.js';
import { createSummarizerService } from '../../services/summarization/summarizer.service.js';
import {
  SUMMARY_LEVEL_CHOICES,
  resolveSummaryLevelName,
} from '../../services/summarization/levels.js';
import { createComponentLogger } from '../../utils/logger.js';
import { handleCliError } from '../utils/errors.js';
import { formatOutput } from '../utils/output.js';
import { parseGlobalOptions, parseOptions, parsePositiveInt } from '../utils/typed-action.js';

const logger = createComponentLogger('cli');

export const PROVIDER_NAMES = ['openai', 'azure', 'anthropic', 'ollama'] as const;

const summarizeOptionsSchema = z.object({
  summaryLevel: z
    .string()
    .transform((value, ctx) => {
      const name = resolveSummaryLevelName(value);
      if (name === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown level "${value}"` });
        return z.NEVER;
      }
      return name;
    })
    .optional(),
  prompt: z.string().optional(),
  provider: z.enum(PROVIDER_NAMES).optional(),
  model: z.string().min(1).optional(),
  maxAttempts: z.number().int().min(1).optional(),
  contextParagraphs: z.number().int().min(1).optional(),
});

export type SummarizeCommandOptions = z.infer<typeof summarizeOptionsSchema>;

/**
 * Apply command-line overrides on top of the environment configuration
 */
export function applyCommandOverrides(base: Config, options: SummarizeCommandOptions): Config {
  return {
    ...base,
    backend: {
      ...base.backend,
      provider: options.provider ?? base.backend.provider,
      model: options.model ?? base.backend.model,
    },
    retry: {
      ...base.retry,
      maxAttempts: options.maxAttempts ?? base.retry.maxAttempts,
    },
    summarizer: {
      ...base.summarizer,
      maxContextParagraphs: options.contextParagraphs ?? base.summarizer.maxContextParagraphs,
      defaultLevel: options.summaryLevel ?? base.summarizer.defaultLevel,
    },
  };
}

export function addSummarizeCommand(program: Command): void {
  program
    .command('summarize')
    .description('Summarize a document into a plain text file')
    .argument('<input>', 'Input file (.pdf, .docx, or text) or http(s) URL')
    .argument('<output>', 'Output file; replaced if it exists')
    .addOption(
      new Option('-l, --summary-level <level>', 'Summary level').choices(SUMMARY_LEVEL_CHOICES)
    )
    .option('-p, --prompt <text>', 'Extra instructions appended to the level prompt')
    .addOption(new Option('--provider <name>', 'Completion provider').choices(PROVIDER_NAMES))
    .option('--model <name>', 'Model name sent to the provider')
    .option('--max-attempts <n>', 'Attempts per chunk before giving up', parsePositiveInt)
    .option('--context-paragraphs <n>', 'Summary paragraphs carried between chunks', parsePositiveInt)
    .action(async (input: string, output: string, rawOptions: unknown, cmd: Command) => {
      try {
        const options = parseOptions(summarizeOptionsSchema, rawOptions);
        const globalOpts = parseGlobalOptions(cmd);
        const settings = applyCommandOverrides(config, options);

        const service = createSummarizerService(
          {
            onRetry: (notice) => {
              logger.info(
                {
                  chunkIndex: notice.chunkIndex,
                  failureKind: notice.failureKind,
                  delaySeconds: notice.delayMs / 1000,
                },
                `Retrying in ${notice.delayMs / 1000} seconds`
              );
            },
          },
          settings
        );

        const result = await service.summarizeSource(input, output, {
          level: settings.summarizer.defaultLevel,
          customPrompt: options.prompt,
        });

        console.log(formatOutput(result, globalOpts.format));
      } catch (error) {
        handleCliError(error);
      }
    });
}
