/**
 * Structured logging utility using pino
 *
 * - Level from LOG_LEVEL, or debug when SUMMARIZER_DEBUG is set
 * - Pretty printing outside production, JSON lines in production
 * - Always written to stderr so stdout stays free for command output
 * - Silent under test
 */

import pino from 'pino';
import { sanitizeForLogging } from './sanitize.js';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/**
 * Common pino options with credential redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: config.logging.debug ? 'debug' : config.logging.level,
  enabled: !isTest,
  redact: {
    paths: [
      'apiKey',
      'openaiApiKey',
      'azureApiKey',
      'anthropicApiKey',
      'authorization',
      'Authorization',
      '*.apiKey',
      '*.openaiApiKey',
      '*.azureApiKey',
      '*.anthropicApiKey',
      'headers.authorization',
      'headers["api-key"]',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: (value: unknown) => sanitizeForLogging(value),
  },
};

const usePrettyOutput = config.runtime.nodeEnv !== 'production' && !isTest;

export const logger = !usePrettyOutput
  ? pino(pinoOptions, pino.destination({ dest: 2, sync: true }))
  : pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'summarizer', 'retry', 'openai-provider')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
