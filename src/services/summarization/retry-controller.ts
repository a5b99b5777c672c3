/**
 * Retry/Backoff Controller
 *
 * Drives one chunk's request to a terminal state. Rate limits wait for the
 * delay the backend asked for, timeouts wait a fixed delay, and the identical
 * prompt is resubmitted until the attempt budget runs out.
 *
 *   idle -> attempting -> succeeded | backoff | failed
 *   backoff -> attempting
 */

import {
  createValidationError,
  RetriesExhaustedError,
  ServiceError,
  UnknownServiceError,
  type RetryableFailureKind,
} from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { CompletionClient, CompletionOptions } from '../completion/types.js';

const logger = createComponentLogger('retry');

export type RetryPhase = 'idle' | 'attempting' | 'backoff' | 'succeeded' | 'failed';

export interface RetryFailure {
  kind: RetryableFailureKind | 'service_error' | 'unknown_rate_limit';
  message: string;
}

export interface RetryState {
  phase: RetryPhase;
  attempt: number;
  maxAttempts: number;
  lastFailure: RetryFailure | null;
  delayMs: number;
}

export interface RetryNotice {
  /** Attempt that just failed */
  attempt: number;
  maxAttempts: number;
  failureKind: RetryableFailureKind;
  delayMs: number;
  message: string;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryControllerOptions {
  maxAttempts: number;
  /** Fixed wait after a timeout */
  timeoutDelayMs: number;
  sleep?: SleepFn;
  onRetry?: (notice: RetryNotice) => void;
}

export interface RetryResult {
  text: string;
  attempts: number;
}

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RetryController {
  private readonly maxAttempts: number;
  private readonly timeoutDelayMs: number;
  private readonly sleep: SleepFn;
  private readonly onRetry?: (notice: RetryNotice) => void;
  private current: RetryState;

  constructor(
    private readonly client: CompletionClient,
    options: RetryControllerOptions
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw createValidationError(
        'maxAttempts',
        `must be a positive integer (got ${options.maxAttempts})`
      );
    }
    if (!Number.isFinite(options.timeoutDelayMs) || options.timeoutDelayMs < 0) {
      throw createValidationError(
        'timeoutDelayMs',
        `must be a non-negative number (got ${options.timeoutDelayMs})`
      );
    }

    this.maxAttempts = options.maxAttempts;
    this.timeoutDelayMs = options.timeoutDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.onRetry = options.onRetry;
    this.current = this.initialState();
  }

  /** State of the most recent request */
  get state(): RetryState {
    return { ...this.current };
  }

  /**
   * Submit `prompt` until it succeeds or fails terminally
   *
   * @throws ServiceError for errors without a retry policy
   * @throws UnknownServiceError for rate limits that carry no delay
   * @throws RetriesExhaustedError when every attempt failed with a retryable error
   */
  async execute(prompt: string, options: CompletionOptions): Promise<RetryResult> {
    const state = this.initialState();
    this.current = state;

    while (true) {
      state.phase = 'attempting';
      state.attempt++;
      state.delayMs = 0;

      const outcome = await this.client.complete(prompt, options);

      if (outcome.kind === 'success') {
        state.phase = 'succeeded';
        return { text: outcome.text, attempts: state.attempt };
      }

      if (outcome.kind === 'service_error') {
        state.phase = 'failed';
        state.lastFailure = { kind: 'service_error', message: outcome.message };
        throw new ServiceError(this.client.provider, outcome.message, { attempt: state.attempt });
      }

      let delayMs: number;
      if (outcome.kind === 'timeout') {
        delayMs = this.timeoutDelayMs;
      } else if (outcome.retryAfterSeconds === null) {
        state.phase = 'failed';
        state.lastFailure = { kind: 'unknown_rate_limit', message: outcome.message };
        throw new UnknownServiceError(outcome.message, { attempt: state.attempt });
      } else {
        delayMs = outcome.retryAfterSeconds * 1000;
      }

      const failureKind: RetryableFailureKind = outcome.kind;
      state.lastFailure = { kind: failureKind, message: outcome.message };
      state.delayMs = delayMs;

      if (state.attempt >= this.maxAttempts) {
        state.phase = 'failed';
        throw new RetriesExhaustedError(failureKind, state.attempt, outcome.message);
      }

      state.phase = 'backoff';
      const notice: RetryNotice = {
        attempt: state.attempt,
        maxAttempts: this.maxAttempts,
        failureKind,
        delayMs: state.delayMs,
        message: outcome.message,
      };
      logger.warn(notice, 'Request failed, retrying after delay');
      this.onRetry?.(notice);

      await this.sleep(state.delayMs);
    }
  }

  private initialState(): RetryState {
    return {
      phase: 'idle',
      attempt: 0,
      maxAttempts: this.maxAttempts,
      lastFailure: null,
      delayMs: 0,
    };
  }
}
