/**
 * RetryManager - Handles retries with exponential backoff and jitter
 *
 * Key Concepts (from AWS Builders' Library):
 * 1. Exponential Backoff: Delay doubles each retry (200ms, 400ms, 800ms, ...)
 * 2. Equal Jitter: Half the delay is fixed, half is random
 * 3. Hard Timeout: Enforces maximum wait time per attempt
 *
 * Each retry waits between half and all of the nominal delay.
 */

import {
  CancelledError,
  TimeoutError,
  describeError,
  isCancellation,
  sleep,
  throwIfAborted,
} from './errors';
import { Logger, createLogger } from './logger';

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Budget for one attempt */
  timeoutMs: number;
  /** Decides whether a failed attempt may be retried (default: always) */
  shouldRetry?: (error: unknown) => boolean;
  /**
   * Gate run before each attempt. Throwing here ends the retry loop
   * with that error and no attempt is made.
   */
  beforeAttempt?: (attempt: number) => void;
  /** Observes each failed attempt */
  onAttemptFailed?: (error: unknown, attempt: number) => void;
  logger?: Logger;
  /** Randomness source for jitter, injectable for tests */
  random?: () => number;
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: unknown; attempts: number; totalTimeMs: number };

const defaultLogger = createLogger('Retry');

/**
 * Retries a function with exponential backoff and equal jitter
 *
 * The function receives an attempt-scoped AbortSignal that fires when the
 * attempt times out or the caller's signal fires. Caller cancellation is not a
 * failure: it rejects with CancelledError instead of producing a result.
 *
 * @param fn - The async function to retry
 * @param options - Retry configuration
 * @param signal - Caller cancellation
 * @returns Result with success status, data/error, and metadata
 */
export async function retryWithBackoff<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
  signal?: AbortSignal
): Promise<RetryResult<T>> {
  const logger = options.logger ?? defaultLogger;
  const startTime = Date.now();
  let lastError: unknown = new Error('Unknown error');
  let attempts = 0;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    throwIfAborted(signal);

    try {
      options.beforeAttempt?.(attempt);
    } catch (gateError) {
      return {
        success: false,
        error: gateError,
        attempts,
        totalTimeMs: Date.now() - startTime,
      };
    }

    attempts = attempt + 1;

    try {
      logger.debug(`Attempt ${attempts}/${options.maxAttempts}`);

      // Enforce hard timeout on this attempt
      const result = await withTimeout(fn, options.timeoutMs, signal);

      const totalTimeMs = Date.now() - startTime;
      logger.debug(`Success on attempt ${attempts}`, { totalTimeMs });

      return {
        success: true,
        data: result,
        attempts,
        totalTimeMs,
      };
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) {
        throw new CancelledError();
      }

      lastError = error;
      options.onAttemptFailed?.(error, attempt);
      logger.debug(`Attempt ${attempts} failed: ${describeError(error)}`);

      if (options.shouldRetry && !options.shouldRetry(error)) {
        break;
      }

      // If this was the last attempt, don't sleep
      if (attempt === options.maxAttempts - 1) {
        break;
      }

      const delay = calculateDelayWithJitter(
        attempt,
        options.initialDelayMs,
        options.maxDelayMs,
        options.random ?? Math.random
      );

      logger.debug(`Waiting ${delay}ms before attempt ${attempts + 1}`);
      await sleep(delay, signal);
    }
  }

  const totalTimeMs = Date.now() - startTime;
  logger.debug(`Giving up after ${attempts} attempt(s)`, { totalTimeMs, error: describeError(lastError) });

  return {
    success: false,
    error: lastError,
    attempts,
    totalTimeMs,
  };
}

/**
 * Calculates retry delay using capped exponential backoff with equal jitter
 *
 * Formula:
 * 1. Exponential backoff: initialDelay * (2 ^ attempt)
 * 2. Cap at maxDelay: min(calculated, maxDelay)
 * 3. Equal jitter: capped / 2 + random(0, capped / 2)
 *
 * Example with initialDelay=200ms, maxDelay=2s:
 * - After attempt 0: 100-200ms
 * - After attempt 1: 200-400ms
 * - After attempt 2: 400-800ms
 * - After attempt 4: 1000-2000ms (capped)
 */
export function calculateDelayWithJitter(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = initialDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const half = cappedDelay / 2;

  return Math.floor(half + random() * half);
}

/**
 * Runs one attempt under a hard timeout
 *
 * The attempt gets its own AbortController, aborted with a TimeoutError when
 * the budget runs out or with the caller's reason when the caller cancels, so
 * fetch and friends actually stop instead of running on in the background.
 */
async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timeoutError = new TimeoutError(timeoutMs);

  const onCallerAbort = () => controller.abort(new CancelledError());
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort(timeoutError);
      reject(timeoutError);
    }, timeoutMs);
  });
  const cancelPromise = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        if (controller.signal.reason !== timeoutError) {
          reject(new CancelledError());
        }
      },
      { once: true }
    );
  });

  const work = new Promise<T>((resolve, reject) => {
    fn(controller.signal).then(resolve, reject);
  });

  try {
    // Race: whichever completes first wins
    return await Promise.race([work, timeoutPromise, cancelPromise]);
  } catch (error) {
    if (controller.signal.reason === timeoutError) {
      throw timeoutError;
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onCallerAbort);
    work.catch(() => undefined);
    timeoutPromise.catch(() => undefined);
    cancelPromise.catch(() => undefined);
  }
}
