/**
 * ResilientCaller - Retry + circuit breaker + timeout around calls to one peer
 *
 * Policy per call:
 * - Up to maxAttempts attempts (idempotent calls only; others get exactly one)
 * - Each attempt bounded by timeoutMs; a timeout is a failure like any other
 * - Every transient failure counts against the circuit breaker
 * - While the circuit is open, attempts are refused without touching the network
 *
 * Outcomes:
 * - success: the operation's value
 * - non-transient failure (e.g. HTTP 404): that error, unchanged
 * - circuit open / attempts exhausted: ServiceUnavailableError
 * - caller cancelled: CancelledError
 *
 * EXAMPLE USAGE:
 * ```typescript
 * const caller = new ResilientCaller('weatherservice', { maxAttempts: 3, ... });
 * const body = await caller.call((signal) => fetch(url, { signal }).then((r) => r.json()), { signal });
 * ```
 */

import { CircuitBreaker, type CircuitBreakerSnapshot, type CircuitState } from './circuit-breaker';
import {
  RemoteCallError,
  ServiceUnavailableError,
  TimeoutError,
  ValidationError,
  describeError,
  isCancellation,
} from './errors';
import { Logger, createLogger } from './logger';
import { retryWithBackoff, type RetryResult } from './retry-manager';

export interface ResiliencePolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
  failureThreshold: number;
  cooldownMs: number;
}

export const DEFAULT_RESILIENCE_POLICY: ResiliencePolicy = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 2000,
  attemptTimeoutMs: 10_000,
  failureThreshold: 5,
  cooldownMs: 30_000,
};

export interface ResilientCallerOptions extends Partial<ResiliencePolicy> {
  logger?: Logger;
  now?: () => number;
  random?: () => number;
  /** Failures that should not be retried nor counted against the circuit */
  isTransient?: (error: unknown) => boolean;
}

export interface CallOptions {
  signal?: AbortSignal;
  /** Only idempotent reads are retried (default true) */
  idempotent?: boolean;
}

/**
 * Timeouts, network errors and 408/429/5xx are transient; other HTTP statuses,
 * caller input errors and cancellation are not
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ValidationError) {
    return false;
  }
  if (error instanceof RemoteCallError) {
    return error.transient;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  return !isCancellation(error);
}

export class ResilientCaller {
  readonly service: string;
  private readonly policy: ResiliencePolicy;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly random?: () => number;
  private readonly isTransient: (error: unknown) => boolean;

  constructor(service: string, options: ResilientCallerOptions = {}) {
    const { logger, now, random, isTransient, ...policy } = options;
    this.service = service;
    this.policy = { ...DEFAULT_RESILIENCE_POLICY, ...policy };
    this.logger = logger ?? createLogger('ResilientCaller');
    this.random = random;
    this.isTransient = isTransient ?? isTransientFailure;

    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }

    this.breaker = new CircuitBreaker({
      failureThreshold: this.policy.failureThreshold,
      cooldownMs: this.policy.cooldownMs,
      now,
      onStateChange: (from, to) => this.logCircuitChange(from, to),
    });
  }

  get circuitState(): CircuitState {
    return this.breaker.state;
  }

  circuitSnapshot(): CircuitBreakerSnapshot {
    return this.breaker.snapshot();
  }

  async call<T>(operation: (signal: AbortSignal) => Promise<T>, options: CallOptions = {}): Promise<T> {
    const maxAttempts = options.idempotent === false ? 1 : this.policy.maxAttempts;
    let holdsTrial = false;
    // Epoch of the breaker when the current attempt was let through
    let admittedIn: number | undefined;

    let result: RetryResult<T>;
    try {
      result = await retryWithBackoff(
        operation,
        {
          maxAttempts,
          initialDelayMs: this.policy.initialDelayMs,
          maxDelayMs: this.policy.maxDelayMs,
          timeoutMs: this.policy.attemptTimeoutMs,
          random: this.random,
          logger: this.logger.child(this.service),
          shouldRetry: (error) => this.isTransient(error),
          beforeAttempt: (attempt) => {
            if (!this.breaker.tryAcquire()) {
              throw new ServiceUnavailableError(this.service, 'circuit-open', attempt);
            }
            admittedIn = this.breaker.epoch;
            holdsTrial = this.breaker.state === 'half-open';
          },
          onAttemptFailed: (error) => {
            holdsTrial = false;
            if (this.isTransient(error)) {
              this.breaker.recordFailure(admittedIn);
            } else {
              // The peer answered; it is up, the request was just wrong
              this.breaker.recordSuccess(admittedIn);
            }
          },
        },
        options.signal
      );
    } catch (error) {
      if (holdsTrial) {
        this.breaker.releaseTrial(admittedIn);
      }
      throw error;
    }

    if (result.success) {
      this.breaker.recordSuccess(admittedIn);
      return result.data;
    }

    if (result.error instanceof ServiceUnavailableError) {
      this.logger.warn('Call refused, circuit is open', {
        service: this.service,
        attempts: result.attempts,
      });
      throw result.error;
    }

    if (!this.isTransient(result.error)) {
      throw result.error;
    }

    this.logger.warn('Call failed, attempts exhausted', {
      service: this.service,
      attempts: result.attempts,
      totalTimeMs: result.totalTimeMs,
      error: describeError(result.error),
    });
    throw new ServiceUnavailableError(this.service, 'retries-exhausted', result.attempts, result.error);
  }

  private logCircuitChange(from: CircuitState, to: CircuitState): void {
    const context = { service: this.service, from, to };
    if (to === 'open') {
      this.logger.warn('Circuit opened', { ...context, cooldownMs: this.policy.cooldownMs });
    } else {
      this.logger.info(`Circuit ${to}`, context);
    }
  }
}
