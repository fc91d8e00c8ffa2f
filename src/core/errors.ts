/**
 * Error taxonomy
 *
 * - ValidationError: caller input is wrong. Propagated immediately, never retried.
 * - CancelledError: the caller's AbortSignal fired. Always propagated, never retried,
 *   never logged as a failure.
 * - TimeoutError: a single remote attempt ran past its budget. Transient.
 * - RemoteCallError: the peer answered with a non-success status.
 * - ServiceUnavailableError: the remote caller gave up (circuit open or retries exhausted).
 *
 * Cache and config backend failures have no class of their own: they are recovered
 * where they happen and never cross a component boundary.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RemoteCallError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText} (${url})`);
    this.name = 'RemoteCallError';
    this.status = status;
    this.url = url;
  }

  /** 408, 429 and 5xx are worth another attempt; other statuses are the caller's problem */
  get transient(): boolean {
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export type UnavailableReason = 'circuit-open' | 'retries-exhausted';

export class ServiceUnavailableError extends Error {
  readonly reason: UnavailableReason;
  readonly attempts: number;

  constructor(service: string, reason: UnavailableReason, attempts: number, cause?: unknown) {
    super(
      reason === 'circuit-open'
        ? `${service} is unavailable: circuit is open`
        : `${service} is unavailable after ${attempts} attempts`,
      { cause },
    );
    this.name = 'ServiceUnavailableError';
    this.reason = reason;
    this.attempts = attempts;
  }
}

/**
 * Is this error the caller giving up, as opposed to something failing?
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Race a promise against an AbortSignal
 *
 * The underlying work is abandoned, not stopped: its eventual result is ignored.
 * Rejects with CancelledError as soon as the signal fires.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Sleep that wakes early (with CancelledError) when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
