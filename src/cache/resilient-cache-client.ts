/**
 * ResilientCacheClient - A cache that is allowed to be down
 *
 * The cache is a performance optimization, never a correctness dependency.
 * Every backend failure (connection refused, timeout, protocol error) is
 * logged once and turned into "no cache": a read becomes a miss, a write
 * becomes a no-op. Nothing is retried; one failed attempt is an answer.
 *
 * lookup() keeps the three outcomes apart (hit / miss / backend error) so
 * tests and diagnostics can tell them apart; get() folds miss and error
 * together, which is what production callers want.
 *
 * Cancellation is the exception to "never throws": a fired AbortSignal always
 * surfaces as CancelledError.
 *
 * SHUTDOWN:
 * Writes are fire-and-forget but tracked. shutdown(timeoutMs) waits for the
 * pending ones up to the timeout and abandons whatever is still in flight.
 */

import type { CacheStore } from './cache-store';
import {
  CancelledError,
  ValidationError,
  describeError,
  isCancellation,
  throwIfAborted,
} from '../core/errors';
import { Logger, createLogger } from '../core/logger';

export type CacheResult =
  | { kind: 'hit'; payload: Buffer }
  | { kind: 'miss' }
  | { kind: 'error'; error: Error };

export interface ShutdownReport {
  completed: number;
  abandoned: number;
}

export class ResilientCacheClient {
  private readonly store: CacheStore;
  private readonly logger: Logger;
  private readonly pendingWrites = new Set<Promise<void>>();
  private closed = false;

  constructor(store: CacheStore, logger: Logger = createLogger('CacheClient')) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Read a key, keeping miss and backend failure distinct
   *
   * @throws CancelledError when the signal fires
   */
  async lookup(key: string, signal?: AbortSignal): Promise<CacheResult> {
    validateKey(key);
    throwIfAborted(signal);

    if (this.closed) {
      return { kind: 'miss' };
    }

    try {
      const payload = await this.store.get(key, signal);
      return payload === null ? { kind: 'miss' } : { kind: 'hit', payload };
    } catch (error) {
      if (signal?.aborted || isCancellation(error)) {
        throw new CancelledError();
      }
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn('Cache read failed, treating as miss', { key, error: failure.message });
      return { kind: 'error', error: failure };
    }
  }

  /**
   * Read a key; a backend failure looks exactly like a miss
   */
  async get(key: string, signal?: AbortSignal): Promise<Buffer | undefined> {
    const result = await this.lookup(key, signal);
    return result.kind === 'hit' ? result.payload : undefined;
  }

  /**
   * Start a write and return immediately
   *
   * The write's outcome never reaches the caller: failures are logged and
   * dropped. Only invalid arguments and an already-fired signal throw.
   */
  set(key: string, payload: Buffer, ttlMs: number, signal?: AbortSignal): void {
    validateKey(key);
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new ValidationError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
    }
    throwIfAborted(signal);

    if (this.closed) {
      this.logger.debug('Cache client closed, write skipped', { key });
      return;
    }

    const attempt = new Promise<void>((resolve, reject) => {
      this.store.set(key, payload, ttlMs, signal).then(resolve, reject);
    });
    const write = attempt.then(
      () => {
        this.logger.debug('Cached entry', { key, ttlMs });
      },
      (error: unknown) => {
        if (signal?.aborted || isCancellation(error)) {
          this.logger.debug('Cache write abandoned, caller cancelled', { key });
          return;
        }
        this.logger.warn('Cache write failed, continuing without cache', {
          key,
          error: describeError(error),
        });
      }
    );

    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }

  /** Number of writes issued but not yet settled */
  get pendingWriteCount(): number {
    return this.pendingWrites.size;
  }

  /**
   * Wait for every write issued so far to settle
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  /**
   * Stop accepting work, wait up to timeoutMs for pending writes, then close the backend
   *
   * Writes still running when the timeout expires are abandoned: their
   * results are ignored and they are not waited for.
   */
  async shutdown(timeoutMs: number): Promise<ShutdownReport> {
    this.closed = true;
    const pending = [...this.pendingWrites];
    let completed = 0;
    pending.forEach((write) => {
      void write.then(() => {
        completed += 1;
      });
    });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([Promise.all(pending).then(() => 'drained' as const), timedOut]);
    clearTimeout(timer);

    const abandoned = outcome === 'drained' ? 0 : pending.length - completed;
    if (abandoned > 0) {
      this.logger.warn('Abandoning pending cache writes at shutdown', { abandoned, timeoutMs });
    }

    try {
      await this.store.close();
    } catch (error) {
      this.logger.warn('Cache backend did not close cleanly', { error: describeError(error) });
    }

    return { completed: outcome === 'drained' ? pending.length : completed, abandoned };
  }
}

function validateKey(key: string): void {
  if (typeof key !== 'string' || key.trim().length === 0) {
    throw new ValidationError('Cache key must be a non-empty string');
  }
}
