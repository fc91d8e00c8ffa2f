import type { CacheEntry, CacheStore } from './cache-store';
import { throwIfAborted } from '../core/errors';
import { Logger, createLogger } from '../core/logger';

export type MemoryCacheStoreOptions = {
  /** Clock, injectable for tests */
  now?: () => number;
  /** How often expired entries are swept; 0 disables sweeping */
  sweepIntervalMs?: number;
  logger?: Logger;
};

const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

/**
 * Process-local CacheStore
 *
 * Stands in for the distributed cache when none is configured. Entries expire
 * at an absolute time; reads past it behave as if the key was never written.
 * Payloads are copied on the way in and out so no caller can mutate an entry
 * in place.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private readonly logger: Logger;
  private sweepInterval?: NodeJS.Timeout;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('MemoryCacheStore');

    const sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweepInterval = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepInterval.unref();
    }
  }

  async get(key: string, signal?: AbortSignal): Promise<Buffer | null> {
    throwIfAborted(signal);

    const entry = this.entries.get(key);
    if (!entry) {
      this.logger.debug('cache miss', { key });
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.logger.debug('cache expired', { key });
      this.entries.delete(key);
      return null;
    }

    this.logger.debug('cache hit', { key });
    return Buffer.from(entry.payload);
  }

  async set(key: string, payload: Buffer, ttlMs: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    const expiresAt = this.now() + ttlMs;
    this.entries.set(key, { payload: Buffer.from(payload), expiresAt });
    this.logger.debug('cache set', { key, ttlMs });
  }

  /**
   * Remove expired entries
   *
   * Runs on the sweep interval; reads already ignore expired entries, this
   * only bounds memory.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = undefined;
    }
    this.entries.clear();
  }
}
