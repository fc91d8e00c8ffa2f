/**
 * CacheAsideService - Read through the cache, fall back to generating
 *
 * getOrGenerate(count, generate):
 * 1. Look the key up. On a hit, decode; a payload that fails to decode (or
 *    holds a different number of items than asked for) counts as a miss.
 * 2. On a miss or backend failure, call generate(count).
 * 3. Hand the result to the cache with the TTL, without waiting on the write.
 * 4. Return the items, cached or fresh.
 *
 * The only errors that escape are caller-input errors, the generator's own
 * errors and cancellation. Cache trouble never does.
 *
 * Concurrent misses on one key both generate and both write; the last write
 * wins. There is no single-flight deduplication.
 */

import type { ResilientCacheClient } from './resilient-cache-client';
import { ValidationError, describeError, throwIfAborted } from '../core/errors';
import { Logger, createLogger } from '../core/logger';
import type { ApplicationMetrics } from '../metrics/application-metrics';

export interface CacheCodec<T> {
  encode(items: readonly T[]): Buffer;
  /** @throws when the payload is not a valid T[] */
  decode(payload: Buffer): T[];
}

export interface CacheAsideOptions<T> {
  cache: ResilientCacheClient;
  metrics: ApplicationMetrics;
  /** Leading key segments, e.g. `api:weather` */
  namespace: string;
  /** Entity segment of the key; also the `entity` tag on hit/miss counters */
  entity: string;
  ttlMs: number;
  codec: CacheCodec<T>;
  logger?: Logger;
}

export interface GetOrGenerateOptions {
  /** Overrides the service's default TTL for this write */
  ttlMs?: number;
  signal?: AbortSignal;
}

export class CacheAsideService<T> {
  private readonly cache: ResilientCacheClient;
  private readonly metrics: ApplicationMetrics;
  private readonly namespace: string;
  private readonly entity: string;
  private readonly ttlMs: number;
  private readonly codec: CacheCodec<T>;
  private readonly logger: Logger;

  constructor(options: CacheAsideOptions<T>) {
    assertTtl(options.ttlMs);
    this.cache = options.cache;
    this.metrics = options.metrics;
    this.namespace = options.namespace;
    this.entity = options.entity;
    this.ttlMs = options.ttlMs;
    this.codec = options.codec;
    this.logger = options.logger ?? createLogger('CacheAside');
  }

  /**
   * `{namespace}:{entity}:{count}`; each count is its own entry
   */
  keyFor(count: number): string {
    return `${this.namespace}:${this.entity}:${count}`;
  }

  async getOrGenerate(
    count: number,
    generate: (count: number) => T[],
    options: GetOrGenerateOptions = {}
  ): Promise<T[]> {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`count must be a non-negative integer, got ${count}`);
    }
    const ttlMs = options.ttlMs ?? this.ttlMs;
    assertTtl(ttlMs);
    throwIfAborted(options.signal);

    if (count === 0) {
      return [];
    }

    const key = this.keyFor(count);
    const tags = { entity: this.entity };

    const cached = await this.readCached(key, count, options.signal);
    if (cached) {
      this.logger.info('Cache HIT', { key });
      this.metrics.cacheHits.add(1, tags);
      return cached;
    }

    this.logger.info('Cache MISS', { key });
    this.metrics.cacheMisses.add(1, tags);

    const items = generate(count);

    let payload: Buffer | undefined;
    try {
      payload = this.codec.encode(items);
    } catch (error) {
      this.logger.warn('Could not serialize generated items, not caching', {
        key,
        error: describeError(error),
      });
    }

    if (payload) {
      this.cache.set(key, payload, ttlMs, options.signal);
    }

    return items;
  }

  private async readCached(key: string, count: number, signal?: AbortSignal): Promise<T[] | undefined> {
    const payload = await this.cache.get(key, signal);
    if (!payload) {
      return undefined;
    }

    try {
      const items = this.codec.decode(payload);
      if (items.length !== count) {
        throw new Error(`expected ${count} items, found ${items.length}`);
      }
      return items;
    } catch (error) {
      this.logger.warn('Cached payload unreadable, regenerating', { key, error: describeError(error) });
      return undefined;
    }
  }
}

function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new ValidationError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
  }
}

/**
 * UTF-8 JSON codec that checks every decoded item with a type guard
 */
export function jsonCodec<T>(isItem: (value: unknown) => value is T, toJson: (item: T) => unknown = (item) => item): CacheCodec<T> {
  return {
    encode(items) {
      return Buffer.from(JSON.stringify(items.map(toJson)), 'utf8');
    },
    decode(payload) {
      const parsed: unknown = JSON.parse(payload.toString('utf8'));
      if (!Array.isArray(parsed)) {
        throw new Error('cached payload is not an array');
      }
      return parsed.map((value: unknown, index) => {
        if (!isItem(value)) {
          throw new Error(`cached item ${index} has an unexpected shape`);
        }
        return value;
      });
    },
  };
}
