/**
 * Backend contract for a distributed key/byte-value cache with TTL
 *
 * Implementations report failures by rejecting; making those failures
 * harmless is ResilientCacheClient's job, not the backend's.
 */
export type CacheStore = {
  /** Payload for the key, or null when absent or expired */
  get: (key: string, signal?: AbortSignal) => Promise<Buffer | null>;
  /** Replace the key's payload; it expires ttlMs from now */
  set: (key: string, payload: Buffer, ttlMs: number, signal?: AbortSignal) => Promise<void>;
  close: () => Promise<void>;
};

export type CacheEntry = {
  payload: Buffer;
  expiresAt: number;
};
