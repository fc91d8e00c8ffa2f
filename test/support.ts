import type { Express } from 'express';
import { vi } from 'vitest';
import type { CacheStore } from '../src/cache/cache-store';

/**
 * CacheStore whose every call fails, like a cache that is down
 */
export function failingStore(message = 'connect ECONNREFUSED 127.0.0.1:6379') {
  const store = {
    get: vi.fn(async (_key: string, _signal?: AbortSignal): Promise<Buffer | null> => {
      throw new Error(message);
    }),
    set: vi.fn(async (_key: string, _payload: Buffer, _ttlMs: number, _signal?: AbortSignal): Promise<void> => {
      throw new Error(message);
    }),
    close: vi.fn(async (): Promise<void> => undefined),
  } satisfies CacheStore;
  return store;
}

/**
 * CacheStore whose writes stay pending until released
 */
export function slowWriteStore() {
  const releases: Array<() => void> = [];
  const store = {
    get: vi.fn(async (_key: string, _signal?: AbortSignal): Promise<Buffer | null> => null),
    set: vi.fn(
      (_key: string, _payload: Buffer, _ttlMs: number, _signal?: AbortSignal) =>
        new Promise<void>((resolve) => {
          releases.push(resolve);
        })
    ),
    close: vi.fn(async (): Promise<void> => undefined),
  } satisfies CacheStore;
  return { store, releaseAll: () => releases.splice(0).forEach((release) => release()) };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export interface RunningApp {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Serve an Express app on an ephemeral loopback port
 */
export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('server is not listening on a TCP port'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
