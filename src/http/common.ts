import type { Response } from 'express';
import type { ServiceInfo, VersionResponse } from '../types';

/**
 * AbortSignal that fires when the client goes away before we answered
 */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function versionBody(service: ServiceInfo, now: Date): VersionResponse {
  return {
    version: service.version,
    commitSha: service.commitSha,
    service: service.name,
    environment: service.environment,
    timestamp: now.toISOString(),
  };
}

/**
 * Parse an optional non-negative integer query parameter
 *
 * @returns the value, the fallback when absent, or null when it is not a valid count
 */
export function parseCountParam(value: unknown, fallback: number, max: number): number | null {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  const count = Number.parseInt(value, 10);
  return count <= max ? count : null;
}
