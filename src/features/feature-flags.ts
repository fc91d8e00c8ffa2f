/**
 * Feature flags: known names, defaults, and the Config Source Resolver
 *
 * OFFLINE-FIRST:
 * The process must start and run with no flag service at all. If the remote
 * source is missing, unreachable, rejects our credentials or returns garbage,
 * initializeFeatureFlags logs ONE warning naming the failure category and hands
 * back a handle backed by the local defaults. It never rejects.
 *
 * When the first fetch succeeds, the handle refreshes in the background every
 * refreshIntervalMs. A failed refresh keeps the last-known values.
 *
 * isEnabled() is synchronous and only reads memory.
 */

import fs from 'fs';
import path from 'path';
import {
  type FlagSnapshotEntry,
  type FlagSnapshotSource,
  HttpFlagSnapshotSource,
  classifyFlagSourceError,
} from './flag-source';
import { TimeoutError, describeError } from '../core/errors';
import { Logger, createLogger } from '../core/logger';

export enum FeatureFlag {
  WeatherForecast = 'WeatherForecast',
  DetailedHealth = 'DetailedHealth',
}

export const DEFAULT_FEATURE_FLAGS: Readonly<Record<FeatureFlag, boolean>> = {
  [FeatureFlag.WeatherForecast]: true,
  [FeatureFlag.DetailedHealth]: false,
};

export const DEFAULT_REFRESH_INTERVAL_MS = 30 * 1000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5 * 1000;

export type FlagBacking = 'remote' | 'local';

export class FeatureFlagHandle<F extends string = FeatureFlag> {
  readonly backing: FlagBacking;
  private readonly defaults: Readonly<Record<F, boolean>>;
  private readonly environment: string;
  private readonly logger: Logger;
  private flags: Map<string, boolean>;
  private source?: FlagSnapshotSource;
  private timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS;
  private refreshTimer?: NodeJS.Timeout;
  private refreshing = false;
  private lastRefreshFailed = false;

  constructor(defaults: Readonly<Record<F, boolean>>, backing: FlagBacking, environment: string, logger: Logger) {
    this.defaults = defaults;
    this.backing = backing;
    this.environment = environment;
    this.logger = logger;
    this.flags = new Map(Object.entries<boolean>(defaults));
  }

  /**
   * Current value of a flag; names nobody defined resolve to false
   */
  isEnabled(flag: F): boolean {
    return this.flags.get(flag) ?? false;
  }

  snapshot(): Record<string, boolean> {
    return Object.fromEntries(this.flags);
  }

  /**
   * Replace the current values with defaults overlaid by a snapshot
   */
  apply(entries: readonly FlagSnapshotEntry[]): void {
    const next = new Map(Object.entries<boolean>(this.defaults));

    for (const entry of entries) {
      if (entry.label === null) {
        next.set(entry.name, entry.enabled);
      }
    }
    for (const entry of entries) {
      if (entry.label === this.environment) {
        next.set(entry.name, entry.enabled);
      }
    }

    this.flags = next;
  }

  /**
   * Fetch a fresh snapshot now
   *
   * Never rejects. Overlapping calls are skipped.
   *
   * @returns true when the values were updated
   */
  async refresh(): Promise<boolean> {
    if (!this.source || this.refreshing) {
      return false;
    }

    this.refreshing = true;
    try {
      const entries = await fetchSnapshotWithin(this.source, this.environment, this.timeoutMs);
      this.apply(entries);
      if (this.lastRefreshFailed) {
        this.logger.info('Feature flag refresh recovered', { source: this.source.description });
      }
      this.lastRefreshFailed = false;
      return true;
    } catch (error) {
      const context = {
        source: this.source.description,
        category: classifyFlagSourceError(error),
        error: describeError(error),
      };
      if (this.lastRefreshFailed) {
        this.logger.debug('Feature flag refresh still failing', context);
      } else {
        this.logger.warn('Feature flag refresh failed, keeping last known values', context);
      }
      this.lastRefreshFailed = true;
      return false;
    } finally {
      this.refreshing = false;
    }
  }

  /** @internal wire the background refresh; used by initializeFeatureFlags */
  startRefresh(source: FlagSnapshotSource, intervalMs: number, timeoutMs: number): void {
    this.source = source;
    this.timeoutMs = timeoutMs;
    this.stopRefresh();
    if (intervalMs > 0) {
      this.refreshTimer = setInterval(() => {
        void this.refresh();
      }, intervalMs);
      this.refreshTimer.unref();
    }
  }

  close(): void {
    this.stopRefresh();
  }

  private stopRefresh(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = undefined;
    }
  }
}

export interface InitializeFeatureFlagsOptions<F extends string> {
  /** Remote flag service; absent means local defaults only */
  endpoint?: string;
  token?: string;
  defaults: Readonly<Record<F, boolean>>;
  /** Label selecting environment-specific values */
  environment: string;
  /** Use this source instead of the HTTP one built from `endpoint` */
  source?: FlagSnapshotSource;
  fetchImpl?: typeof fetch;
  refreshIntervalMs?: number;
  connectTimeoutMs?: number;
  logger?: Logger;
}

export async function initializeFeatureFlags<F extends string>(
  options: InitializeFeatureFlagsOptions<F>
): Promise<FeatureFlagHandle<F>> {
  const logger = options.logger ?? createLogger('FeatureFlags');
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  if (!options.source && !options.endpoint) {
    logger.info('No feature flag service configured, using local defaults');
    return new FeatureFlagHandle(options.defaults, 'local', options.environment, logger);
  }

  try {
    const source = options.source ?? new HttpFlagSnapshotSource({
      endpoint: options.endpoint ?? '',
      token: options.token,
      fetchImpl: options.fetchImpl,
    });

    const entries = await fetchSnapshotWithin(source, options.environment, connectTimeoutMs);

    const handle = new FeatureFlagHandle(options.defaults, 'remote', options.environment, logger);
    handle.apply(entries);
    handle.startRefresh(source, options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS, connectTimeoutMs);

    logger.info('Feature flags loaded from remote source', {
      source: source.description,
      environment: options.environment,
      flags: entries.length,
    });
    return handle;
  } catch (error) {
    logger.warn('Could not connect to feature flag service, falling back to local defaults', {
      endpoint: options.endpoint,
      category: classifyFlagSourceError(error),
      error: describeError(error),
    });
    return new FeatureFlagHandle(options.defaults, 'local', options.environment, logger);
  }
}

/**
 * Read local defaults from a JSON object of `{ "FlagName": boolean }`
 *
 * Names not present in `defaults` are ignored with a warning so a typo cannot
 * silently create a new flag. A missing or unreadable file keeps `defaults`.
 */
export function loadLocalFlagDefaults<F extends string>(
  file: string,
  defaults: Readonly<Record<F, boolean>>,
  logger: Logger = createLogger('FeatureFlags')
): Record<F, boolean> {
  const result: Record<F, boolean> = { ...defaults };
  const resolved = path.resolve(file);

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf8');
  } catch (error) {
    logger.debug('No local feature flag file, using built-in defaults', {
      file: resolved,
      error: describeError(error),
    });
    return result;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('Local feature flag file is not valid JSON, using built-in defaults', {
      file: resolved,
      error: describeError(error),
    });
    return result;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    logger.warn('Local feature flag file must hold an object, using built-in defaults', { file: resolved });
    return result;
  }

  for (const [name, value] of Object.entries(parsed)) {
    if (!isKnownFlag(name, defaults)) {
      logger.warn('Unknown feature flag in local defaults, ignored', { file: resolved, flag: name });
      continue;
    }
    if (typeof value !== 'boolean') {
      logger.warn('Feature flag value must be a boolean, ignored', { file: resolved, flag: name });
      continue;
    }
    result[name] = value;
  }

  return result;
}

function isKnownFlag<F extends string>(name: string, defaults: Readonly<Record<F, boolean>>): name is F {
  return Object.prototype.hasOwnProperty.call(defaults, name);
}

async function fetchSnapshotWithin(
  source: FlagSnapshotSource,
  environment: string,
  timeoutMs: number
): Promise<FlagSnapshotEntry[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([source.fetchSnapshot(environment, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
