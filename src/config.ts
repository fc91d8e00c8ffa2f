/**
 * Configuration for the weather API and web gateway
 *
 * Every value comes from the environment (a .env file is merged in first) and
 * every value has a default: a missing cache connection string or flag
 * endpoint is a supported mode, not an error. Numbers must be plain decimal
 * integers no smaller than their minimum; anything else is logged and replaced
 * by the default. Loading never throws.
 */

import dotenv from 'dotenv';
import { createLogger } from './core/logger';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  // Server
  port: number;
  webPort: number;
  environment: string;
  version: string;
  commitSha: string;
  logLevel: string;

  // Cache
  cacheConnectionString?: string;
  cacheTtlMs: number;
  cacheCommandTimeoutMs: number;
  cacheShutdownTimeoutMs: number;

  // Feature flags
  appConfigEndpoint?: string;
  appConfigToken?: string;
  featureFlagsFile: string;
  flagRefreshIntervalMs: number;
  flagConnectTimeoutMs: number;

  // Remote calls (web gateway -> weather API)
  weatherServiceUrl: string;
  remoteMaxAttempts: number;
  remoteInitialRetryDelayMs: number;
  remoteMaxRetryDelayMs: number;
  remoteAttemptTimeoutMs: number;
  circuitFailureThreshold: number;
  circuitCooldownMs: number;
}

const logger = createLogger('Config');

export function loadConfig(env: Env = loadDotenv()): AppConfig {
  return {
    port: parseNumber(env.PORT, 3000, 'port'),
    webPort: parseNumber(env.WEB_PORT, 3001, 'webPort'),
    environment: firstOf(env.APP_ENVIRONMENT, env.NODE_ENV) ?? 'Development',
    version: firstOf(env.APP_VERSION) ?? '1.0.0-local',
    commitSha: firstOf(env.COMMIT_SHA, env.GITHUB_SHA?.slice(0, 7)) ?? 'local',
    logLevel: firstOf(env.LOG_LEVEL) ?? 'info',

    cacheConnectionString: firstOf(env.CACHE_CONNECTION_STRING, env.ConnectionStrings__cache),
    cacheTtlMs: parseNumber(env.CACHE_TTL_MS, 5 * 60 * 1000, 'cacheTtlMs', 1),
    cacheCommandTimeoutMs: parseNumber(env.CACHE_COMMAND_TIMEOUT_MS, 1000, 'cacheCommandTimeoutMs', 1),
    cacheShutdownTimeoutMs: parseNumber(env.CACHE_SHUTDOWN_TIMEOUT_MS, 2000, 'cacheShutdownTimeoutMs'),

    appConfigEndpoint: firstOf(env.APP_CONFIG_ENDPOINT, env.AppConfig__Endpoint),
    appConfigToken: firstOf(env.APP_CONFIG_TOKEN),
    featureFlagsFile: firstOf(env.FEATURE_FLAGS_FILE) ?? 'config/feature-flags.json',
    flagRefreshIntervalMs: parseNumber(env.FLAG_REFRESH_INTERVAL_MS, 30 * 1000, 'flagRefreshIntervalMs', 1),
    flagConnectTimeoutMs: parseNumber(env.FLAG_CONNECT_TIMEOUT_MS, 5 * 1000, 'flagConnectTimeoutMs', 1),

    weatherServiceUrl:
      firstOf(
        env.WEATHER_SERVICE_URL,
        env.services__weatherservice__https__0,
        env.services__weatherservice__http__0
      ) ?? 'http://localhost:3000',
    remoteMaxAttempts: parseNumber(env.REMOTE_MAX_ATTEMPTS, 3, 'remoteMaxAttempts', 1),
    remoteInitialRetryDelayMs: parseNumber(env.REMOTE_INITIAL_RETRY_DELAY_MS, 200, 'remoteInitialRetryDelayMs'),
    remoteMaxRetryDelayMs: parseNumber(env.REMOTE_MAX_RETRY_DELAY_MS, 2000, 'remoteMaxRetryDelayMs'),
    remoteAttemptTimeoutMs: parseNumber(env.REMOTE_ATTEMPT_TIMEOUT_MS, 10 * 1000, 'remoteAttemptTimeoutMs', 1),
    circuitFailureThreshold: parseNumber(env.CIRCUIT_FAILURE_THRESHOLD, 5, 'circuitFailureThreshold', 1),
    circuitCooldownMs: parseNumber(env.CIRCUIT_COOLDOWN_MS, 30 * 1000, 'circuitCooldownMs'),
  };
}

function loadDotenv(): Env {
  dotenv.config();
  return process.env;
}

export function parseNumber(value: string | undefined, fallback: number, name: string, min = 0): number {
  const trimmed = value?.trim();
  if (!trimmed) {
    return fallback;
  }

  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min) {
    logger.warn('Invalid value, using default', { name, value, fallback, min });
    return fallback;
  }

  return parsed;
}

function firstOf(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim();
}
