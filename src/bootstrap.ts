/**
 * Startup steps shared by both entry points
 */

import type { AppConfig } from './config';
import { Logger, createLogger, parseLogLevel, setLogLevel } from './core/logger';
import {
  DEFAULT_FEATURE_FLAGS,
  type FeatureFlag,
  type FeatureFlagHandle,
  initializeFeatureFlags,
  loadLocalFlagDefaults,
} from './features/feature-flags';

export function applyLogLevel(config: AppConfig, logger: Logger): void {
  const level = parseLogLevel(config.logLevel);
  if (level === null) {
    logger.warn('Unknown LOG_LEVEL, keeping current level', { logLevel: config.logLevel });
    return;
  }
  setLogLevel(level);
}

export async function loadFeatureFlags(config: AppConfig): Promise<FeatureFlagHandle<FeatureFlag>> {
  const logger = createLogger('FeatureFlags');
  return initializeFeatureFlags<FeatureFlag>({
    endpoint: config.appConfigEndpoint,
    token: config.appConfigToken,
    defaults: loadLocalFlagDefaults(config.featureFlagsFile, DEFAULT_FEATURE_FLAGS, logger),
    environment: config.environment,
    refreshIntervalMs: config.flagRefreshIntervalMs,
    connectTimeoutMs: config.flagConnectTimeoutMs,
    logger,
  });
}
