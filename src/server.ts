/**
 * Weather API - HTTP Server
 *
 * Builds every dependency from configuration, starts listening and shuts
 * down gracefully on SIGTERM/SIGINT:
 * 1. stop the feature flag refresh
 * 2. drain pending cache writes (bounded; the rest are abandoned)
 * 3. close the HTTP server and exit
 */

import type { Server } from 'http';
import { type AppConfig, loadConfig } from './config';
import { createApiApp } from './api/app';
import { ResilientCacheClient } from './cache/resilient-cache-client';
import type { CacheStore } from './cache/cache-store';
import { MemoryCacheStore } from './cache/memory-cache-store';
import { createRedisCacheStore } from './cache/redis-cache-store';
import { describeError } from './core/errors';
import { Logger, createLogger } from './core/logger';
import { applyLogLevel, loadFeatureFlags } from './bootstrap';
import { ApplicationMetrics } from './metrics/application-metrics';
import { CachedWeatherService } from './weather/weather-service';

const SERVICE_NAME = 'apiservice';

function createCacheStore(config: AppConfig, logger: Logger): CacheStore {
  if (!config.cacheConnectionString) {
    logger.info('No cache connection string, using in-process memory cache');
    return new MemoryCacheStore();
  }
  return createRedisCacheStore(config.cacheConnectionString, {
    commandTimeoutMs: config.cacheCommandTimeoutMs,
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('Server');
  applyLogLevel(config, logger);

  const flags = await loadFeatureFlags(config);
  const metrics = new ApplicationMetrics();
  const cache = new ResilientCacheClient(createCacheStore(config, logger));
  const weather = new CachedWeatherService({ cache, metrics, ttlMs: config.cacheTtlMs });

  const app = createApiApp({
    service: {
      name: SERVICE_NAME,
      version: config.version,
      commitSha: config.commitSha,
      environment: config.environment,
    },
    flags,
    weather,
    cache,
    metrics,
  });

  const server: Server = app.listen(config.port, () => {
    logger.info('Weather API started', {
      port: config.port,
      environment: config.environment,
      version: config.version,
      featureFlags: flags.backing,
      cache: config.cacheConnectionString ? 'redis' : 'memory',
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down gracefully', { signal });

    flags.close();
    const report = await cache.shutdown(config.cacheShutdownTimeoutMs);
    logger.info('Cache client closed', { ...report });

    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error: describeError(error) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createLogger('Server').error('Failed to start', { error: describeError(error) });
    process.exit(1);
  });
}
