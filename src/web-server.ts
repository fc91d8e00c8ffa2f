/**
 * Web gateway - HTTP Server
 *
 * Calls the weather API through a ResilientCaller built from the REMOTE_* and
 * CIRCUIT_* settings. Shuts down on SIGTERM/SIGINT.
 */

import type { Server } from 'http';
import { loadConfig } from './config';
import { createWebApp } from './web/app';
import { ResilientCaller } from './core/resilient-caller';
import { describeError } from './core/errors';
import { createLogger } from './core/logger';
import { ApplicationMetrics } from './metrics/application-metrics';
import { WeatherApiClient } from './weather/weather-api-client';
import { applyLogLevel, loadFeatureFlags } from './bootstrap';

const SERVICE_NAME = 'webfrontend';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('WebServer');
  applyLogLevel(config, logger);

  const flags = await loadFeatureFlags(config);
  const metrics = new ApplicationMetrics();
  const caller = new ResilientCaller('weatherservice', {
    maxAttempts: config.remoteMaxAttempts,
    initialDelayMs: config.remoteInitialRetryDelayMs,
    maxDelayMs: config.remoteMaxRetryDelayMs,
    attemptTimeoutMs: config.remoteAttemptTimeoutMs,
    failureThreshold: config.circuitFailureThreshold,
    cooldownMs: config.circuitCooldownMs,
  });
  const weatherApi = new WeatherApiClient({ baseUrl: config.weatherServiceUrl, caller, metrics });

  const app = createWebApp({
    service: {
      name: SERVICE_NAME,
      version: config.version,
      commitSha: config.commitSha,
      environment: config.environment,
    },
    flags,
    weatherApi,
    caller,
    weatherServiceUrl: config.weatherServiceUrl,
  });

  const server: Server = app.listen(config.webPort, () => {
    logger.info('Web gateway started', {
      port: config.webPort,
      weatherService: config.weatherServiceUrl,
      featureFlags: flags.backing,
    });
  });

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('Shutting down gracefully', { signal });
    flags.close();
    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createLogger('WebServer').error('Failed to start', { error: describeError(error) });
    process.exit(1);
  });
}
