/**
 * Weather API service
 *
 * Serves cached forecasts behind the WeatherForecast flag, plus version,
 * health and metrics endpoints. Everything the routes touch is injected, so
 * tests build the app around in-memory stand-ins.
 */

import express, { type Express, type Request, type Response } from 'express';
import type { CachedWeatherService } from '../weather/weather-service';
import { toForecastView } from '../weather/forecast';
import type { ResilientCacheClient } from '../cache/resilient-cache-client';
import { FeatureFlag, type FeatureFlagHandle } from '../features/feature-flags';
import { ValidationError, describeError, isCancellation } from '../core/errors';
import { Logger, createLogger } from '../core/logger';
import { type ApplicationMetrics, getCountRange } from '../metrics/application-metrics';
import { parseCountParam, requestSignal, versionBody } from '../http/common';
import type { DetailedHealthResponse, ErrorResponse, HealthResponse, ServiceInfo } from '../types';

export const DEFAULT_FORECAST_COUNT = 10;
export const MAX_FORECAST_COUNT = 100;

export interface ApiAppDeps {
  service: ServiceInfo;
  flags: FeatureFlagHandle<FeatureFlag>;
  weather: CachedWeatherService;
  cache: ResilientCacheClient;
  metrics: ApplicationMetrics;
  logger?: Logger;
  now?: () => Date;
  uptimeSeconds?: () => number;
}

export function createApiApp(deps: ApiAppDeps): Express {
  const app = express();
  const logger = deps.logger ?? createLogger('ApiService');
  const now = deps.now ?? (() => new Date());
  const uptimeSeconds = deps.uptimeSeconds ?? (() => process.uptime());

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send('API service is running. Navigate to /weatherforecast to see sample data.');
  });

  /**
   * GET /weatherforecast?count=n
   *
   * 503 while the WeatherForecast flag is off, 400 on a bad count.
   * The request's lifetime bounds the work: a client that disconnects
   * cancels the cache lookup.
   */
  app.get('/weatherforecast', async (req: Request, res: Response) => {
    if (!deps.flags.isEnabled(FeatureFlag.WeatherForecast)) {
      deps.metrics.weatherApiCalls.add(1, { endpoint: 'weatherforecast', feature_enabled: 'false' });
      const body: ErrorResponse = { error: 'Weather forecast feature is currently disabled' };
      res.status(503).json(body);
      return;
    }

    const count = parseCountParam(req.query.count, DEFAULT_FORECAST_COUNT, MAX_FORECAST_COUNT);
    if (count === null) {
      const body: ErrorResponse = { error: `count must be an integer between 0 and ${MAX_FORECAST_COUNT}` };
      res.status(400).json(body);
      return;
    }

    deps.metrics.weatherApiCalls.add(1, {
      endpoint: 'weatherforecast',
      feature_enabled: 'true',
      count_range: getCountRange(count),
    });

    const signal = requestSignal(res);
    try {
      const forecasts = await deps.weather.getWeatherForecast(count, signal);
      res.status(200).json(forecasts.map(toForecastView));
    } catch (error) {
      if (signal.aborted || isCancellation(error)) {
        logger.debug('Client went away, forecast request cancelled', { count });
        return;
      }
      if (error instanceof ValidationError) {
        const body: ErrorResponse = { error: error.message };
        res.status(400).json(body);
        return;
      }
      logger.error('Forecast request failed', { count, error: describeError(error) });
      const body: ErrorResponse = { error: 'Internal server error' };
      res.status(500).json(body);
    }
  });

  app.get('/version', (_req: Request, res: Response) => {
    res.json(versionBody(deps.service, now()));
  });

  app.get('/health/detailed', (_req: Request, res: Response) => {
    if (!deps.flags.isEnabled(FeatureFlag.DetailedHealth)) {
      const body: HealthResponse = { status: 'healthy' };
      res.json(body);
      return;
    }

    const body: DetailedHealthResponse = {
      status: 'healthy',
      service: deps.service.name,
      version: deps.service.version,
      commitSha: deps.service.commitSha,
      environment: deps.service.environment,
      uptimeSeconds: uptimeSeconds(),
      timestamp: now().toISOString(),
      featureFlags: {
        backing: deps.flags.backing,
        values: deps.flags.snapshot(),
      },
      cache: {
        pendingWrites: deps.cache.pendingWriteCount,
      },
    };
    res.json(body);
  });

  app.get(['/health', '/alive'], (_req: Request, res: Response) => {
    const body: HealthResponse = { status: 'healthy' };
    res.json(body);
  });

  app.get('/metrics', (_req: Request, res: Response) => {
    res.json(deps.metrics.snapshot());
  });

  return app;
}
