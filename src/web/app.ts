/**
 * Web gateway
 *
 * The frontend-facing service. It never talks to the cache: forecasts come
 * from the weather API through WeatherApiClient. When the API is down (retries
 * exhausted or circuit open) the gateway answers 503 with `degraded: true`
 * instead of failing the whole page.
 */

import express, { type Express, type Request, type Response } from 'express';
import type { WeatherApiClient } from '../weather/weather-api-client';
import { toForecastView } from '../weather/forecast';
import type { ResilientCaller } from '../core/resilient-caller';
import { FeatureFlag, type FeatureFlagHandle } from '../features/feature-flags';
import { ServiceUnavailableError, ValidationError, describeError, isCancellation } from '../core/errors';
import { Logger, createLogger } from '../core/logger';
import { parseCountParam, requestSignal, versionBody } from '../http/common';
import type { ErrorResponse, GatewayHealthResponse, HealthResponse, ServiceInfo } from '../types';

export const DEFAULT_MAX_ITEMS = 10;
export const MAX_ITEMS_LIMIT = 100;

export interface WebAppDeps {
  service: ServiceInfo;
  flags: FeatureFlagHandle<FeatureFlag>;
  weatherApi: WeatherApiClient;
  /** The caller behind weatherApi, for reporting circuit state */
  caller: ResilientCaller;
  weatherServiceUrl: string;
  logger?: Logger;
  now?: () => Date;
}

export function createWebApp(deps: WebAppDeps): Express {
  const app = express();
  const logger = deps.logger ?? createLogger('WebGateway');
  const now = deps.now ?? (() => new Date());

  app.get('/api/weather', async (req: Request, res: Response) => {
    if (!deps.flags.isEnabled(FeatureFlag.WeatherForecast)) {
      const body: ErrorResponse = { error: 'Weather forecast feature is currently disabled', degraded: true };
      res.status(503).json(body);
      return;
    }

    const maxItems = parseCountParam(req.query.maxItems, DEFAULT_MAX_ITEMS, MAX_ITEMS_LIMIT);
    if (maxItems === null) {
      const body: ErrorResponse = { error: `maxItems must be an integer between 0 and ${MAX_ITEMS_LIMIT}` };
      res.status(400).json(body);
      return;
    }

    const signal = requestSignal(res);
    try {
      const forecasts = await deps.weatherApi.getWeather(maxItems, signal);
      res.status(200).json(forecasts.map(toForecastView));
    } catch (error) {
      if (signal.aborted || isCancellation(error)) {
        logger.debug('Client went away, weather request cancelled', { maxItems });
        return;
      }
      if (error instanceof ServiceUnavailableError) {
        logger.warn('Weather service unavailable, serving degraded response', {
          reason: error.reason,
          attempts: error.attempts,
        });
        const body: ErrorResponse = { error: 'Weather service is temporarily unavailable', degraded: true };
        res.status(503).json(body);
        return;
      }
      if (error instanceof ValidationError) {
        const body: ErrorResponse = { error: error.message };
        res.status(400).json(body);
        return;
      }
      logger.error('Weather request failed', { maxItems, error: describeError(error) });
      const body: ErrorResponse = { error: 'Bad response from weather service' };
      res.status(502).json(body);
    }
  });

  app.get('/version', (_req: Request, res: Response) => {
    res.json(versionBody(deps.service, now()));
  });

  app.get('/health', (_req: Request, res: Response) => {
    const body: GatewayHealthResponse = {
      status: 'healthy',
      weatherService: {
        url: deps.weatherServiceUrl,
        circuit: deps.caller.circuitSnapshot(),
      },
    };
    res.json(body);
  });

  app.get('/alive', (_req: Request, res: Response) => {
    const body: HealthResponse = { status: 'healthy' };
    res.json(body);
  });

  return app;
}
