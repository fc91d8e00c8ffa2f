import { CacheAsideService, jsonCodec } from '../cache/cache-aside';
import type { ResilientCacheClient } from '../cache/resilient-cache-client';
import { Logger, createLogger } from '../core/logger';
import { type ApplicationMetrics, getTemperatureRange } from '../metrics/application-metrics';
import {
  type GenerateOptions,
  type WeatherForecast,
  generateForecasts,
  isWeatherForecast,
  toStoredForecast,
} from './forecast';

export const FORECAST_CACHE_NAMESPACE = 'api:weather';
export const FORECAST_CACHE_ENTITY = 'forecast';
export const DEFAULT_FORECAST_TTL_MS = 5 * 60 * 1000;

export interface CachedWeatherServiceOptions {
  cache: ResilientCacheClient;
  metrics: ApplicationMetrics;
  ttlMs?: number;
  logger?: Logger;
  /** Generator settings, injectable for tests */
  generateOptions?: () => GenerateOptions;
}

/**
 * Forecasts served cache-aside: `api:weather:forecast:{count}`, five minutes by default
 */
export class CachedWeatherService {
  private readonly forecasts: CacheAsideService<WeatherForecast>;
  private readonly metrics: ApplicationMetrics;
  private readonly generateOptions: () => GenerateOptions;

  constructor(options: CachedWeatherServiceOptions) {
    const logger = options.logger ?? createLogger('WeatherService');
    this.metrics = options.metrics;
    this.generateOptions = options.generateOptions ?? (() => ({}));

    let ttlMs = options.ttlMs ?? DEFAULT_FORECAST_TTL_MS;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      logger.warn('Invalid forecast cache TTL, using default', { ttlMs, fallback: DEFAULT_FORECAST_TTL_MS });
      ttlMs = DEFAULT_FORECAST_TTL_MS;
    }

    this.forecasts = new CacheAsideService<WeatherForecast>({
      cache: options.cache,
      metrics: options.metrics,
      namespace: FORECAST_CACHE_NAMESPACE,
      entity: FORECAST_CACHE_ENTITY,
      ttlMs,
      codec: jsonCodec(isWeatherForecast, toStoredForecast),
      logger,
    });
  }

  cacheKey(maxItems: number): string {
    return this.forecasts.keyFor(maxItems);
  }

  async getWeatherForecast(maxItems = 10, signal?: AbortSignal): Promise<WeatherForecast[]> {
    const forecasts = await this.forecasts.getOrGenerate(
      maxItems,
      (count) => generateForecasts(count, this.generateOptions()),
      { signal }
    );

    for (const forecast of forecasts) {
      if (forecast.summary?.includes('Sunny')) {
        this.metrics.sunnyForecasts.add(1, { temperature_range: getTemperatureRange(forecast.temperatureC) });
      }
    }

    return forecasts;
  }
}
