import { describe, expect, it } from 'vitest';
import { MemoryCacheStore } from '../src/cache/memory-cache-store';
import { ResilientCacheClient } from '../src/cache/resilient-cache-client';
import { ApplicationMetrics } from '../src/metrics/application-metrics';
import { CachedWeatherService } from '../src/weather/weather-service';

function setup() {
  const cache = new ResilientCacheClient(new MemoryCacheStore({ sweepIntervalMs: 0 }));
  const metrics = new ApplicationMetrics();
  const service = new CachedWeatherService({
    cache,
    metrics,
    generateOptions: () => ({ now: new Date(2024, 5, 1, 12), random: () => 0.54 }),
  });
  return { cache, metrics, service };
}

describe('CachedWeatherService', () => {
  it('uses one cache entry per requested count', () => {
    const { service } = setup();

    expect(service.cacheKey(10)).toBe('api:weather:forecast:10');
  });

  it('generates on a miss and caches the result', async () => {
    const { service, cache, metrics } = setup();

    const forecasts = await service.getWeatherForecast(3);

    expect(forecasts).toHaveLength(3);
    expect(forecasts[0]).toEqual({ date: '2024-06-02', temperatureC: 20, humidity: 60, summary: 'Warm' });
    expect((await cache.lookup('api:weather:forecast:3')).kind).toBe('hit');
    expect(metrics.cacheMisses.value({ entity: 'forecast' })).toBe(1);
  });

  it('falls back to the default TTL when given a non-positive one', async () => {
    const cache = new ResilientCacheClient(new MemoryCacheStore({ sweepIntervalMs: 0 }));
    const service = new CachedWeatherService({ cache, metrics: new ApplicationMetrics(), ttlMs: 0 });

    await expect(service.getWeatherForecast(3)).resolves.toHaveLength(3);
    expect((await cache.lookup('api:weather:forecast:3')).kind).toBe('hit');
  });

  it('defaults to ten forecasts', async () => {
    const { service } = setup();

    await expect(service.getWeatherForecast()).resolves.toHaveLength(10);
  });

  it('counts sunny forecasts by temperature range, cached ones included', async () => {
    const { service, cache, metrics } = setup();
    const sunny = [
      { date: '2024-06-02', temperatureC: 20, humidity: 40, summary: 'Sunny' },
      { date: '2024-06-03', temperatureC: 30, humidity: 40, summary: 'Mostly Sunny' },
    ];
    cache.set('api:weather:forecast:2', Buffer.from(JSON.stringify(sunny)), 60_000);

    await expect(service.getWeatherForecast(2)).resolves.toEqual(sunny);

    expect(metrics.cacheHits.value({ entity: 'forecast' })).toBe(1);
    expect(metrics.sunnyForecasts.value({ temperature_range: '16-25' })).toBe(1);
    expect(metrics.sunnyForecasts.value({ temperature_range: '>25' })).toBe(1);
  });
});
