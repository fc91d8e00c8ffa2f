import { afterEach, describe, expect, it } from 'vitest';
import { createApiApp } from '../src/api/app';
import { MemoryCacheStore } from '../src/cache/memory-cache-store';
import { ResilientCacheClient } from '../src/cache/resilient-cache-client';
import type { CacheStore } from '../src/cache/cache-store';
import { DEFAULT_FEATURE_FLAGS, FeatureFlag, FeatureFlagHandle } from '../src/features/feature-flags';
import { createLogger } from '../src/core/logger';
import { ApplicationMetrics } from '../src/metrics/application-metrics';
import { CachedWeatherService } from '../src/weather/weather-service';
import { type RunningApp, failingStore, listen } from './support';

const service = { name: 'apiservice', version: '1.2.3', commitSha: 'abc1234', environment: 'Test' };

describe('weather API', () => {
  let running: RunningApp | undefined;

  afterEach(async () => {
    await running?.close();
    running = undefined;
  });

  async function start(options: { flags?: Partial<Record<FeatureFlag, boolean>>; store?: CacheStore } = {}) {
    const flags = new FeatureFlagHandle(DEFAULT_FEATURE_FLAGS, 'local', 'Test', createLogger('FeatureFlags'));
    flags.apply(
      Object.entries(options.flags ?? {}).map(([name, enabled]) => ({ name, label: null, enabled: enabled === true }))
    );
    const cache = new ResilientCacheClient(options.store ?? new MemoryCacheStore({ sweepIntervalMs: 0 }));
    const metrics = new ApplicationMetrics();
    const weather = new CachedWeatherService({
      cache,
      metrics,
      generateOptions: () => ({ now: new Date(2024, 5, 1, 12), random: () => 0.54 }),
    });
    const app = createApiApp({
      service,
      flags,
      weather,
      cache,
      metrics,
      now: () => new Date('2024-06-01T12:00:00.000Z'),
      uptimeSeconds: () => 42,
    });
    running = await listen(app);
    return { baseUrl: running.baseUrl, metrics };
  }

  it('answers the root with a banner', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('API service is running. Navigate to /weatherforecast to see sample data.');
  });

  it('serves ten forecasts with the derived temperature by default', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/weatherforecast`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(Array.isArray(body) && body.length).toBe(10);
    expect(Array.isArray(body) && body[0]).toEqual({
      date: '2024-06-02',
      temperatureC: 20,
      humidity: 60,
      summary: 'Warm',
      temperatureF: 67,
    });
  });

  it('serves a repeated request from the cache', async () => {
    const { baseUrl, metrics } = await start();

    const first: unknown = await (await fetch(`${baseUrl}/weatherforecast?count=5`)).json();
    const second: unknown = await (await fetch(`${baseUrl}/weatherforecast?count=5`)).json();

    expect(second).toEqual(first);
    expect(metrics.cacheMisses.value({ entity: 'forecast' })).toBe(1);
    expect(metrics.cacheHits.value({ entity: 'forecast' })).toBe(1);
    expect(
      metrics.weatherApiCalls.value({ endpoint: 'weatherforecast', feature_enabled: 'true', count_range: '0-10' })
    ).toBe(2);
  });

  it('returns an empty list for count 0', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/weatherforecast?count=0`);

    expect(await response.json()).toEqual([]);
  });

  it.each(['abc', '-1', '101', '2.5'])('rejects count=%s', async (count) => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/weatherforecast?count=${count}`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'count must be an integer between 0 and 100' });
  });

  it('answers 503 while the forecast flag is off', async () => {
    const { baseUrl, metrics } = await start({ flags: { [FeatureFlag.WeatherForecast]: false } });

    const response = await fetch(`${baseUrl}/weatherforecast`);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: 'Weather forecast feature is currently disabled' });
    expect(metrics.weatherApiCalls.value({ endpoint: 'weatherforecast', feature_enabled: 'false' })).toBe(1);
  });

  it('keeps serving when the cache is down', async () => {
    const { baseUrl } = await start({ store: failingStore() });

    const response = await fetch(`${baseUrl}/weatherforecast?count=3`);

    expect(response.status).toBe(200);
    expect(await response.json()).toHaveLength(3);
  });

  it('reports its version', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/version`);

    expect(await response.json()).toEqual({
      version: '1.2.3',
      commitSha: 'abc1234',
      service: 'apiservice',
      environment: 'Test',
      timestamp: '2024-06-01T12:00:00.000Z',
    });
  });

  it('keeps detailed health behind its flag', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/health/detailed`);

    expect(await response.json()).toEqual({ status: 'healthy' });
  });

  it('shows detailed health when the flag is on', async () => {
    const { baseUrl } = await start({ flags: { [FeatureFlag.DetailedHealth]: true } });

    const response = await fetch(`${baseUrl}/health/detailed`);

    expect(await response.json()).toEqual({
      status: 'healthy',
      service: 'apiservice',
      version: '1.2.3',
      commitSha: 'abc1234',
      environment: 'Test',
      uptimeSeconds: 42,
      timestamp: '2024-06-01T12:00:00.000Z',
      featureFlags: {
        backing: 'local',
        values: { WeatherForecast: true, DetailedHealth: true },
      },
      cache: { pendingWrites: 0 },
    });
  });

  it.each(['/health', '/alive'])('answers %s', async (path) => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}${path}`);

    expect(await response.json()).toEqual({ status: 'healthy' });
  });

  it('exposes the metrics snapshot', async () => {
    const { baseUrl } = await start();
    await fetch(`${baseUrl}/weatherforecast?count=2`);

    const response = await fetch(`${baseUrl}/metrics`);
    const body: unknown = await response.json();

    expect(body).toMatchObject({
      counters: {
        'cache.misses': [{ tags: { entity: 'forecast' }, value: 1 }],
        'weather.api.calls': [
          { tags: { endpoint: 'weatherforecast', feature_enabled: 'true', count_range: '0-10' }, value: 1 },
        ],
      },
    });
  });
});
