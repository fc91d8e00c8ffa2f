import { describe, expect, it, vi } from 'vitest';
import { ResilientCaller } from '../src/core/resilient-caller';
import { ServiceUnavailableError, ValidationError } from '../src/core/errors';
import { ApplicationMetrics } from '../src/metrics/application-metrics';
import { WeatherApiClient } from '../src/weather/weather-api-client';
import { jsonResponse } from './support';

const records = [
  { date: '2024-06-02', temperatureC: 20, humidity: 60, summary: 'Warm', temperatureF: 67 },
  { date: '2024-06-03', temperatureC: 0, humidity: 80, summary: 'Chilly', temperatureF: 32 },
  { date: '2024-06-04', temperatureC: 30, humidity: 30, summary: null, temperatureF: 85 },
];

function setup(responses: Array<Response | Error>, clock: number[] = []) {
  const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => {
    const next = responses.shift();
    if (next === undefined) {
      throw new Error('no scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  const metrics = new ApplicationMetrics();
  const caller = new ResilientCaller('weatherservice', {
    maxAttempts: 2,
    initialDelayMs: 0,
    maxDelayMs: 0,
    attemptTimeoutMs: 1000,
  });
  const client = new WeatherApiClient({
    baseUrl: 'http://weatherservice:8080',
    caller,
    metrics,
    fetchImpl,
    now: () => clock.shift() ?? 0,
  });
  return { client, fetchImpl, metrics, caller };
}

describe('WeatherApiClient', () => {
  it('fetches forecasts from the weather API', async () => {
    const { client, fetchImpl } = setup([jsonResponse(records)]);

    await expect(client.getWeather()).resolves.toEqual(records);
    expect(String(fetchImpl.mock.calls[0]?.[0])).toBe('http://weatherservice:8080/weatherforecast');
  });

  it('truncates to maxItems', async () => {
    const { client } = setup([jsonResponse(records)]);

    await expect(client.getWeather(2)).resolves.toEqual(records.slice(0, 2));
  });

  it('skips malformed records', async () => {
    const { client } = setup([jsonResponse([records[0], { date: 'tomorrow', temperatureC: 'warm' }])]);

    await expect(client.getWeather()).resolves.toEqual([records[0]]);
  });

  it('rejects a body that is not a list', async () => {
    const { client } = setup([jsonResponse({ forecasts: records })]);

    await expect(client.getWeather()).rejects.toThrow('Weather API returned a non-array body');
  });

  it('retries a 503 and returns the next answer', async () => {
    const { client, fetchImpl } = setup([jsonResponse({ error: 'busy' }, 503), jsonResponse(records)]);

    await expect(client.getWeather()).resolves.toHaveLength(3);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('reports the API as unavailable once retries are spent', async () => {
    const { client, fetchImpl } = setup([new TypeError('fetch failed'), new TypeError('fetch failed')]);

    await expect(client.getWeather()).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('records call duration by outcome', async () => {
    const { client, metrics } = setup([jsonResponse(records), new TypeError('fetch failed'), new TypeError('fetch failed')], [
      100, 135, 200, 210,
    ]);

    await client.getWeather();
    await client.getWeather().catch(() => undefined);

    expect(metrics.apiCallDuration.get({ endpoint: 'weatherforecast', success: 'true' })).toMatchObject({
      count: 1,
      sum: 35,
    });
    expect(metrics.apiCallDuration.get({ endpoint: 'weatherforecast', success: 'false' })).toMatchObject({
      count: 1,
      sum: 10,
    });
  });

  it('rejects a negative maxItems before calling out', async () => {
    const { client, fetchImpl } = setup([]);

    await expect(client.getWeather(-1)).rejects.toBeInstanceOf(ValidationError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
