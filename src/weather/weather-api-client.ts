/**
 * WeatherApiClient - The web gateway's view of the weather API
 *
 * Every request goes through a ResilientCaller, so a slow or failing API is
 * retried, timed out and eventually circuit-broken. Callers see either
 * forecasts or a ServiceUnavailableError.
 */

import type { ResilientCaller } from '../core/resilient-caller';
import { RemoteCallError, ValidationError } from '../core/errors';
import { Logger, createLogger } from '../core/logger';
import type { ApplicationMetrics } from '../metrics/application-metrics';
import { type WeatherForecast, isWeatherForecast } from './forecast';

export interface WeatherApiClientOptions {
  baseUrl: string;
  caller: ResilientCaller;
  metrics: ApplicationMetrics;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  now?: () => number;
}

const ENDPOINT_TAG = 'weatherforecast';

export class WeatherApiClient {
  private readonly url: URL;
  private readonly caller: ResilientCaller;
  private readonly metrics: ApplicationMetrics;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: WeatherApiClientOptions) {
    this.url = new URL('weatherforecast', withTrailingSlash(options.baseUrl));
    this.caller = options.caller;
    this.metrics = options.metrics;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger('WeatherApiClient');
    this.now = options.now ?? Date.now;
  }

  async getWeather(maxItems = 10, signal?: AbortSignal): Promise<WeatherForecast[]> {
    if (!Number.isInteger(maxItems) || maxItems < 0) {
      throw new ValidationError(`maxItems must be a non-negative integer, got ${maxItems}`);
    }

    const started = this.now();
    let success = false;
    try {
      const body = await this.caller.call((attemptSignal) => this.fetchForecasts(attemptSignal), { signal });
      const forecasts = this.readForecasts(body);
      success = true;
      return forecasts.slice(0, maxItems);
    } finally {
      this.metrics.apiCallDuration.record(this.now() - started, {
        endpoint: ENDPOINT_TAG,
        success: String(success),
      });
    }
  }

  private async fetchForecasts(signal: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(this.url, {
      headers: { accept: 'application/json' },
      signal,
    });

    if (!response.ok) {
      throw new RemoteCallError(this.url.toString(), response.status, response.statusText);
    }

    const body: unknown = await response.json();
    return body;
  }

  private readForecasts(body: unknown): WeatherForecast[] {
    if (!Array.isArray(body)) {
      throw new Error('Weather API returned a non-array body');
    }

    const forecasts: WeatherForecast[] = [];
    for (const item of body) {
      if (isWeatherForecast(item)) {
        forecasts.push(item);
      }
    }

    if (forecasts.length < body.length) {
      this.logger.warn('Skipped malformed forecast records', { skipped: body.length - forecasts.length });
    }
    return forecasts;
  }
}

function withTrailingSlash(baseUrl: string): string {
  return baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
}
