import { describe, expect, it } from 'vitest';
import {
  FORECAST_SUMMARIES,
  formatDate,
  generateForecasts,
  isWeatherForecast,
  temperatureF,
  toForecastView,
  toStoredForecast,
} from '../src/weather/forecast';

describe('temperatureF', () => {
  it.each([
    [0, 32],
    [20, 67],
    [-20, -3],
    [100, 211],
  ])('converts %i C to %i F', (celsius, fahrenheit) => {
    expect(temperatureF(celsius)).toBe(fahrenheit);
  });
});

describe('generateForecasts', () => {
  const now = new Date(2024, 0, 31, 12);

  it('produces one record per day starting tomorrow', () => {
    expect(generateForecasts(2, { now, random: () => 0.54 })).toEqual([
      { date: '2024-02-01', temperatureC: 20, humidity: 60, summary: 'Warm' },
      { date: '2024-02-02', temperatureC: 20, humidity: 60, summary: 'Warm' },
    ]);
  });

  it('stays within the value ranges', () => {
    const [coldest] = generateForecasts(1, { now, random: () => 0 });
    const [hottest] = generateForecasts(1, { now, random: () => 0.9999 });

    expect(coldest).toMatchObject({ temperatureC: -20, humidity: 20, summary: 'Freezing' });
    expect(hottest).toMatchObject({ temperatureC: 54, humidity: 94, summary: 'Scorching' });
  });

  it('returns nothing for count 0', () => {
    expect(generateForecasts(0)).toEqual([]);
  });

  it('only uses known summaries', () => {
    for (const forecast of generateForecasts(50)) {
      expect(FORECAST_SUMMARIES).toContain(forecast.summary);
    }
  });
});

describe('forecast shapes', () => {
  const forecast = { date: '2024-02-01', temperatureC: 20, humidity: 60, summary: 'Sunny' };

  it('derives temperatureF for the view only', () => {
    const view = toForecastView(forecast);

    expect(view).toEqual({ ...forecast, temperatureF: 67 });
    expect(toStoredForecast(view)).toEqual(forecast);
  });

  it('accepts records with or without the derived field', () => {
    expect(isWeatherForecast(forecast)).toBe(true);
    expect(isWeatherForecast({ ...forecast, temperatureF: 67 })).toBe(true);
    expect(isWeatherForecast({ ...forecast, summary: null })).toBe(true);
  });

  it.each([
    ['a null', null],
    ['a bad date', { ...forecast, date: '01/02/2024' }],
    ['a fractional temperature', { ...forecast, temperatureC: 20.5 }],
    ['a numeric summary', { ...forecast, summary: 3 }],
    ['a missing humidity', { date: '2024-02-01', temperatureC: 20, summary: 'Sunny' }],
  ])('rejects %s', (_case, value) => {
    expect(isWeatherForecast(value)).toBe(false);
  });

  it('formats dates as local YYYY-MM-DD', () => {
    expect(formatDate(new Date(2024, 8, 5))).toBe('2024-09-05');
  });
});
