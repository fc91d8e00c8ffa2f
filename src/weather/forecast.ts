/**
 * Forecast records and their generator
 *
 * A record stores only the primary values; the Fahrenheit temperature is
 * always derived from temperatureC, never stored or cached on its own.
 */

export interface WeatherForecast {
  /** Calendar date, YYYY-MM-DD */
  readonly date: string;
  readonly temperatureC: number;
  /** Relative humidity, percent */
  readonly humidity: number;
  readonly summary: string | null;
}

/** A forecast as served over HTTP, with its derived field */
export interface WeatherForecastView extends WeatherForecast {
  readonly temperatureF: number;
}

export const FORECAST_SUMMARIES = [
  'Freezing',
  'Bracing',
  'Chilly',
  'Cool',
  'Mild',
  'Warm',
  'Balmy',
  'Hot',
  'Sweltering',
  'Scorching',
] as const;

const MIN_TEMPERATURE_C = -20;
const MAX_TEMPERATURE_C = 55; // exclusive
const MIN_HUMIDITY = 20;
const MAX_HUMIDITY = 95; // exclusive
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function temperatureF(temperatureC: number): number {
  return 32 + Math.trunc(temperatureC / 0.5556);
}

export function toForecastView(forecast: WeatherForecast): WeatherForecastView {
  return {
    date: forecast.date,
    temperatureC: forecast.temperatureC,
    humidity: forecast.humidity,
    summary: forecast.summary,
    temperatureF: temperatureF(forecast.temperatureC),
  };
}

/**
 * Strip a record down to its stored fields (drops temperatureF and anything else)
 */
export function toStoredForecast(forecast: WeatherForecast): WeatherForecast {
  return {
    date: forecast.date,
    temperatureC: forecast.temperatureC,
    humidity: forecast.humidity,
    summary: forecast.summary,
  };
}

export function isWeatherForecast(value: unknown): value is WeatherForecast {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('date' in value) || !('temperatureC' in value) || !('humidity' in value) || !('summary' in value)) {
    return false;
  }
  return (
    typeof value.date === 'string' &&
    DATE_PATTERN.test(value.date) &&
    Number.isInteger(value.temperatureC) &&
    Number.isInteger(value.humidity) &&
    (value.summary === null || typeof value.summary === 'string')
  );
}

export interface GenerateOptions {
  now?: Date;
  /** Uniform [0, 1) source, injectable for tests */
  random?: () => number;
}

/**
 * One forecast per day, starting tomorrow
 */
export function generateForecasts(count: number, options: GenerateOptions = {}): WeatherForecast[] {
  const now = options.now ?? new Date();
  const random = options.random ?? Math.random;

  return Array.from({ length: count }, (_, offset) => {
    const day = new Date(now);
    day.setDate(now.getDate() + offset + 1);

    return {
      date: formatDate(day),
      temperatureC: randomInt(random, MIN_TEMPERATURE_C, MAX_TEMPERATURE_C),
      humidity: randomInt(random, MIN_HUMIDITY, MAX_HUMIDITY),
      summary: FORECAST_SUMMARIES[randomInt(random, 0, FORECAST_SUMMARIES.length)],
    };
  });
}

/** Local calendar date as YYYY-MM-DD */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function randomInt(random: () => number, min: number, maxExclusive: number): number {
  return min + Math.floor(random() * (maxExclusive - min));
}
