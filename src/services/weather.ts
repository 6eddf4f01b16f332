import { AppError, ErrorKind } from '../utils/errors';

export interface WeatherLookup {
  /** Current temperature in Fahrenheit, or null when no reading is available. */
  currentTemperature(city: string): Promise<number | null>;
}

// The part of fetch the client relies on; the global fetch satisfies it.
export type FetchLike = (
  url: string,
  init: { signal: AbortSignal }
) => Promise<{ status: number; json(): Promise<unknown> }>;

export interface OpenWeatherOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

interface OpenWeatherBody {
  main: { temp: number };
}

function hasTemperature(body: unknown): body is OpenWeatherBody {
  if (typeof body !== 'object' || body === null || !('main' in body)) return false;
  const main = body.main;
  return (
    typeof main === 'object' &&
    main !== null &&
    'temp' in main &&
    typeof main.temp === 'number' &&
    Number.isFinite(main.temp)
  );
}

export class OpenWeatherClient implements WeatherLookup {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenWeatherOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openweathermap.org').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildUrl(city: string): string {
    const url = new URL(`${this.baseUrl}/data/2.5/weather`);
    url.searchParams.set('q', city);
    url.searchParams.set('appid', this.apiKey);
    url.searchParams.set('units', 'imperial');
    return url.toString();
  }

  async currentTemperature(city: string): Promise<number | null> {
    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(this.buildUrl(city), {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new AppError(ErrorKind.WEATHER_UNAVAILABLE, `Could not fetch weather data for ${city}`, {
        cause: err,
      });
    }

    if (response.status !== 200) {
      console.warn(`Weather lookup for "${city}" failed with status ${response.status}`);
      return null;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new AppError(ErrorKind.WEATHER_UNAVAILABLE, `Could not read weather data for ${city}`, {
        cause: err,
      });
    }

    if (!hasTemperature(body)) {
      console.warn(`Weather lookup for "${city}" returned no temperature`);
      return null;
    }
    return body.main.temp;
  }
}
