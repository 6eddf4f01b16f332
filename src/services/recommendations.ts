import { classify, TEMPERATURE_UNIT } from './bucketing';
import { WeatherLookup } from './weather';
import { AppError, ErrorKind, invalidInput } from '../utils/errors';

export interface WeatherReading {
  city: string;
  temperature: number;
  unit: typeof TEMPERATURE_UNIT;
}

export interface LocationsRecommendation extends WeatherReading {
  locations: readonly string[];
}

export interface SnacksRecommendation extends WeatherReading {
  snacks: readonly string[];
}

export interface SeasonalRecommendation extends WeatherReading {
  seasonalSnacks: readonly string[];
}

export interface Pairing extends WeatherReading {
  snack: string;
  drink: string;
}

export class RecommendationService {
  constructor(
    private readonly weather: WeatherLookup,
    private readonly random: () => number = Math.random
  ) {}

  async currentWeather(city: unknown): Promise<WeatherReading> {
    const name = requireCity(city);
    const temperature = await this.weather.currentTemperature(name);
    if (temperature === null) {
      throw new AppError(ErrorKind.WEATHER_UNAVAILABLE, `Could not fetch weather data for ${name}`);
    }
    return { city: name, temperature, unit: TEMPERATURE_UNIT };
  }

  async locationsFor(city: unknown): Promise<LocationsRecommendation> {
    const reading = await this.currentWeather(city);
    return { ...reading, locations: classify(reading.temperature).locations };
  }

  async snacksFor(city: unknown): Promise<SnacksRecommendation> {
    const reading = await this.currentWeather(city);
    return { ...reading, snacks: classify(reading.temperature).snacks };
  }

  async seasonalFor(city: unknown): Promise<SeasonalRecommendation> {
    const reading = await this.currentWeather(city);
    return { ...reading, seasonalSnacks: classify(reading.temperature).seasonalSnacks };
  }

  // One random snack from the band plus the band's seasonal item.
  async pairingFor(city: unknown): Promise<Pairing> {
    const reading = await this.currentWeather(city);
    const { snacks, seasonalSnacks } = classify(reading.temperature);
    return {
      ...reading,
      snack: pickUniform(snacks, this.random),
      drink: seasonalSnacks[0],
    };
  }
}

function requireCity(city: unknown): string {
  if (typeof city !== 'string' || !city.trim()) {
    throw invalidInput('City is required');
  }
  return city.trim();
}

export function pickUniform<T>(items: readonly T[], random: () => number): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
