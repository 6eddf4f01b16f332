import bandsJson from '../config/bands.json';
import { invalidInput } from '../utils/errors';

// All thresholds are degrees Fahrenheit.
export const TEMPERATURE_UNIT = 'fahrenheit';

export const BAND_KEYS = ['<30', '31-45', '46-60', '61-75', '76-85', '>85'] as const;
export type BandKey = (typeof BAND_KEYS)[number];

export interface Band {
  key: BandKey;
  label: string;
  locations: readonly string[];
  snacks: readonly string[];
  seasonalSnacks: readonly string[];
}

export interface Classification {
  band: BandKey;
  locations: readonly string[];
  snacks: readonly string[];
  seasonalSnacks: readonly string[];
}

function isBandKey(value: string): value is BandKey {
  return (BAND_KEYS as readonly string[]).includes(value);
}

function loadBands(): ReadonlyMap<BandKey, Band> {
  const bands = new Map<BandKey, Band>();
  for (const entry of bandsJson) {
    if (!isBandKey(entry.key)) {
      throw new Error(`Unknown temperature band "${entry.key}" in bands.json`);
    }
    if (entry.locations.length === 0 || entry.snacks.length === 0 || entry.seasonalSnacks.length !== 1) {
      throw new Error(`Band "${entry.key}" needs locations, snacks and exactly one seasonal snack`);
    }
    bands.set(
      entry.key,
      Object.freeze({
        key: entry.key,
        label: entry.label,
        locations: Object.freeze([...entry.locations]),
        snacks: Object.freeze([...entry.snacks]),
        seasonalSnacks: Object.freeze([...entry.seasonalSnacks]),
      })
    );
  }
  for (const key of BAND_KEYS) {
    if (!bands.has(key)) {
      throw new Error(`Temperature band "${key}" is missing from bands.json`);
    }
  }
  return bands;
}

const BANDS = loadBands();

const ALLOWED_LOCATIONS: readonly string[] = Object.freeze(
  Array.from(new Set(BAND_KEYS.flatMap(key => getBand(key).locations)))
);

export function getBand(key: BandKey): Band {
  const band = BANDS.get(key);
  if (!band) {
    throw new Error(`Temperature band "${key}" is not configured`);
  }
  return band;
}

/**
 * Band for a Fahrenheit reading. Only the coldest band is open at its upper
 * end: t < 30, 30 ≤ t ≤ 45, 45 < t ≤ 60, 60 < t ≤ 75, 75 < t ≤ 85, t > 85.
 */
export function bandFor(temperature: number): BandKey {
  if (Number.isNaN(temperature)) {
    throw invalidInput('Temperature must be a number');
  }
  if (temperature < 30) return '<30';
  if (temperature <= 45) return '31-45';
  if (temperature <= 60) return '46-60';
  if (temperature <= 75) return '61-75';
  if (temperature <= 85) return '76-85';
  return '>85';
}

export function classify(temperature: number): Classification {
  const band = getBand(bandFor(temperature));
  return {
    band: band.key,
    locations: band.locations,
    snacks: band.snacks,
    seasonalSnacks: band.seasonalSnacks,
  };
}

export function allowedLocations(): readonly string[] {
  return ALLOWED_LOCATIONS;
}

export function isAllowedLocation(name: string): boolean {
  return ALLOWED_LOCATIONS.includes(name);
}
