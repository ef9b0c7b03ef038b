import citiesData from './cities.json';
import { CityConfig } from '../types';
import { NotFoundError } from '../utils/errors';

const CITIES: CityConfig[] = citiesData.map((c) => ({
  key: c.key,
  name: c.name,
  country: c.country,
  countryCode: c.countryCode,
  timezone: c.timezone,
  bbox: c.bbox
    ? { north: c.bbox.north, south: c.bbox.south, east: c.bbox.east, west: c.bbox.west }
    : null,
}));

/**
 * Normalise a display name to the key used in file paths and the registry.
 * "Chiang Mai" -> "chiang_mai"
 */
export function cityKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}

export function findCity(nameOrKey: string): CityConfig | undefined {
  const key = cityKey(nameOrKey);
  return CITIES.find((c) => c.key === key);
}

export function getCity(nameOrKey: string): CityConfig {
  const city = findCity(nameOrKey);
  if (!city) {
    throw new NotFoundError(`City configuration for "${nameOrKey}"`);
  }
  return city;
}

export function listCities(country?: string): CityConfig[] {
  if (!country) return [...CITIES];
  const wanted = country.trim().toLowerCase();
  return CITIES.filter((c) => c.country.toLowerCase() === wanted || c.countryCode.toLowerCase() === wanted);
}
