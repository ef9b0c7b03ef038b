import { cityKey } from '../config/cities';
import { BoundingBox, OverpassElement } from '../types';
import { ValidationError } from '../utils/errors';
import { elementCoordinates } from './osm-normalizer.service';
import { OverpassService } from './overpass.service';
import logger from './logger.service';

/** Half-width in degrees of the box put around a discovered place (about 20 km). */
export const DISCOVERY_BBOX_OFFSET = 0.2;
export const DEFAULT_MIN_POPULATION = 50000;

export type DiscoveredType = 'city' | 'heritage';

export interface DiscoveredDestination {
  key: string;
  name: string;
  country: string;
  type: DiscoveredType;
  lat: number;
  lon: number;
  population?: number;
  bbox: BoundingBox;
}

function escapeTagValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function buildCitiesQuery(country: string, timeoutSec: number): string {
  return `[out:json][timeout:${timeoutSec}];
area["name:en"="${escapeTagValue(country)}"]["admin_level"="2"]->.country;
node(area.country)["place"~"^(city|town)$"]["population"];
out body;`;
}

export function buildHeritageQuery(country: string, timeoutSec: number): string {
  return `[out:json][timeout:${timeoutSec}];
area["name:en"="${escapeTagValue(country)}"]["admin_level"="2"]->.country;
(
  node(area.country)["heritage"="1"];
  way(area.country)["heritage"="1"];
);
out center tags;`;
}

/** OSM population tags are free text ("1,118,035", "120000;2019"). */
export function parsePopulation(value: string | undefined): number {
  if (!value) return 0;
  const digits = value.split(';')[0].replace(/[\s,.']/g, '');
  const parsed = parseInt(digits, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function bboxAround(lat: number, lon: number, offset: number = DISCOVERY_BBOX_OFFSET): BoundingBox {
  return {
    north: Math.min(90, lat + offset),
    south: Math.max(-90, lat - offset),
    east: Math.min(180, lon + offset),
    west: Math.max(-180, lon - offset),
  };
}

function toDestination(
  el: OverpassElement,
  country: string,
  type: DiscoveredType,
  population?: number
): DiscoveredDestination | null {
  const tags = el.tags ?? {};
  const name = tags['name:en'] ?? tags.name;
  const point = elementCoordinates(el);
  if (!name || !point) return null;
  return {
    key: cityKey(name),
    name,
    country,
    type,
    lat: point.lat,
    lon: point.lon,
    population,
    bbox: bboxAround(point.lat, point.lon),
  };
}

/**
 * Finds candidate destinations for a country: towns and cities above a
 * population threshold (largest first), then heritage sites. Names seen
 * earlier win.
 */
export class DestinationDiscoveryService {
  constructor(private overpass: OverpassService = new OverpassService()) {}

  async discover(country: string, minPopulation: number = DEFAULT_MIN_POPULATION): Promise<DiscoveredDestination[]> {
    const name = country.trim();
    if (!name) throw new ValidationError('Country is required');

    logger.info(`Discovering destinations in ${name}`, { minPopulation });
    const timeout = this.overpass.queryTimeoutSec;

    const cityResponse = await this.overpass.query(buildCitiesQuery(name, timeout));
    const cities = cityResponse.elements
      .map((el) => {
        const population = parsePopulation(el.tags?.population);
        return population >= minPopulation ? toDestination(el, name, 'city', population) : null;
      })
      .filter((d): d is DiscoveredDestination => d !== null)
      .sort((a, b) => (b.population ?? 0) - (a.population ?? 0));

    const heritageResponse = await this.overpass.query(buildHeritageQuery(name, timeout));
    const sites = heritageResponse.elements
      .map((el) => toDestination(el, name, 'heritage'))
      .filter((d): d is DiscoveredDestination => d !== null);

    const seen = new Set<string>();
    const destinations: DiscoveredDestination[] = [];
    for (const destination of [...cities, ...sites]) {
      if (seen.has(destination.key)) continue;
      seen.add(destination.key);
      destinations.push(destination);
    }

    logger.info(`Found ${destinations.length} destinations in ${name}`, {
      cities: cities.length,
      heritage: sites.length,
    });
    return destinations;
  }
}
