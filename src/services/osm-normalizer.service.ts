import { LatLon, OverpassElement, Poi } from '../types';
import { haversineKm } from '../utils/geo';

const CATEGORY_KEYS = ['tourism', 'amenity', 'historic', 'leisure', 'natural'] as const;

export function elementCoordinates(el: OverpassElement): LatLon | null {
  if (typeof el.lat === 'number' && typeof el.lon === 'number') return { lat: el.lat, lon: el.lon };
  if (el.center && typeof el.center.lat === 'number' && typeof el.center.lon === 'number') {
    return { lat: el.center.lat, lon: el.center.lon };
  }
  return null;
}

export function categoryFromTags(tags: Record<string, string>): string {
  for (const key of CATEGORY_KEYS) {
    const value = tags[key];
    if (!value) continue;
    // historic=yes / historic=building etc. collapse into one category
    if (key === 'historic') return 'historic';
    return value === 'yes' ? key : value;
  }
  return 'unknown';
}

export function buildAddress(tags: Record<string, string>): string | undefined {
  if (tags['addr:full']) return tags['addr:full'];
  const street = [tags['addr:housenumber'], tags['addr:street']].filter(Boolean).join(' ');
  const parts = [street, tags['addr:city']].filter((p): p is string => Boolean(p));
  return parts.length > 0 ? parts.join(', ') : undefined;
}

/**
 * "en:Narikala Fortress" -> https://en.wikipedia.org/wiki/Narikala_Fortress
 */
export function wikipediaUrl(tag: string | undefined): string | undefined {
  if (!tag) return undefined;
  const idx = tag.indexOf(':');
  if (idx <= 0) return undefined;
  const lang = tag.slice(0, idx).trim();
  const article = tag.slice(idx + 1).trim().replace(/ /g, '_');
  if (!article) return undefined;
  return `https://${lang}.wikipedia.org/wiki/${article}`;
}

/**
 * Convert a raw Overpass element into a silver POI. Elements without a name
 * or a usable position are dropped.
 */
export function elementToPoi(el: OverpassElement): Poi | null {
  const tags = el.tags ?? {};
  const name = (tags.name || tags['name:en'] || '').trim();
  if (!name) return null;

  const coordinates = elementCoordinates(el);
  if (!coordinates) return null;

  const contact = {
    phone: tags.phone || tags['contact:phone'],
    website: tags.website || tags['contact:website'],
    email: tags.email || tags['contact:email'],
  };

  return {
    osmId: `${el.type}/${el.id}`,
    name,
    category: categoryFromTags(tags),
    coordinates,
    tags,
    address: buildAddress(tags),
    openingHours: tags.opening_hours,
    contact: Object.fromEntries(Object.entries(contact).filter(([, v]) => v !== undefined)),
    wikidata: tags.wikidata,
    wikipedia: wikipediaUrl(tags.wikipedia),
  };
}

const normalizeName = (name: string) => name.trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * Remove duplicates produced by overlapping tiles and by OSM mapping the
 * same place twice (e.g. a node and a building way).
 *
 * Pass 1 drops repeated osm ids. Pass 2 merges records with the same
 * normalised name and category that lie within `radiusMeters` of a record
 * already kept; the first one wins and absorbs tags it lacks.
 */
export function deduplicatePois(pois: Poi[], radiusMeters: number): Poi[] {
  const seenIds = new Set<string>();
  const byKey = new Map<string, Poi[]>();
  const unique: Poi[] = [];

  for (const poi of pois) {
    if (seenIds.has(poi.osmId)) continue;
    seenIds.add(poi.osmId);

    const key = `${normalizeName(poi.name)}|${poi.category}`;
    const candidates = byKey.get(key) ?? [];
    const match = candidates.find(
      (kept) => haversineKm(kept.coordinates, poi.coordinates) * 1000 <= radiusMeters
    );

    if (match) {
      match.tags = { ...poi.tags, ...match.tags };
      match.contact = { ...poi.contact, ...match.contact };
      match.address = match.address ?? poi.address;
      match.openingHours = match.openingHours ?? poi.openingHours;
      match.wikidata = match.wikidata ?? poi.wikidata;
      match.wikipedia = match.wikipedia ?? poi.wikipedia;
      continue;
    }

    const copy: Poi = { ...poi, tags: { ...poi.tags }, contact: { ...poi.contact } };
    candidates.push(copy);
    byKey.set(key, candidates);
    unique.push(copy);
  }

  return unique;
}
