import axios, { AxiosInstance } from 'axios';
import config from '../config';
import { WikidataCityDetails } from '../types';
import { UpstreamError, errorMessage } from '../utils/errors';
import logger from './logger.service';

interface SparqlBinding {
  type: string;
  value: string;
}

interface SparqlResponse {
  results: {
    bindings: Array<Record<string, SparqlBinding | undefined>>;
  };
}

/**
 * WKT "Point(lng lat)" -> { lat, lng }
 */
export function parseWktPoint(wkt: string): { lat: number; lng: number } | undefined {
  const match = /^Point\(\s*(-?\d+(?:\.\d+)?)\s+(-?\d+(?:\.\d+)?)\s*\)$/i.exec(wkt.trim());
  if (!match) return undefined;
  return { lat: parseFloat(match[2]), lng: parseFloat(match[1]) };
}

export function buildCityQuery(cityName: string): string {
  const label = cityName.replace(/["\\]/g, '');
  return `
SELECT ?city ?cityLabel ?countryLabel ?population ?image ?currencyLabel ?coords ?desc WHERE {
  ?city rdfs:label "${label}"@en.
  ?city wdt:P31/wdt:P279* wd:Q515.
  OPTIONAL { ?city wdt:P17 ?country. }
  OPTIONAL { ?city wdt:P1082 ?population. }
  OPTIONAL { ?city wdt:P18 ?image. }
  OPTIONAL { ?city wdt:P17/wdt:P38 ?currency. }
  OPTIONAL { ?city wdt:P625 ?coords. }
  OPTIONAL { ?city schema:description ?desc. FILTER(LANG(?desc) = "en") }
  SERVICE wikibase:label { bd:serviceParam wikibase:language "en". }
}
LIMIT 1`;
}

export class WikidataService {
  private client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: config.wikidata.endpoint,
      timeout: config.wikidata.timeoutMs,
      headers: {
        Accept: 'application/sparql-results+json',
        'User-Agent': config.overpass.userAgent,
      },
    });
  }

  async getCityDetails(cityName: string): Promise<WikidataCityDetails | null> {
    let data: SparqlResponse;
    try {
      const response = await this.client.get<SparqlResponse>('', {
        params: { query: buildCityQuery(cityName), format: 'json' },
      });
      data = response.data;
    } catch (error) {
      throw new UpstreamError('Wikidata', errorMessage(error));
    }

    const row = data.results?.bindings?.[0];
    if (!row || !row.city) {
      logger.warn(`No Wikidata entity found for ${cityName}`);
      return null;
    }

    const value = (key: string): string | undefined => row[key]?.value;
    const population = value('population');
    const coords = value('coords');

    return {
      wikidataId: row.city.value.split('/').pop() ?? row.city.value,
      name: cityName,
      country: value('countryLabel'),
      population: population ? parseInt(population, 10) : undefined,
      image: value('image'),
      currency: value('currencyLabel'),
      description: value('desc'),
      coordinates: coords ? parseWktPoint(coords) : undefined,
    };
  }
}
