import { CityConfig, DestinationDetails, StageStats, WikidataCityDetails } from '../types';
import { errorMessage } from '../utils/errors';
import { bboxCenter } from '../utils/geo';
import { LayerStore } from '../services/layer-store.service';
import { OllamaService } from '../services/ollama.service';
import { WikidataService } from '../services/wikidata.service';
import {
  DestinationContent,
  buildDestinationPrompt,
  fallbackDestinationContent,
  normalizeDestinationContent,
} from '../services/destination-content.service';
import { BaseStage } from './base.stage';

export interface DestinationOptions {
  skipWikidata?: boolean;
}

export class DestinationEnricherStage extends BaseStage<DestinationOptions> {
  readonly name = 'enrich-destination' as const;
  private ollama: OllamaService;
  private wikidata: WikidataService;

  constructor(
    ollama: OllamaService = new OllamaService(),
    wikidata: WikidataService = new WikidataService(),
    store?: LayerStore
  ) {
    super(store);
    this.ollama = ollama;
    this.wikidata = wikidata;
  }

  private async lookupWikidata(city: CityConfig): Promise<WikidataCityDetails | undefined> {
    try {
      return (await this.wikidata.getCityDetails(city.name)) ?? undefined;
    } catch (error) {
      this.log('warn', `Wikidata lookup failed for ${city.name}`, { city: city.key, error: errorMessage(error) });
      return undefined;
    }
  }

  private async generateContent(city: CityConfig): Promise<{ content: DestinationContent; source: 'llm' | 'fallback' }> {
    try {
      const raw = await this.ollama.generateJson(buildDestinationPrompt(city.name, city.country));
      return { content: normalizeDestinationContent(raw, city.name, city.country), source: 'llm' };
    } catch (error) {
      this.log('warn', `Using fallback destination content for ${city.name}`, {
        city: city.key,
        error: errorMessage(error),
      });
      return { content: fallbackDestinationContent(city.name, city.country), source: 'fallback' };
    }
  }

  protected async execute(city: CityConfig, options: DestinationOptions): Promise<StageStats> {
    const wikidata = options.skipWikidata ? undefined : await this.lookupWikidata(city);
    const { content, source } = await this.generateContent(city);

    let coordinates = { lat: 0, lng: 0 };
    if (city.bbox) {
      const center = bboxCenter(city.bbox);
      coordinates = { lat: center.lat, lng: center.lon };
    } else if (wikidata?.coordinates) {
      coordinates = wikidata.coordinates;
    }

    const details: DestinationDetails = {
      slug: city.key,
      name: city.name,
      countryCode: city.countryCode,
      coordinates,
      timezone: city.timezone,
      ...content,
      ...(wikidata ? { wikidata } : {}),
      source,
      generatedAt: new Date().toISOString(),
    };
    await this.store.writeDestination(city.key, details);

    return {
      source,
      wikidata: wikidata !== undefined,
      bestMonths: details.bestMonths.join(','),
      safetyScore: details.safety.score,
    };
  }
}
