import config from '../config';
import { CityConfig, EnrichedPoi, Poi, PriorityTier, StageStats } from '../types';
import { NotFoundError, errorMessage } from '../utils/errors';
import { LayerStore } from '../services/layer-store.service';
import { OllamaService } from '../services/ollama.service';
import { buildPoiPrompt, fallbackEnrichment, normalizeEnrichment } from '../services/enrichment.service';
import { prioritize } from '../services/poi-prioritizer.service';
import { BaseStage } from './base.stage';

export interface EnrichOptions {
  /** Maximum POIs to enrich in this run; 0 means no limit. */
  limit?: number;
  tier?: PriorityTier;
  /** Concurrent model calls. 1 runs sequentially. */
  workers?: number;
}

/**
 * Gold layer: prioritised POIs enriched by the local model. Already enriched
 * POIs are skipped so an interrupted run can be restarted.
 */
export class EnricherStage extends BaseStage<EnrichOptions> {
  readonly name = 'enrich' as const;
  private ollama: OllamaService;

  constructor(ollama: OllamaService = new OllamaService(), store?: LayerStore) {
    super(store);
    this.ollama = ollama;
  }

  /**
   * Silver POIs plus manual and CSV additions, deduplicated by osmId with the
   * user-supplied records taking precedence.
   */
  async loadCandidates(city: string): Promise<Poi[]> {
    const [silver, manual, csv] = await Promise.all([
      this.store.readSilverPois(city),
      this.store.readManualPois(city, 'manual'),
      this.store.readManualPois(city, 'csv'),
    ]);
    if (silver === null && manual.length === 0 && csv.length === 0) {
      throw new NotFoundError(`Silver POIs for ${city}`);
    }

    const byId = new Map<string, Poi>();
    for (const poi of [...manual, ...csv, ...(silver ?? [])]) {
      if (!byId.has(poi.osmId)) byId.set(poi.osmId, poi);
    }
    return prioritize([...byId.values()]);
  }

  async enrichPoi(poi: Poi, city: CityConfig, useModel: boolean): Promise<EnrichedPoi> {
    if (useModel) {
      try {
        const raw = await this.ollama.generateJson(buildPoiPrompt(poi, city.name));
        return { ...poi, ...normalizeEnrichment(raw, poi, city.name) };
      } catch (error) {
        this.log('warn', `Using fallback enrichment for ${poi.name}`, { city: city.key, error: errorMessage(error) });
      }
    }
    return { ...poi, ...fallbackEnrichment(poi, city.name) };
  }

  protected async execute(city: CityConfig, options: EnrichOptions): Promise<StageStats> {
    const candidates = await this.loadCandidates(city.key);
    const eligible = options.tier ? candidates.filter((p) => p.priorityTier === options.tier) : candidates;

    const gold = await this.store.readGoldPois(city.key);
    const done = new Set(gold.map((p) => p.osmId));
    const pending = eligible.filter((p) => !done.has(p.osmId));
    const skipped = eligible.length - pending.length;

    const limit = options.limit ?? config.enrich.limit;
    const selected = limit > 0 ? pending.slice(0, limit) : pending;
    const workers = Math.max(1, Math.min(options.workers ?? config.enrich.workers, selected.length || 1));

    const useModel = selected.length > 0 && (await this.ollama.isAvailable());
    if (selected.length > 0 && !useModel) {
      this.log('warn', `Ollama not reachable, using fallback enrichment for ${city.name}`, { city: city.key });
    }

    this.log('info', `Enriching ${selected.length} POIs with ${workers} worker(s)`, {
      city: city.key,
      candidates: eligible.length,
      skipped,
    });

    const results: EnrichedPoi[] = [...gold];
    let enriched = 0;
    let fallbacks = 0;
    let next = 0;
    // Checkpoint writes are chained so completions from parallel workers never interleave
    let writes: Promise<void> = Promise.resolve();

    const worker = async (): Promise<void> => {
      while (next < selected.length) {
        const poi = selected[next++];
        const record = await this.enrichPoi(poi, city, useModel);
        if (record.enrichmentSource === 'llm') enriched++;
        else fallbacks++;

        results.push(record);
        const snapshot = [...results];
        writes = writes.then(() => this.store.writeGoldPois(city.key, snapshot));
        await writes;
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));

    return {
      candidates: eligible.length,
      attempted: selected.length,
      enriched,
      fallbacks,
      skipped,
      workers,
      totalGold: results.length,
    };
  }
}
