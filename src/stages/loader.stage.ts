import config from '../config';
import pool from '../config/database';
import { CityConfig, EnrichedPoi, StageStats } from '../types';
import { NotFoundError, ValidationError, errorMessage } from '../utils/errors';
import { LayerStore } from '../services/layer-store.service';
import {
  ActivityRow,
  DestinationRepository,
  PgDestinationRepository,
} from '../repositories/destination.repository';
import { BaseStage } from './base.stage';

export interface LoadOptions {
  batchSize?: number;
  /** Map and count rows without touching the database. */
  dryRun?: boolean;
}

/** VARCHAR widths of the activities table. */
export const ACTIVITY_COLUMN_LIMITS = {
  name: 200,
  category: 100,
  phone: 50,
} as const;

/** Cut to at most `max` characters, counted in code points as Postgres does. */
export function truncate(value: string, max: number): string {
  const chars = Array.from(value);
  return chars.length > max ? chars.slice(0, max).join('') : value;
}

export function toActivityRow(poi: EnrichedPoi): ActivityRow {
  const phone = poi.contact.phone;
  return {
    sourceId: poi.osmId,
    name: truncate(poi.name, ACTIVITY_COLUMN_LIMITS.name),
    category: truncate(poi.category, ACTIVITY_COLUMN_LIMITS.category),
    description: poi.description,
    latitude: poi.coordinates.lat,
    longitude: poi.coordinates.lon,
    address: poi.address ?? null,
    openingHours: poi.openingHours ?? null,
    website: poi.contact.website ?? null,
    phone: phone ? truncate(phone, ACTIVITY_COLUMN_LIMITS.phone) : null,
    wikipedia: poi.wikipedia ?? null,
    durationMin: poi.durationMin,
    bestTime: poi.bestTime,
    bestTimeReason: poi.bestTimeReason,
    priceLevel: poi.priceLevel,
    personas: poi.personas,
    tips: poi.tips,
    whatToExpect: poi.whatToExpect,
    isPopular: poi.isPopular,
    priorityScore: poi.priorityScore ?? null,
    enrichmentSource: poi.enrichmentSource,
  };
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Upload the gold layer of a city to Postgres in batches.
 */
export class LoaderStage extends BaseStage<LoadOptions> {
  readonly name = 'load' as const;
  private repository: DestinationRepository;

  constructor(repository: DestinationRepository = new PgDestinationRepository(pool), store?: LayerStore) {
    super(store);
    this.repository = repository;
  }

  protected async validate(_city: CityConfig, options: LoadOptions): Promise<void> {
    if (options.batchSize !== undefined && (!Number.isInteger(options.batchSize) || options.batchSize < 1)) {
      throw new ValidationError('Batch size must be a positive integer');
    }
  }

  protected async execute(city: CityConfig, options: LoadOptions): Promise<StageStats> {
    const destination = await this.store.readDestination(city.key);
    if (!destination) {
      throw new NotFoundError(`Destination details for ${city.key}`);
    }

    const pois = await this.store.readGoldPois(city.key);
    const rows = pois.map(toActivityRow);
    const batches = chunk(rows, options.batchSize ?? config.load.batchSize);

    if (options.dryRun) {
      this.log('info', `Dry run: ${rows.length} activities in ${batches.length} batches`, { city: city.key });
      return { dryRun: true, batches: batches.length, loaded: 0, failed: 0, rows: rows.length };
    }

    const destinationId = await this.repository.upsertDestination(destination);
    await this.repository.upsertDestinationDetails(destinationId, destination);

    let loaded = 0;
    let failed = 0;
    let failedBatches = 0;

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];
      try {
        loaded += await this.repository.upsertActivities(destinationId, batch);
        this.log('debug', `Batch ${i + 1}/${batches.length} loaded`, { city: city.key, rows: batch.length });
      } catch (error) {
        failed += batch.length;
        failedBatches++;
        this.log('error', `Batch ${i + 1}/${batches.length} failed`, { city: city.key, error: errorMessage(error) });
      }
    }

    return {
      dryRun: false,
      destinationId,
      batches: batches.length,
      failedBatches,
      loaded,
      failed,
      rows: rows.length,
    };
  }
}
