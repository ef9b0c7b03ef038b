import config from '../config';
import { CityConfig, HarvestMetadata, Poi, SilverMetadata, StageStats } from '../types';
import { NotFoundError } from '../utils/errors';
import { deduplicatePois, elementToPoi } from '../services/osm-normalizer.service';
import { translatePoiNames } from '../services/name-translator.service';
import { topRejectionReasons, validatePois } from '../services/quality-validator.service';
import { BaseStage } from './base.stage';

export interface ProcessOptions {
  dedupRadiusMeters?: number;
}

/**
 * Silver layer: bronze tiles -> one deduplicated, English-named, validated
 * POI list per city.
 */
export class ProcessorStage extends BaseStage<ProcessOptions> {
  readonly name = 'process' as const;

  /**
   * Latest completed harvest, else the latest one with a warning.
   */
  async selectHarvest(city: string): Promise<HarvestMetadata> {
    const harvests = await this.store.listHarvests(city);
    if (harvests.length === 0) {
      throw new NotFoundError(`Bronze harvest for ${city}`);
    }

    let latest: HarvestMetadata | null = null;
    for (const harvestId of harvests) {
      const metadata = await this.store.readHarvestMetadata(city, harvestId);
      if (!metadata) continue;
      if (metadata.completedAt) return metadata;
      latest = latest ?? metadata;
    }

    if (!latest) {
      throw new NotFoundError(`Bronze harvest metadata for ${city}`);
    }
    this.log('warn', `No completed harvest for ${city}, using incomplete harvest ${latest.harvestId}`, { city });
    return latest;
  }

  protected async execute(city: CityConfig, options: ProcessOptions): Promise<StageStats> {
    const harvest = await this.selectHarvest(city.key);
    const tiles = await this.store.readTiles(city.key, harvest.harvestId);
    const elements = tiles.flatMap((tile) => tile.elements);

    const converted = elements.map(elementToPoi).filter((poi): poi is Poi => poi !== null);
    const deduped = deduplicatePois(converted, options.dedupRadiusMeters ?? config.processing.dedupRadiusMeters);
    const translation = translatePoiNames(deduped);
    const validation = validatePois(translation.pois);

    const metadata: SilverMetadata = {
      city: city.key,
      sourceHarvest: harvest.harvestId,
      processedAt: new Date().toISOString(),
      rawCount: elements.length,
      convertedCount: converted.length,
      dedupedCount: deduped.length,
      translatedCount: translation.pois.length,
      validatedCount: validation.pois.length,
      translationStats: translation.stats,
      validationStats: validation.stats,
    };
    await this.store.writeSilver(city.key, validation.pois, metadata);

    const topReasons = topRejectionReasons(validation.stats)
      .map(([reason, count]) => `${reason}: ${count}`)
      .join('; ');
    if (topReasons) {
      this.log('info', `Top rejection reasons: ${topReasons}`, { city: city.key });
    }

    return {
      harvestId: harvest.harvestId,
      tiles: tiles.length,
      rawElements: elements.length,
      converted: converted.length,
      duplicatesRemoved: converted.length - deduped.length,
      translationFailed: translation.stats.failed,
      rejected: validation.stats.rejected,
      pois: validation.pois.length,
    };
  }
}
