import config from '../config';
import { BoundingBox, CityConfig, HarvestMetadata, StageStats, Tile } from '../types';
import { ValidationError, errorMessage } from '../utils/errors';
import { isValidBbox, splitBoundingBox } from '../utils/geo';
import { delay } from '../utils/retry';
import { LayerStore } from '../services/layer-store.service';
import { OverpassService } from '../services/overpass.service';
import { BaseStage } from './base.stage';

export interface HarvestOptions {
  /** Continue the latest unfinished harvest instead of starting a new one. */
  resume?: boolean;
  /** Attempt at most this many tiles in this run. */
  maxTiles?: number;
  delayMs?: number;
  tileDegrees?: number;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * UTC timestamp id with milliseconds, e.g. 20250114_093005_042. Sorts chronologically.
 */
export function harvestIdFor(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}_` +
    pad(date.getUTCMilliseconds(), 3)
  );
}

/**
 * Bronze layer: download every tile of the city's bounding box from Overpass.
 */
export class HarvesterStage extends BaseStage<HarvestOptions> {
  readonly name = 'harvest' as const;
  private overpass: OverpassService;

  constructor(overpass: OverpassService = new OverpassService(), store?: LayerStore) {
    super(store);
    this.overpass = overpass;
  }

  protected async validate(city: CityConfig): Promise<void> {
    if (!city.bbox) {
      throw new ValidationError(`City "${city.name}" has no bounding box configured`);
    }
    if (!isValidBbox(city.bbox)) {
      throw new ValidationError(`City "${city.name}" has an invalid bounding box`);
    }
  }

  private async findResumable(city: string): Promise<HarvestMetadata | null> {
    const [latest] = await this.store.listHarvests(city);
    if (!latest) return null;
    const metadata = await this.store.readHarvestMetadata(city, latest);
    return metadata && !metadata.completedAt ? metadata : null;
  }

  private async newHarvest(
    city: string,
    bbox: BoundingBox,
    tileDegrees: number,
    tileCount: number
  ): Promise<HarvestMetadata> {
    const now = new Date();
    // never reuse the directory of an earlier harvest started in the same millisecond
    let stamp = now;
    while (await this.store.readHarvestMetadata(city, harvestIdFor(stamp))) {
      stamp = new Date(stamp.getTime() + 1);
    }
    return {
      city,
      harvestId: harvestIdFor(stamp),
      source: 'OpenStreetMap',
      bbox,
      tileDegrees,
      tileCount,
      tilesFetched: [],
      tilesFailed: [],
      totalElements: 0,
      startedAt: now.toISOString(),
    };
  }

  protected async execute(city: CityConfig, options: HarvestOptions): Promise<StageStats> {
    if (!city.bbox) throw new ValidationError(`City "${city.name}" has no bounding box configured`);

    const delayMs = options.delayMs ?? config.harvest.delayMs;
    let metadata = options.resume ? await this.findResumable(city.key) : null;
    const resumed = metadata !== null;

    if (metadata) {
      this.log('info', `Resuming harvest ${metadata.harvestId}`, {
        city: city.key,
        fetched: metadata.tilesFetched.length,
        tileCount: metadata.tileCount,
      });
    } else {
      const tileDegrees = options.tileDegrees ?? config.harvest.tileDegrees;
      const tileCount = splitBoundingBox(city.bbox, tileDegrees).length;
      metadata = await this.newHarvest(city.key, city.bbox, tileDegrees, tileCount);
      await this.store.writeHarvestMetadata(metadata);
    }

    // Resumed harvests keep their original grid
    const tiles = splitBoundingBox(metadata.bbox, metadata.tileDegrees);
    const pending: Tile[] = [];
    for (const tile of tiles) {
      if (!(await this.store.hasTile(city.key, metadata.harvestId, tile.index))) pending.push(tile);
    }
    const batch = options.maxTiles !== undefined ? pending.slice(0, Math.max(0, options.maxTiles)) : pending;

    let fetched = 0;
    let failed = 0;
    let elements = 0;

    for (let i = 0; i < batch.length; i++) {
      const tile = batch[i];
      if (i > 0 && delayMs > 0) await delay(delayMs);

      try {
        const response = await this.overpass.fetchTile(tile.bbox);
        await this.store.writeTile(city.key, metadata.harvestId, {
          tile,
          fetchedAt: new Date().toISOString(),
          elements: response.elements,
        });
        metadata.tilesFetched = [...new Set([...metadata.tilesFetched, tile.index])].sort((a, b) => a - b);
        metadata.tilesFailed = metadata.tilesFailed.filter((index) => index !== tile.index);
        metadata.totalElements += response.elements.length;
        elements += response.elements.length;
        fetched++;
        this.log('debug', `Tile ${tile.index + 1}/${tiles.length}: ${response.elements.length} elements`, {
          city: city.key,
        });
      } catch (error) {
        if (!metadata.tilesFailed.includes(tile.index)) {
          metadata.tilesFailed = [...metadata.tilesFailed, tile.index].sort((a, b) => a - b);
        }
        failed++;
        this.log('error', `Tile ${tile.index} failed, skipping`, { city: city.key, error: errorMessage(error) });
      }

      await this.store.writeHarvestMetadata(metadata);
    }

    const attempted = new Set([...metadata.tilesFetched, ...metadata.tilesFailed]);
    const complete = tiles.every((tile) => attempted.has(tile.index));
    if (complete) {
      metadata.completedAt = new Date().toISOString();
      await this.store.writeHarvestMetadata(metadata);
    }

    return {
      harvestId: metadata.harvestId,
      resumed,
      tileCount: tiles.length,
      tilesFetched: fetched,
      tilesFailed: failed,
      elements,
      totalElements: metadata.totalElements,
      complete,
    };
  }
}
