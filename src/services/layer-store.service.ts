import { promises as fs } from 'fs';
import path from 'path';
import config from '../config';
import {
  DestinationDetails,
  EnrichedPoi,
  HarvestMetadata,
  Poi,
  SilverMetadata,
  StageRunResult,
  TileFile,
} from '../types';
import { appendJsonLine, isFileNotFound, pathExists, readJson, writeJsonAtomic } from '../utils/json-file';

export type Layer = 'bronze' | 'silver' | 'gold';

export interface CityLayerStatus {
  city: string;
  harvests: number;
  latestHarvest?: string;
  silverPois: number;
  goldPois: number;
  hasDestination: boolean;
}

export interface PipelineStatus {
  bronze: number;
  silver: number;
  gold: number;
  cities: CityLayerStatus[];
}

/**
 * File layout of the medallion layers:
 *
 *   layers/bronze/<city>/<harvestId>/tile_<n>.json + metadata.json
 *   layers/silver/<city>/pois.json, metadata.json, manual_pois.json, csv_pois.json
 *   layers/gold/<city>/pois.json, destination_details.json
 *   layers/runs.jsonl
 */
export class LayerStore {
  readonly root: string;
  private manualWrites = new Map<string, Promise<unknown>>();

  constructor(dataDir: string = config.dataDir) {
    this.root = path.join(dataDir, 'layers');
  }

  layerDir(layer: Layer, city?: string): string {
    return city ? path.join(this.root, layer, city) : path.join(this.root, layer);
  }

  // ---------------------------------------------------------------------------
  // Bronze
  // ---------------------------------------------------------------------------

  harvestDir(city: string, harvestId: string): string {
    return path.join(this.layerDir('bronze', city), harvestId);
  }

  tilePath(city: string, harvestId: string, tileIndex: number): string {
    return path.join(this.harvestDir(city, harvestId), `tile_${tileIndex}.json`);
  }

  /**
   * Harvest ids, newest first. Ids are UTC timestamps so they sort lexically.
   */
  async listHarvests(city: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.layerDir('bronze', city), { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory())
        .map((e) => e.name)
        .sort()
        .reverse();
    } catch (error) {
      if (isFileNotFound(error)) return [];
      throw error;
    }
  }

  async readHarvestMetadata(city: string, harvestId: string): Promise<HarvestMetadata | null> {
    return readJson<HarvestMetadata | null>(path.join(this.harvestDir(city, harvestId), 'metadata.json'), null);
  }

  async writeHarvestMetadata(metadata: HarvestMetadata): Promise<void> {
    await writeJsonAtomic(path.join(this.harvestDir(metadata.city, metadata.harvestId), 'metadata.json'), metadata);
  }

  async writeTile(city: string, harvestId: string, tile: TileFile): Promise<void> {
    await writeJsonAtomic(this.tilePath(city, harvestId, tile.tile.index), tile);
  }

  async hasTile(city: string, harvestId: string, tileIndex: number): Promise<boolean> {
    return pathExists(this.tilePath(city, harvestId, tileIndex));
  }

  async readTiles(city: string, harvestId: string): Promise<TileFile[]> {
    const dir = this.harvestDir(city, harvestId);
    const files = (await fs.readdir(dir)).filter((f) => /^tile_\d+\.json$/.test(f));
    const tileNumber = (f: string) => parseInt(f.replace(/\D/g, ''), 10);
    files.sort((a, b) => tileNumber(a) - tileNumber(b));

    const tiles: TileFile[] = [];
    for (const file of files) {
      const tile = await readJson<TileFile | null>(path.join(dir, file), null);
      if (tile) tiles.push(tile);
    }
    return tiles;
  }

  // ---------------------------------------------------------------------------
  // Silver
  // ---------------------------------------------------------------------------

  async readSilverPois(city: string): Promise<Poi[] | null> {
    return readJson<Poi[] | null>(path.join(this.layerDir('silver', city), 'pois.json'), null);
  }

  async writeSilver(city: string, pois: Poi[], metadata: SilverMetadata): Promise<void> {
    const dir = this.layerDir('silver', city);
    await writeJsonAtomic(path.join(dir, 'pois.json'), pois);
    await writeJsonAtomic(path.join(dir, 'metadata.json'), metadata);
  }

  async readSilverMetadata(city: string): Promise<SilverMetadata | null> {
    return readJson<SilverMetadata | null>(path.join(this.layerDir('silver', city), 'metadata.json'), null);
  }

  async readManualPois(city: string, source: 'manual' | 'csv'): Promise<Poi[]> {
    return readJson<Poi[]>(path.join(this.layerDir('silver', city), `${source}_pois.json`), []);
  }

  async writeManualPois(city: string, source: 'manual' | 'csv', pois: Poi[]): Promise<void> {
    await writeJsonAtomic(path.join(this.layerDir('silver', city), `${source}_pois.json`), pois);
  }

  /**
   * Read-modify-write of a manual POI file. Updates to the same file run one
   * after another, so concurrent callers never drop each other's entries.
   * `update` returns the new list, or null to leave the file untouched.
   */
  async updateManualPois(
    city: string,
    source: 'manual' | 'csv',
    update: (current: Poi[]) => Poi[] | null
  ): Promise<Poi[]> {
    const key = `${city}/${source}`;
    // a failed update is reported to its own caller; the next one still runs
    const previous = (this.manualWrites.get(key) ?? Promise.resolve()).catch(() => undefined);
    const next = previous.then(async () => {
      const current = await this.readManualPois(city, source);
      const updated = update(current);
      if (updated === null) return current;
      await this.writeManualPois(city, source, updated);
      return updated;
    });
    this.manualWrites.set(key, next);
    try {
      return await next;
    } finally {
      if (this.manualWrites.get(key) === next) this.manualWrites.delete(key);
    }
  }

  // ---------------------------------------------------------------------------
  // Gold
  // ---------------------------------------------------------------------------

  async readGoldPois(city: string): Promise<EnrichedPoi[]> {
    return readJson<EnrichedPoi[]>(path.join(this.layerDir('gold', city), 'pois.json'), []);
  }

  async writeGoldPois(city: string, pois: EnrichedPoi[]): Promise<void> {
    await writeJsonAtomic(path.join(this.layerDir('gold', city), 'pois.json'), pois);
  }

  async readDestination(city: string): Promise<DestinationDetails | null> {
    return readJson<DestinationDetails | null>(
      path.join(this.layerDir('gold', city), 'destination_details.json'),
      null
    );
  }

  async writeDestination(city: string, details: DestinationDetails): Promise<void> {
    await writeJsonAtomic(path.join(this.layerDir('gold', city), 'destination_details.json'), details);
  }

  // ---------------------------------------------------------------------------
  // Runs & status
  // ---------------------------------------------------------------------------

  async recordRun(result: StageRunResult): Promise<void> {
    await appendJsonLine(path.join(this.root, 'runs.jsonl'), result);
  }

  async readRuns(limit: number = 50): Promise<StageRunResult[]> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.root, 'runs.jsonl'), 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) return [];
      throw error;
    }
    const lines = raw.split('\n').filter((l) => l.trim().length > 0);
    return lines.slice(-limit).map((line): StageRunResult => JSON.parse(line));
  }

  async getStatus(): Promise<PipelineStatus> {
    const [bronze, silver, gold] = await Promise.all([
      this.countFiles(this.layerDir('bronze')),
      this.countFiles(this.layerDir('silver')),
      this.countFiles(this.layerDir('gold')),
    ]);

    const cityKeys = new Set<string>();
    for (const layer of ['bronze', 'silver', 'gold'] as const) {
      for (const city of await this.listDirs(this.layerDir(layer))) {
        cityKeys.add(city);
      }
    }

    const cities: CityLayerStatus[] = [];
    for (const city of [...cityKeys].sort()) {
      const harvests = await this.listHarvests(city);
      const silverPois = await this.readSilverPois(city);
      const goldPois = await this.readGoldPois(city);
      const destination = await this.readDestination(city);
      cities.push({
        city,
        harvests: harvests.length,
        latestHarvest: harvests[0],
        silverPois: silverPois ? silverPois.length : 0,
        goldPois: goldPois.length,
        hasDestination: destination !== null,
      });
    }

    return { bronze, silver, gold, cities };
  }

  private async listDirs(dir: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (isFileNotFound(error)) return [];
      throw error;
    }
  }

  private async countFiles(dir: string): Promise<number> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isFileNotFound(error)) return 0;
      throw error;
    }
    let count = 0;
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        count += await this.countFiles(full);
      } else if (entry.isFile() && !entry.name.endsWith('.tmp')) {
        count++;
      }
    }
    return count;
  }
}

export const layerStore = new LayerStore();
export default layerStore;
