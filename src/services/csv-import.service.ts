import { CsvError, parse } from 'csv-parse';
import fs from 'fs';
import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';
import { Poi } from '../types';
import { ValidationError, errorMessage } from '../utils/errors';
import { isValidCoordinate } from '../utils/geo';
import { LayerStore, layerStore } from './layer-store.service';
import { MANUAL_PRIORITY } from './poi-prioritizer.service';
import logger from './logger.service';

const COLUMN_ALIASES = {
  name: ['name', 'title', 'place_name'],
  lat: ['lat', 'latitude', 'y'],
  lon: ['lon', 'lng', 'longitude', 'x'],
  category: ['category', 'type'],
  description: ['description', 'desc'],
} as const;

type CsvField = keyof typeof COLUMN_ALIASES;

export interface CsvRowError {
  row: number;
  error: string;
}

export interface CsvImportReport {
  city: string;
  file: string;
  totalRows: number;
  imported: number;
  failed: number;
  errors: CsvRowError[];
  totalCsvPois: number;
}

export interface ManualPoiInput {
  name: string;
  category: string;
  lat: number;
  lon: number;
  description?: string;
}

export interface ImportOptions {
  /** Delete the source file afterwards (uploaded temp files). */
  removeAfterImport?: boolean;
}

function field(record: Record<string, string>, name: CsvField): string | undefined {
  for (const alias of COLUMN_ALIASES[name]) {
    const value = record[alias]?.trim();
    if (value) return value;
  }
  return undefined;
}

// Namespace for content-derived CSV POI ids
export const CSV_POI_NAMESPACE = '6f1d3c52-8a4e-4b0f-9d27-3e5a1c7b9f40';

export function csvPoiId(name: string, lat: number, lon: number): string {
  return `csv_${uuidv5(`${name.toLowerCase()}|${lat}|${lon}`, CSV_POI_NAMESPACE)}`;
}

/**
 * Imports user-supplied POIs (CSV uploads and one-off manual entries) into
 * the silver layer next to the harvested data.
 */
export class CsvImportService {
  constructor(private store: LayerStore = layerStore) {}

  /**
   * Map one CSV record to a POI. Column names are matched case-insensitively
   * against the alias lists. The id comes from name and coordinates, so the
   * same place imported twice keeps one id.
   */
  toPoi(record: Record<string, string>): Poi {
    const name = field(record, 'name');
    if (!name) throw new Error('Missing name');

    const lat = Number(field(record, 'lat'));
    const lon = Number(field(record, 'lon'));
    const coordinates = { lat, lon };
    if (!isValidCoordinate(coordinates)) {
      throw new Error('Missing or invalid coordinates');
    }

    return {
      osmId: csvPoiId(name, lat, lon),
      name,
      category: field(record, 'category') ?? 'unknown',
      coordinates,
      description: field(record, 'description'),
      tags: { source: 'csv_upload' },
      contact: {},
      isManual: true,
      priorityScore: MANUAL_PRIORITY,
      priorityTier: 'high',
    };
  }

  async importFile(filePath: string, city: string, options: ImportOptions = {}): Promise<CsvImportReport> {
    logger.info(`Starting CSV import for ${city}`, { file: filePath });

    const imported: Poi[] = [];
    const errors: CsvRowError[] = [];
    let rowCount = 0;

    try {
      const source = fs.createReadStream(filePath);
      const parser = source.pipe(
        parse({
          columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
          skip_empty_lines: true,
          // short or long rows are reported per row instead of aborting the file
          relax_column_count: true,
          trim: true,
        })
      );
      // pipe() does not forward read errors (missing file) to the parser
      source.on('error', (error) => parser.destroy(error));

      for await (const row of parser) {
        rowCount++;
        const record: Record<string, string> = row;
        try {
          imported.push(this.toPoi(record));
        } catch (error) {
          errors.push({ row: rowCount, error: errorMessage(error) });
          logger.warn(`Skipping CSV row ${rowCount}`, { city, error: errorMessage(error) });
        }
      }
    } catch (error) {
      if (error instanceof CsvError) throw new ValidationError(`Invalid CSV: ${error.message}`);
      throw error;
    } finally {
      if (options.removeAfterImport) {
        await fs.promises.rm(filePath, { force: true });
      }
    }

    // Re-importing a place replaces the earlier copy
    const merged = await this.store.updateManualPois(city, 'csv', (existing) => {
      if (imported.length === 0) return null;
      const byId = new Map(existing.map((poi) => [poi.osmId, poi]));
      for (const poi of imported) byId.set(poi.osmId, poi);
      return [...byId.values()];
    });
    if (imported.length === 0) {
      logger.warn(`No valid POIs found in CSV for ${city}`);
    }

    logger.info(`Completed CSV import for ${city}`, { imported: imported.length, failed: errors.length });

    return {
      city,
      file: filePath,
      totalRows: rowCount,
      imported: imported.length,
      failed: errors.length,
      errors,
      totalCsvPois: merged.length,
    };
  }

  async addManualPoi(city: string, input: ManualPoiInput): Promise<Poi> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Name is required');

    const coordinates = { lat: input.lat, lon: input.lon };
    if (!isValidCoordinate(coordinates)) {
      throw new ValidationError('Invalid coordinates');
    }

    const poi: Poi = {
      osmId: `manual_${uuidv4()}`,
      name,
      category: input.category.trim() || 'attraction',
      coordinates,
      description: input.description?.trim() || undefined,
      tags: { manual: 'true' },
      contact: {},
      isManual: true,
      priorityScore: MANUAL_PRIORITY,
      priorityTier: 'high',
    };

    await this.store.updateManualPois(city, 'manual', (current) => [...current, poi]);
    logger.info(`Added manual POI ${name}`, { city, osmId: poi.osmId });
    return poi;
  }
}

export const csvImportService = new CsvImportService();
export default csvImportService;
