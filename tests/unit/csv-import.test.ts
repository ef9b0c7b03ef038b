import { promises as fs } from 'fs';
import path from 'path';
import { CsvImportService, csvPoiId } from '../../src/services/csv-import.service';
import { LayerStore } from '../../src/services/layer-store.service';
import { ValidationError } from '../../src/utils/errors';
import { pathExists } from '../../src/utils/json-file';
import { createTempDir, removeTempDir } from '../helpers/temp-dir';

const CSV = [
  'Name,Latitude,Longitude,Category,Description',
  'Sameba Cathedral,41.6975,44.8168,place_of_worship,Main cathedral of the city',
  ',41.7,44.8,park,No name given',
  'Dry Bridge Market,abc,44.8,marketplace,',
  'Peace Bridge,41.6933,44.8086,,Glass footbridge',
].join('\n');

describe('CsvImportService', () => {
  let dir: string;
  let store: LayerStore;
  let service: CsvImportService;

  const writeCsv = async (name: string, content: string): Promise<string> => {
    const file = path.join(dir, name);
    await fs.writeFile(file, content, 'utf-8');
    return file;
  };

  beforeEach(async () => {
    dir = await createTempDir();
    store = new LayerStore(dir);
    service = new CsvImportService(store);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('toPoi', () => {
    it('maps aliased columns to a manual POI', () => {
      const record = { title: 'Old Bridge', latitude: '41.69', lng: '44.80', type: 'bridge', desc: 'Stone bridge' };

      expect(service.toPoi(record)).toEqual({
        osmId: csvPoiId('Old Bridge', 41.69, 44.8),
        name: 'Old Bridge',
        category: 'bridge',
        coordinates: { lat: 41.69, lon: 44.8 },
        description: 'Stone bridge',
        tags: { source: 'csv_upload' },
        contact: {},
        isManual: true,
        priorityScore: 100,
        priorityTier: 'high',
      });
    });

    it('defaults the category', () => {
      expect(service.toPoi({ name: 'Chronicle', lat: '41.76', lon: '44.82' }).category).toBe('unknown');
    });

    it('derives the id from name and coordinates', () => {
      const id = csvPoiId('Old Bridge', 41.69, 44.8);

      expect(id).toMatch(/^csv_[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(csvPoiId('OLD BRIDGE', 41.69, 44.8)).toBe(id);
      expect(csvPoiId('Old Bridge', 41.7, 44.8)).not.toBe(id);
      expect(service.toPoi({ name: 'Old Bridge', lat: '41.690', lon: '44.80' }).osmId).toBe(id);
    });

    it('rejects rows without a name or usable coordinates', () => {
      expect(() => service.toPoi({ lat: '41.7', lon: '44.8' })).toThrow('Missing name');
      expect(() => service.toPoi({ name: 'X Place', lat: 'north', lon: '44.8' })).toThrow(
        'Missing or invalid coordinates'
      );
      expect(() => service.toPoi({ name: 'X Place', lat: '41.7' })).toThrow('Missing or invalid coordinates');
    });
  });

  describe('importFile', () => {
    it('imports valid rows and reports the rest', async () => {
      const file = await writeCsv('pois.csv', CSV);

      const report = await service.importFile(file, 'tbilisi');

      expect(report).toEqual({
        city: 'tbilisi',
        file,
        totalRows: 4,
        imported: 2,
        failed: 2,
        errors: [
          { row: 2, error: 'Missing name' },
          { row: 3, error: 'Missing or invalid coordinates' },
        ],
        totalCsvPois: 2,
      });

      const stored = await store.readManualPois('tbilisi', 'csv');
      expect(stored.map((p) => [p.name, p.category, p.description])).toEqual([
        ['Sameba Cathedral', 'place_of_worship', 'Main cathedral of the city'],
        ['Peace Bridge', 'unknown', 'Glass footbridge'],
      ]);
      expect(stored.map((p) => p.osmId)).toEqual([
        csvPoiId('Sameba Cathedral', 41.6975, 44.8168),
        csvPoiId('Peace Bridge', 41.6933, 44.8086),
      ]);
    });

    it('replaces rows when the same file is imported again', async () => {
      const file = await writeCsv('pois.csv', CSV);

      await service.importFile(file, 'tbilisi');
      const report = await service.importFile(file, 'tbilisi');

      expect(report.totalCsvPois).toBe(2);
      await expect(store.readManualPois('tbilisi', 'csv')).resolves.toHaveLength(2);
    });

    it('keeps earlier imports when a different file is imported', async () => {
      const first = await writeCsv('a.csv', CSV);
      const second = await writeCsv('b.csv', 'name,lat,lon\nChronicle of Georgia,41.7656,44.8235\n');

      await service.importFile(first, 'tbilisi');
      const report = await service.importFile(second, 'tbilisi');

      expect(report).toMatchObject({ imported: 1, totalCsvPois: 3 });
      const stored = await store.readManualPois('tbilisi', 'csv');
      expect(stored.map((p) => p.name)).toEqual(['Sameba Cathedral', 'Peace Bridge', 'Chronicle of Georgia']);
    });

    it('reports rows with too few columns instead of failing the file', async () => {
      const file = await writeCsv(
        'short.csv',
        'name,lat,lon,category\nSameba Cathedral,41.6975\nPeace Bridge,41.6933,44.8086,bridge\n'
      );

      const report = await service.importFile(file, 'tbilisi');

      expect(report).toMatchObject({
        totalRows: 2,
        imported: 1,
        failed: 1,
        errors: [{ row: 1, error: 'Missing or invalid coordinates' }],
      });
    });

    it('turns a malformed file into a validation error', async () => {
      const file = await writeCsv('broken.csv', 'name,lat,lon\n"Sameba Cathedral,41.6975,44.8168\n');

      const result = service.importFile(file, 'tbilisi', { removeAfterImport: true });

      await expect(result).rejects.toBeInstanceOf(ValidationError);
      await expect(result).rejects.toThrow(/^Invalid CSV: Quote Not Closed/);
      await expect(pathExists(file)).resolves.toBe(false);
    });

    it('writes nothing when no row is valid', async () => {
      const file = await writeCsv('bad.csv', 'name,lat,lon\n,1,2\n');

      const report = await service.importFile(file, 'tbilisi');

      expect(report).toMatchObject({ totalRows: 1, imported: 0, failed: 1, totalCsvPois: 0 });
      await expect(pathExists(path.join(store.layerDir('silver', 'tbilisi'), 'csv_pois.json'))).resolves.toBe(false);
    });

    it('removes uploaded files when asked', async () => {
      const file = await writeCsv('upload.csv', CSV);

      await service.importFile(file, 'tbilisi', { removeAfterImport: true });

      await expect(pathExists(file)).resolves.toBe(false);
    });

    it('rejects a missing file', async () => {
      await expect(service.importFile(path.join(dir, 'missing.csv'), 'tbilisi')).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });
  });

  describe('addManualPoi', () => {
    it('appends to the manual list', async () => {
      const first = await service.addManualPoi('tbilisi', {
        name: ' Chronicle of Georgia ',
        category: 'monument',
        lat: 41.7656,
        lon: 44.8235,
        description: ' Bronze pillars ',
      });
      await service.addManualPoi('tbilisi', { name: 'Funicular', category: '', lat: 41.6948, lon: 44.7868 });

      expect(first).toMatchObject({
        name: 'Chronicle of Georgia',
        category: 'monument',
        description: 'Bronze pillars',
        tags: { manual: 'true' },
        isManual: true,
        priorityScore: 100,
        priorityTier: 'high',
      });
      expect(first.osmId).toMatch(/^manual_[0-9a-f-]{36}$/);

      const stored = await store.readManualPois('tbilisi', 'manual');
      expect(stored.map((p) => [p.name, p.category])).toEqual([
        ['Chronicle of Georgia', 'monument'],
        ['Funicular', 'attraction'],
      ]);
    });

    it('keeps every entry when added concurrently', async () => {
      const names = ['Chronicle of Georgia', 'Funicular', 'Narikala Fortress'];

      await Promise.all(
        names.map((name, i) => service.addManualPoi('tbilisi', { name, category: 'attraction', lat: 41.7 + i / 100, lon: 44.8 }))
      );

      const stored = await store.readManualPois('tbilisi', 'manual');
      expect(stored.map((p) => p.name).sort()).toEqual([...names].sort());
    });

    it('validates name and coordinates', async () => {
      await expect(
        service.addManualPoi('tbilisi', { name: '  ', category: 'park', lat: 41.7, lon: 44.8 })
      ).rejects.toThrow('Name is required');
      await expect(
        service.addManualPoi('tbilisi', { name: 'Nowhere', category: 'park', lat: 0, lon: 0 })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
