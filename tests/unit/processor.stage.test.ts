import { ProcessorStage } from '../../src/stages/processor.stage';
import { LayerStore } from '../../src/services/layer-store.service';
import { NotFoundError } from '../../src/utils/errors';
import { makeElement, makeHarvestMetadata } from '../helpers/fixtures';
import { createTempDir, removeTempDir } from '../helpers/temp-dir';

const HARVEST = '20250101_000000';
const tileBbox = { north: 41.8, south: 41.65, east: 44.9, west: 44.7 };

const narikala = makeElement(
  1,
  { name: 'Narikala Fortress', historic: 'castle', wikipedia: 'en:Narikala' },
  { lat: 41.6875, lon: 44.8085 }
);

async function writeBronze(store: LayerStore): Promise<void> {
  await store.writeHarvestMetadata(makeHarvestMetadata({ harvestId: HARVEST, tileCount: 2, tilesFetched: [0, 1] }));
  await store.writeTile('tbilisi', HARVEST, {
    tile: { index: 0, bbox: tileBbox },
    fetchedAt: '2025-01-01T00:01:00.000Z',
    elements: [
      narikala,
      // Same fortress mapped as a building outline
      makeElement(2, { name: 'narikala fortress', historic: 'yes' }, { lat: 41.6877, lon: 44.8086 }, 'way'),
      makeElement(
        3,
        { name: 'სამება', 'name:en': 'Holy Trinity Cathedral', amenity: 'place_of_worship' },
        { lat: 41.6975, lon: 44.8168 }
      ),
      makeElement(4, { name: 'მეტეხი', amenity: 'place_of_worship' }, { lat: 41.6905, lon: 44.8105 }),
      makeElement(5, { tourism: 'viewpoint' }, { lat: 41.69, lon: 44.8 }),
      makeElement(6, { name: 'Museum', tourism: 'museum' }, { lat: 41.7, lon: 44.8 }),
    ],
  });
  await store.writeTile('tbilisi', HARVEST, {
    tile: { index: 1, bbox: tileBbox },
    fetchedAt: '2025-01-01T00:02:00.000Z',
    elements: [
      narikala,
      makeElement(7, { name: '北京饭店', amenity: 'restaurant' }, { lat: 41.71, lon: 44.79 }),
      makeElement(8, { name: 'ATM', amenity: 'restaurant' }, { lat: 41.71, lon: 44.78 }),
    ],
  });
}

describe('ProcessorStage', () => {
  let dir: string;
  let store: LayerStore;
  let stage: ProcessorStage;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new LayerStore(dir);
    stage = new ProcessorStage(store);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('turns bronze tiles into validated silver POIs', async () => {
    await writeBronze(store);

    const result = await stage.run('tbilisi', {});

    expect(result.stats).toEqual({
      harvestId: HARVEST,
      tiles: 2,
      rawElements: 9,
      converted: 8,
      duplicatesRemoved: 2,
      translationFailed: 1,
      rejected: 2,
      pois: 3,
    });

    const pois = await store.readSilverPois('tbilisi');
    expect(pois?.map((p) => [p.osmId, p.name, p.originalName])).toEqual([
      ['node/1', 'Narikala Fortress', undefined],
      ['node/3', 'Holy Trinity Cathedral', 'სამება'],
      ['node/4', 'Metekhi', 'მეტეხი'],
    ]);
    expect(pois?.[0].wikipedia).toBe('https://en.wikipedia.org/wiki/Narikala');

    const metadata = await store.readSilverMetadata('tbilisi');
    expect(metadata).toMatchObject({
      city: 'tbilisi',
      sourceHarvest: HARVEST,
      rawCount: 9,
      convertedCount: 8,
      dedupedCount: 6,
      translatedCount: 5,
      validatedCount: 3,
      translationStats: { total: 6, alreadyEnglish: 3, osmEnglish: 1, transliterated: 1, failed: 1 },
      validationStats: {
        total: 5,
        valid: 3,
        rejected: 2,
        rejectionReasons: { 'Generic name': 1, 'Suspicious name pattern': 1 },
      },
    });
  });

  it('uses a wider dedup radius when asked', async () => {
    await writeBronze(store);
    await store.writeTile('tbilisi', HARVEST, {
      tile: { index: 2, bbox: tileBbox },
      fetchedAt: '2025-01-01T00:03:00.000Z',
      // ~330 m from node/1
      elements: [makeElement(9, { name: 'Narikala Fortress', historic: 'ruins' }, { lat: 41.6905, lon: 44.8085 })],
    });

    const narrow = await stage.run('tbilisi', {});
    const wide = await stage.run('tbilisi', { dedupRadiusMeters: 500 });

    expect(narrow.stats.pois).toBe(4);
    expect(wide.stats.pois).toBe(3);
  });

  describe('selectHarvest', () => {
    it('prefers the newest completed harvest', async () => {
      await store.writeHarvestMetadata(makeHarvestMetadata({ harvestId: '20250101_000000' }));
      await store.writeHarvestMetadata(makeHarvestMetadata({ harvestId: '20250102_000000', completedAt: undefined }));

      await expect(stage.selectHarvest('tbilisi')).resolves.toMatchObject({ harvestId: '20250101_000000' });
    });

    it('falls back to an incomplete harvest', async () => {
      await store.writeHarvestMetadata(makeHarvestMetadata({ harvestId: '20250102_000000', completedAt: undefined }));

      await expect(stage.selectHarvest('tbilisi')).resolves.toMatchObject({ harvestId: '20250102_000000' });
    });

    it('fails when the city was never harvested', async () => {
      await expect(stage.selectHarvest('tbilisi')).rejects.toThrow(new NotFoundError('Bronze harvest for tbilisi'));
    });
  });

  it('records a failed run when bronze is missing', async () => {
    await expect(stage.run('tbilisi', {})).rejects.toBeInstanceOf(NotFoundError);

    const [run] = await store.readRuns();
    expect(run).toMatchObject({
      stage: 'process',
      status: 'failed',
      stats: {},
      error: 'Bronze harvest for tbilisi not found',
    });
  });
});
