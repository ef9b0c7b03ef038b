import { promises as fs } from 'fs';
import path from 'path';
import { CliDeps, USAGE, parseArgs, runCli } from '../../src/cli';
import { PipelineCoordinator } from '../../src/stages/coordinator';
import { CsvImportService } from '../../src/services/csv-import.service';
import { DestinationDiscoveryService } from '../../src/services/destination-discovery.service';
import { OverpassService } from '../../src/services/overpass.service';
import { LayerStore } from '../../src/services/layer-store.service';
import { makeDestination, makeHarvestMetadata } from '../helpers/fixtures';
import { StageBehaviour, createFakeStages } from '../helpers/fake-stages';
import { InMemoryDestinationRepository } from '../helpers/in-memory-repository';
import { NO_RETRY, createFakeClient } from '../helpers/fake-http';
import { createTempDir, removeTempDir } from '../helpers/temp-dir';

describe('parseArgs', () => {
  it('splits command, positionals and flags', () => {
    expect(parseArgs(['enrich', 'Tbilisi', '--limit', '10', '--tier', 'high'])).toEqual({
      command: 'enrich',
      positionals: ['Tbilisi'],
      flags: { limit: '10', tier: 'high' },
    });
  });

  it('treats known switches as booleans even before a positional', () => {
    expect(parseArgs(['harvest', '--resume', 'Tbilisi', '--max-tiles', '3', '-h'])).toEqual({
      command: 'harvest',
      positionals: ['Tbilisi'],
      flags: { resume: true, 'max-tiles': '3', help: true },
    });
  });

  it('makes a trailing or value-less flag a boolean', () => {
    expect(parseArgs(['run', '--country', '--stages']).flags).toEqual({ country: true, stages: true });
  });
});

describe('runCli', () => {
  let dir: string;
  let store: LayerStore;
  let repository: InMemoryDestinationRepository;
  let lines: string[];
  let serve: jest.Mock<Promise<void>, []>;
  let discovery: DestinationDiscoveryService;

  const setup = (behaviours: Partial<Record<'harvest' | 'process' | 'enrich' | 'load', StageBehaviour>> = {}) => {
    const stages = createFakeStages(store, behaviours);
    const deps: Partial<CliDeps> = {
      coordinator: new PipelineCoordinator(stages),
      store,
      csvImport: new CsvImportService(store),
      repository,
      discovery,
      print: (line) => lines.push(line),
      serve,
    };
    return { stages, cli: (...argv: string[]) => runCli(argv, deps) };
  };

  beforeEach(async () => {
    dir = await createTempDir();
    store = new LayerStore(dir);
    repository = new InMemoryDestinationRepository();
    lines = [];
    serve = jest.fn<Promise<void>, []>(async () => undefined);
    const { client } = createFakeClient((request) => {
      const query = new URLSearchParams(String(request.data)).get('data') ?? '';
      const elements = query.includes('heritage')
        ? [{ type: 'node', id: 2, lat: 41.842, lon: 44.7207, tags: { name: 'Mtskheta' } }]
        : [{ type: 'node', id: 1, lat: 41.6934, lon: 44.8015, tags: { name: 'Tbilisi', population: '1118035' } }];
      return { status: 200, data: { elements } };
    });
    discovery = new DestinationDiscoveryService(
      new OverpassService({ client, endpoints: ['https://overpass.test/api/interpreter'], retry: NO_RETRY })
    );
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('usage', () => {
    it('prints usage and fails without a command', async () => {
      const { cli } = setup();

      await expect(cli()).resolves.toBe(1);
      expect(lines).toEqual([USAGE]);
    });

    it('prints usage for help', async () => {
      const { cli } = setup();

      await expect(cli('help')).resolves.toBe(0);
      await expect(cli('harvest', '--help')).resolves.toBe(0);
      expect(lines).toEqual([USAGE, USAGE]);
    });

    it('rejects unknown commands', async () => {
      const { cli } = setup();

      await expect(cli('scrape')).resolves.toBe(1);
      expect(lines).toEqual(['Unknown command: scrape', USAGE]);
    });
  });

  describe('stage commands', () => {
    it('harvest passes its options and prints the stats', async () => {
      const { cli, stages } = setup({ harvest: () => ({ tileCount: 4, complete: true }) });

      await expect(cli('harvest', 'Tbilisi', '--resume', '--max-tiles', '2')).resolves.toBe(0);

      expect(stages.harvest.calls).toEqual([{ city: 'tbilisi', options: { resume: true, maxTiles: 2 } }]);
      expect(lines).toEqual(['harvest tbilisi: completed', '  tileCount: 4', '  complete: true']);
    });

    it('enrich parses limit, tier and workers', async () => {
      const { cli, stages } = setup();

      await expect(cli('enrich', 'batumi', '--limit', '20', '--tier', 'medium', '--workers', '4')).resolves.toBe(0);

      expect(stages.enrich.calls[0].options).toEqual({ limit: 20, tier: 'medium', workers: 4 });
    });

    it('load and enrich-destination map their switches', async () => {
      const { cli, stages } = setup();

      await cli('load', 'tbilisi', '--batch-size', '50', '--dry-run');
      await cli('enrich-destination', 'tbilisi', '--skip-wikidata');

      expect(stages.load.calls[0].options).toEqual({ batchSize: 50, dryRun: true });
      expect(stages['enrich-destination'].calls[0].options).toEqual({ skipWikidata: true });
    });

    it('reports bad input as an error', async () => {
      const { cli } = setup();

      await expect(cli('process')).resolves.toBe(1);
      await expect(cli('process', 'Atlantis')).resolves.toBe(1);
      await expect(cli('enrich', 'tbilisi', '--tier', 'urgent')).resolves.toBe(1);
      await expect(cli('harvest', 'tbilisi', '--max-tiles', '-3')).resolves.toBe(1);

      expect(lines).toEqual([
        'Error: process requires a city',
        'Error: City configuration for "Atlantis" not found',
        'Error: --tier must be one of high, medium, low',
        'Error: --max-tiles expects a non-negative integer',
      ]);
    });

    it('reports unexpected failures as fatal', async () => {
      const { cli } = setup({
        process: () => {
          throw new TypeError('boom');
        },
      });

      await expect(cli('process', 'tbilisi')).resolves.toBe(1);
      expect(lines).toEqual(['Fatal error: boom']);
    });
  });

  describe('run', () => {
    it('runs each city and fails if any city failed', async () => {
      const { cli, stages } = setup({
        harvest: (city) => {
          if (city === 'batumi') throw new Error('Overpass: all endpoints failed');
          return { tiles: 1 };
        },
      });

      await expect(cli('run', 'tbilisi', 'batumi', '--stages', 'process,harvest')).resolves.toBe(1);

      expect(lines).toEqual([
        'tbilisi: completed',
        'batumi: failed at harvest: Overpass: all endpoints failed',
      ]);
      expect(stages.process.calls.map((c) => c.city)).toEqual(['tbilisi']);
      expect(stages.enrich.calls).toHaveLength(0);
    });

    it('runs every mapped city of a country', async () => {
      const { cli, stages } = setup();

      await expect(cli('run', '--country', 'Georgia', '--stages', 'load')).resolves.toBe(0);

      expect(stages.load.calls.map((c) => c.city)).toEqual([
        'tbilisi',
        'batumi',
        'kazbegi',
        'mtskheta',
        'sighnaghi',
        'kutaisi',
      ]);
    });

    it('rejects unknown stages and empty city lists', async () => {
      const { cli } = setup();

      await expect(cli('run', 'tbilisi', '--stages', 'harvest,scrape')).resolves.toBe(1);
      await expect(cli('run')).resolves.toBe(1);

      expect(lines).toEqual([
        'Error: Unknown stage "scrape"',
        'Error: run requires at least one city or --country',
      ]);
    });
  });

  it('status prints layer counts and per-city progress', async () => {
    const { cli } = setup();
    await store.writeHarvestMetadata(makeHarvestMetadata());
    await store.writeDestination('tbilisi', makeDestination());

    await expect(cli('status')).resolves.toBe(0);

    expect(lines).toEqual([
      'bronze files: 1  silver files: 0  gold files: 1',
      'tbilisi: harvests=1 latest=20250101_000000 silver=0 gold=0 destination=yes',
    ]);
  });

  it('cities lists a country', async () => {
    const { cli } = setup();

    await expect(cli('cities', '--country', 'Georgia')).resolves.toBe(0);

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('tbilisi\tTbilisi\tGeorgia');
  });

  it('cities marks entries without a bounding box', async () => {
    const { cli } = setup();

    await cli('cities', '--country', 'VN');

    expect(lines).toContain('hanoi\tHanoi\tVietnam\t(no bbox)');
  });

  it('discover prints candidates and saves them when asked', async () => {
    const { cli } = setup();
    const output = path.join(dir, 'discovered.json');

    await expect(cli('discover', 'Georgia', '--min-population', '100000', '--output', output)).resolves.toBe(0);

    expect(lines).toEqual([
      'tbilisi\tTbilisi\tcity\t41.6934,44.8015\t1118035',
      'mtskheta\tMtskheta\theritage\t41.842,44.7207',
      `Saved 2 destinations to ${output}`,
    ]);
    const saved: unknown = JSON.parse(await fs.readFile(output, 'utf-8'));
    expect(saved).toMatchObject([{ key: 'tbilisi', country: 'Georgia' }, { key: 'mtskheta', type: 'heritage' }]);
  });

  it('discover requires a country', async () => {
    const { cli } = setup();

    await expect(cli('discover')).resolves.toBe(1);
    expect(lines).toEqual(['Error: discover requires a country']);
  });

  it('import-csv imports the file and lists bad rows', async () => {
    const { cli } = setup();
    const file = path.join(dir, 'pois.csv');
    await fs.writeFile(file, 'name,lat,lon\nSameba,41.6975,44.8168\n,41.7,44.8\n', 'utf-8');

    await expect(cli('import-csv', 'tbilisi', file)).resolves.toBe(0);

    expect(lines).toEqual(['Imported 1 of 2 rows (1 failed)', '  row 2: Missing name']);
    await expect(store.readManualPois('tbilisi', 'csv')).resolves.toHaveLength(1);
  });

  it('clean deletes the destination', async () => {
    const { cli } = setup();
    await repository.upsertDestination(makeDestination());

    await cli('clean', 'tbilisi');
    await cli('clean', 'tbilisi');

    expect(lines).toEqual(['Deleted tbilisi from the database', 'tbilisi was not in the database']);
  });

  it('serve starts the API', async () => {
    const { cli } = setup();

    await expect(cli('serve')).resolves.toBe(0);
    expect(serve).toHaveBeenCalledTimes(1);
  });
});
