#!/usr/bin/env node
/**
 * Tourism data pipeline CLI
 *
 * Usage:
 *   tourism-pipeline harvest Tbilisi --resume --max-tiles 20
 *   tourism-pipeline run --country Georgia
 *   tourism-pipeline status
 */

import pool from './config/database';
import { getCity, listCities } from './config/cities';
import { PriorityTier, STAGE_ORDER, StageName, StageRunResult } from './types';
import { PipelineError, ValidationError, errorMessage } from './utils/errors';
import { PipelineCoordinator } from './stages/coordinator';
import { CsvImportService } from './services/csv-import.service';
import { DEFAULT_MIN_POPULATION, DestinationDiscoveryService } from './services/destination-discovery.service';
import { LayerStore } from './services/layer-store.service';
import { DestinationRepository, PgDestinationRepository } from './repositories/destination.repository';
import logger from './services/logger.service';
import { writeJsonAtomic } from './utils/json-file';

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  flags: Record<string, string | boolean>;
}

export interface CliDeps {
  coordinator: PipelineCoordinator;
  store: LayerStore;
  csvImport: CsvImportService;
  repository: DestinationRepository;
  discovery: DestinationDiscoveryService;
  print: (line: string) => void;
  serve: () => Promise<void>;
}

const BOOLEAN_FLAGS = new Set(['resume', 'dry-run', 'skip-wikidata', 'help']);
const TIERS: PriorityTier[] = ['high', 'medium', 'low'];

export const USAGE = `
Tourism data pipeline

Usage:
  tourism-pipeline <command> [options]

Commands:
  harvest <city> [--resume] [--max-tiles n]     Download OSM tiles (bronze)
  process <city>                                Normalise, dedupe, validate (silver)
  enrich <city> [--limit n] [--tier t] [--workers n]
                                                Enrich POIs with the local model (gold)
  enrich-destination <city> [--skip-wikidata]   Build destination details (gold)
  load <city> [--batch-size n] [--dry-run]      Upload gold data to Postgres
  run <city...> | --country <name> [--stages a,b]
                                                Run the pipeline for several cities
  status                                        Layer file counts and per-city progress
  cities [--country <name>]                     List configured cities
  discover <country> [--min-population n] [--output file]
                                                Find candidate destinations in OSM
  import-csv <city> <file>                      Import POIs from a CSV file
  clean <city>                                  Delete a city's destination from the database
  serve                                         Start the monitoring API
`;

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '-h') {
      flags.help = true;
    } else if (arg.startsWith('--')) {
      const name = arg.slice(2);
      const next = rest[i + 1];
      if (BOOLEAN_FLAGS.has(name) || next === undefined || next.startsWith('--')) {
        flags[name] = true;
      } else {
        flags[name] = next;
        i++;
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

function intFlag(flags: ParsedArgs['flags'], name: string): number | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new ValidationError(`--${name} expects a non-negative integer`);
  }
  return parsed;
}

function stringFlag(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name];
  if (value === true) throw new ValidationError(`--${name} expects a value`);
  return value === false ? undefined : value;
}

function requireCity(args: ParsedArgs): string {
  const [city] = args.positionals;
  if (!city) throw new ValidationError(`${args.command} requires a city`);
  return getCity(city).key;
}

function tierFlag(flags: ParsedArgs['flags']): PriorityTier | undefined {
  const tier = stringFlag(flags, 'tier');
  if (tier === undefined) return undefined;
  const match = TIERS.find((t) => t === tier);
  if (!match) throw new ValidationError(`--tier must be one of ${TIERS.join(', ')}`);
  return match;
}

function stagesFlag(flags: ParsedArgs['flags']): StageName[] | undefined {
  const raw = stringFlag(flags, 'stages');
  if (raw === undefined) return undefined;
  return raw.split(',').map((name) => {
    const stage = STAGE_ORDER.find((s) => s === name.trim());
    if (!stage) throw new ValidationError(`Unknown stage "${name}"`);
    return stage;
  });
}

function printResult(print: CliDeps['print'], result: StageRunResult): void {
  print(`${result.stage} ${result.city}: ${result.status}`);
  for (const [key, value] of Object.entries(result.stats)) {
    print(`  ${key}: ${value}`);
  }
}

function defaultDeps(): CliDeps {
  return {
    coordinator: new PipelineCoordinator(),
    store: new LayerStore(),
    csvImport: new CsvImportService(),
    repository: new PgDestinationRepository(pool),
    discovery: new DestinationDiscoveryService(),
    print: (line) => console.log(line),
    serve: async () => {
      const { startServer } = await import('./index');
      await startServer();
    },
  };
}

/**
 * Dispatch one command. Returns the process exit code.
 */
export async function runCli(argv: string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };
  const args = parseArgs(argv);
  const { flags } = args;
  const { coordinator, print } = deps;

  if (!args.command || args.command === 'help' || args.command === '--help' || flags.help) {
    print(USAGE);
    return args.command ? 0 : 1;
  }

  try {
    switch (args.command) {
      case 'harvest':
        printResult(print, await coordinator.runStage('harvest', requireCity(args), {
          resume: flags.resume === true,
          maxTiles: intFlag(flags, 'max-tiles'),
        }));
        return 0;

      case 'process':
        printResult(print, await coordinator.runStage('process', requireCity(args), {}));
        return 0;

      case 'enrich':
        printResult(print, await coordinator.runStage('enrich', requireCity(args), {
          limit: intFlag(flags, 'limit'),
          tier: tierFlag(flags),
          workers: intFlag(flags, 'workers'),
        }));
        return 0;

      case 'enrich-destination':
        printResult(print, await coordinator.runStage('enrich-destination', requireCity(args), {
          skipWikidata: flags['skip-wikidata'] === true,
        }));
        return 0;

      case 'load':
        printResult(print, await coordinator.runStage('load', requireCity(args), {
          batchSize: intFlag(flags, 'batch-size'),
          dryRun: flags['dry-run'] === true,
        }));
        return 0;

      case 'run': {
        const country = stringFlag(flags, 'country');
        const cities = country
          ? listCities(country).filter((c) => c.bbox !== null).map((c) => c.key)
          : args.positionals.map((name) => getCity(name).key);
        if (cities.length === 0) {
          throw new ValidationError('run requires at least one city or --country');
        }

        const summaries = await coordinator.runAll(cities, {
          stages: stagesFlag(flags),
          enrich: { limit: intFlag(flags, 'limit'), workers: intFlag(flags, 'workers') },
          load: { dryRun: flags['dry-run'] === true },
        });
        for (const summary of summaries) {
          const detail = summary.status === 'failed' ? ` at ${summary.failedStage}: ${summary.error}` : '';
          print(`${summary.city}: ${summary.status}${detail}`);
        }
        return summaries.some((s) => s.status === 'failed') ? 1 : 0;
      }

      case 'status': {
        const status = await deps.store.getStatus();
        print(`bronze files: ${status.bronze}  silver files: ${status.silver}  gold files: ${status.gold}`);
        for (const city of status.cities) {
          print(
            `${city.city}: harvests=${city.harvests} latest=${city.latestHarvest ?? '-'} ` +
              `silver=${city.silverPois} gold=${city.goldPois} destination=${city.hasDestination ? 'yes' : 'no'}`
          );
        }
        return 0;
      }

      case 'cities':
        for (const city of listCities(stringFlag(flags, 'country'))) {
          print(`${city.key}\t${city.name}\t${city.country}${city.bbox ? '' : '\t(no bbox)'}`);
        }
        return 0;

      case 'discover': {
        const country = args.positionals.join(' ');
        if (!country) throw new ValidationError('discover requires a country');
        const destinations = await deps.discovery.discover(
          country,
          intFlag(flags, 'min-population') ?? DEFAULT_MIN_POPULATION
        );
        for (const d of destinations) {
          const population = d.population ? `\t${d.population}` : '';
          print(`${d.key}\t${d.name}\t${d.type}\t${d.lat},${d.lon}${population}`);
        }
        const output = stringFlag(flags, 'output');
        if (output) {
          await writeJsonAtomic(output, destinations);
          print(`Saved ${destinations.length} destinations to ${output}`);
        }
        return 0;
      }

      case 'import-csv': {
        const city = requireCity(args);
        const file = args.positionals[1];
        if (!file) throw new ValidationError('import-csv requires a file path');
        const report = await deps.csvImport.importFile(file, city);
        print(`Imported ${report.imported} of ${report.totalRows} rows (${report.failed} failed)`);
        for (const rowError of report.errors) {
          print(`  row ${rowError.row}: ${rowError.error}`);
        }
        return report.imported > 0 ? 0 : 1;
      }

      case 'clean': {
        const city = requireCity(args);
        const deleted = await deps.repository.deleteDestination(city);
        print(deleted ? `Deleted ${city} from the database` : `${city} was not in the database`);
        return 0;
      }

      case 'serve':
        await deps.serve();
        return 0;

      default:
        print(`Unknown command: ${args.command}`);
        print(USAGE);
        return 1;
    }
  } catch (error) {
    if (error instanceof PipelineError && error.isOperational) {
      logger.error(error.message, { command: args.command });
      print(`Error: ${error.message}`);
    } else {
      logger.logError(error, `cli ${args.command}`);
      print(`Fatal error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

if (require.main === module) {
  const command = process.argv[2];
  runCli(process.argv.slice(2))
    .then(async (code) => {
      if (command !== 'serve') await pool.end();
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
