import { EventEmitter } from 'events';
import { StageName, StageRunResult, STAGE_ORDER } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../services/logger.service';
import { BaseStage } from './base.stage';
import { DestinationEnricherStage, DestinationOptions } from './destination-enricher.stage';
import { EnricherStage, EnrichOptions } from './enricher.stage';
import { HarvestOptions, HarvesterStage } from './harvester.stage';
import { LoaderStage, LoadOptions } from './loader.stage';
import { ProcessOptions, ProcessorStage } from './processor.stage';

export interface StageOptionsMap {
  harvest: HarvestOptions;
  process: ProcessOptions;
  enrich: EnrichOptions;
  'enrich-destination': DestinationOptions;
  load: LoadOptions;
}

export type PipelineStages = { [K in StageName]: BaseStage<StageOptionsMap[K]> };

export type PipelineEventType =
  | 'bronze.completed'
  | 'silver.completed'
  | 'gold.completed'
  | 'load.completed'
  | 'stage.failed';

export interface StageFailedEvent {
  stage: StageName;
  city: string;
  error: string;
}

export interface PipelineRunOptions extends Partial<StageOptionsMap> {
  /** Subset of stages to run, always executed in pipeline order. */
  stages?: StageName[];
}

export interface CityRunSummary {
  city: string;
  status: 'completed' | 'failed';
  results: StageRunResult[];
  failedStage?: StageName;
  error?: string;
}

const COMPLETION_EVENTS: Record<StageName, PipelineEventType> = {
  harvest: 'bronze.completed',
  process: 'silver.completed',
  enrich: 'gold.completed',
  'enrich-destination': 'gold.completed',
  load: 'load.completed',
};

export function createDefaultStages(): PipelineStages {
  return {
    harvest: new HarvesterStage(),
    process: new ProcessorStage(),
    enrich: new EnricherStage(),
    'enrich-destination': new DestinationEnricherStage(),
    load: new LoaderStage(),
  };
}

/**
 * Pipeline Coordinator - runs stages in order and announces layer changes.
 *
 * Events: bronze.completed, silver.completed, gold.completed (POIs and
 * destination), load.completed with the StageRunResult; stage.failed with a
 * StageFailedEvent.
 */
export class PipelineCoordinator extends EventEmitter {
  private stages: PipelineStages;

  constructor(stages: PipelineStages = createDefaultStages()) {
    super();
    this.stages = stages;
  }

  async runStage<K extends StageName>(stage: K, city: string, options: StageOptionsMap[K]): Promise<StageRunResult> {
    try {
      const result = await this.stages[stage].run(city, options);
      this.emit(COMPLETION_EVENTS[stage], result);
      return result;
    } catch (error) {
      const event: StageFailedEvent = { stage, city, error: errorMessage(error) };
      this.emit('stage.failed', event);
      throw error;
    }
  }

  /**
   * Run the requested stages for one city. A failed stage stops the city,
   * since every later stage reads its output.
   */
  async runCity(city: string, options: PipelineRunOptions = {}): Promise<CityRunSummary> {
    const wanted = options.stages ?? STAGE_ORDER;
    const opts: StageOptionsMap = {
      harvest: options.harvest ?? {},
      process: options.process ?? {},
      enrich: options.enrich ?? {},
      'enrich-destination': options['enrich-destination'] ?? {},
      load: options.load ?? {},
    };

    const results: StageRunResult[] = [];
    for (const stage of STAGE_ORDER.filter((s) => wanted.includes(s))) {
      try {
        results.push(await this.runStage(stage, city, opts[stage]));
      } catch (error) {
        logger.error(`Pipeline stopped for ${city} at ${stage}`, { error: errorMessage(error) });
        return { city, status: 'failed', results, failedStage: stage, error: errorMessage(error) };
      }
    }
    return { city, status: 'completed', results };
  }

  /**
   * Run every city in turn; a failing city is reported and the next one starts.
   */
  async runAll(cities: string[], options: PipelineRunOptions = {}): Promise<CityRunSummary[]> {
    const summaries: CityRunSummary[] = [];
    for (const city of cities) {
      logger.info(`Processing ${city}`);
      summaries.push(await this.runCity(city, options));
    }

    const failed = summaries.filter((s) => s.status === 'failed').length;
    logger.info(`Pipeline run complete: ${summaries.length - failed} succeeded, ${failed} failed`);
    return summaries;
  }
}
