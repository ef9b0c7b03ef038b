import { v4 as uuidv4 } from 'uuid';
import { getCity } from '../config/cities';
import { CityConfig, StageName, StageRunResult, StageStats } from '../types';
import { ConflictError, errorMessage } from '../utils/errors';
import { LayerStore, layerStore } from '../services/layer-store.service';
import logger, { LogMeta } from '../services/logger.service';

/**
 * Lifecycle shared by every pipeline stage:
 * resolve city -> validate -> execute -> record the run in runs.jsonl.
 *
 * Stages hand over only through the layer files, so a stage can be run on
 * its own as long as its input layer exists.
 */
export abstract class BaseStage<TOptions extends object> {
  abstract readonly name: StageName;
  protected store: LayerStore;
  private running = new Set<string>();

  constructor(store: LayerStore = layerStore) {
    this.store = store;
  }

  /**
   * Stage body. Returns the stats recorded with the run.
   */
  protected abstract execute(city: CityConfig, options: TOptions): Promise<StageStats>;

  /**
   * Preconditions that do not need the stage's input layer. Throw to abort.
   */
  protected async validate(_city: CityConfig, _options: TOptions): Promise<void> {
    return;
  }

  protected log(level: 'info' | 'warn' | 'error' | 'debug', message: string, meta: LogMeta = {}): void {
    logger[level](message, { stage: this.name, ...meta });
  }

  isRunning(city: string): boolean {
    return this.running.has(city);
  }

  async run(cityName: string, options: TOptions): Promise<StageRunResult> {
    const city = getCity(cityName);
    if (this.running.has(city.key)) {
      throw new ConflictError(`Stage ${this.name} is already running for ${city.key}`);
    }

    this.running.add(city.key);
    try {
      await this.validate(city, options);
    } catch (error) {
      this.running.delete(city.key);
      throw error;
    }

    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    this.log('info', `Stage started for ${city.name}`, { city: city.key, runId });

    try {
      const stats = await this.execute(city, options);
      const result: StageRunResult = {
        runId,
        stage: this.name,
        city: city.key,
        status: 'completed',
        stats,
        startedAt,
        completedAt: new Date().toISOString(),
      };
      await this.store.recordRun(result);
      this.log('info', `Stage completed for ${city.name}`, { city: city.key, runId, ...stats });
      return result;
    } catch (error) {
      const result: StageRunResult = {
        runId,
        stage: this.name,
        city: city.key,
        status: 'failed',
        stats: {},
        startedAt,
        completedAt: new Date().toISOString(),
        error: errorMessage(error),
      };
      await this.store.recordRun(result);
      this.log('error', `Stage failed for ${city.name}: ${errorMessage(error)}`, { city: city.key, runId });
      throw error;
    } finally {
      this.running.delete(city.key);
    }
  }
}
