import { v4 as uuidv4 } from 'uuid';
import { cityKey, getCity } from '../config/cities';
import { StageName, StageStats } from '../types';
import { ConflictError, NotFoundError, errorMessage } from '../utils/errors';
import { PipelineCoordinator, PipelineRunOptions } from '../stages/coordinator';
import logger from './logger.service';

export type JobTarget = StageName | 'all';
export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface PipelineJob {
  id: string;
  target: JobTarget;
  city: string;
  status: JobStatus;
  stats: StageStats;
  error?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export const DEFAULT_MAX_FINISHED_JOBS = 100;

export interface PipelineJobServiceOptions {
  /** Finished jobs kept for the API; older ones are dropped first. */
  maxFinishedJobs?: number;
}

/**
 * Background stage runs started from the monitoring API. Jobs live in memory
 * only; the durable record of every run is runs.jsonl.
 */
export class PipelineJobService {
  private jobs = new Map<string, PipelineJob>();
  private activeJobs = new Map<string, Promise<void>>();
  private maxFinishedJobs: number;

  constructor(private coordinator: PipelineCoordinator, options: PipelineJobServiceOptions = {}) {
    this.maxFinishedJobs = options.maxFinishedJobs ?? DEFAULT_MAX_FINISHED_JOBS;
  }

  startJob(target: JobTarget, cityName: string, options: PipelineRunOptions = {}): PipelineJob {
    const city = getCity(cityName).key;
    const running = [...this.jobs.values()].find(
      (job) => job.city === city && (job.status === 'pending' || job.status === 'running')
    );
    if (running) {
      throw new ConflictError(`Job ${running.id} (${running.target}) is already running for ${city}`);
    }

    const job: PipelineJob = {
      id: uuidv4(),
      target,
      city,
      status: 'pending',
      stats: {},
      createdAt: new Date().toISOString(),
    };
    this.jobs.set(job.id, job);

    const jobPromise = this.execute(job, options).catch((error: unknown) => {
      logger.error(`Job ${job.id} crashed`, { error: errorMessage(error) });
    });
    this.activeJobs.set(job.id, jobPromise);
    jobPromise.finally(() => {
      this.activeJobs.delete(job.id);
    }).catch((error: unknown) => {
      logger.error(`Job ${job.id} cleanup failed`, { error: errorMessage(error) });
    });

    logger.info(`Started job ${job.id}: ${target} for ${city}`);
    return { ...job };
  }

  private async execute(job: PipelineJob, options: PipelineRunOptions): Promise<void> {
    job.status = 'running';
    job.startedAt = new Date().toISOString();

    try {
      if (job.target === 'all') {
        const summary = await this.coordinator.runCity(job.city, options);
        job.stats = { stagesCompleted: summary.results.length };
        if (summary.status === 'failed') {
          throw new Error(`${summary.failedStage} failed: ${summary.error}`);
        }
      } else {
        const stages: StageName[] = [job.target];
        const summary = await this.coordinator.runCity(job.city, { ...options, stages });
        if (summary.status === 'failed') {
          throw new Error(summary.error ?? `${job.target} failed`);
        }
        job.stats = summary.results[0]?.stats ?? {};
      }
      job.status = 'completed';
    } catch (error) {
      job.status = 'failed';
      job.error = errorMessage(error);
    } finally {
      job.completedAt = new Date().toISOString();
      this.evictFinished();
    }
  }

  // Map iteration follows insertion order, so the oldest jobs come first
  private evictFinished(): void {
    const finished = [...this.jobs.values()].filter((job) => job.status === 'completed' || job.status === 'failed');
    for (const job of finished.slice(0, Math.max(0, finished.length - this.maxFinishedJobs))) {
      this.jobs.delete(job.id);
    }
  }

  getJob(jobId: string): PipelineJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId}`);
    return { ...job };
  }

  listJobs(city?: string): PipelineJob[] {
    const key = city ? cityKey(city) : undefined;
    return [...this.jobs.values()]
      .filter((job) => !key || job.city === key)
      .map((job) => ({ ...job }))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /**
   * Resolves once the job has finished. Used by shutdown and tests.
   */
  async waitFor(jobId: string): Promise<PipelineJob> {
    await this.activeJobs.get(jobId);
    return this.getJob(jobId);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.activeJobs.values()]);
  }
}
