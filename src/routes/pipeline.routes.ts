import { NextFunction, Request, Response, Router } from 'express';
import { matchedData } from 'express-validator';
import { PriorityTier } from '../types';
import { PipelineRunOptions } from '../stages/coordinator';
import { JobTarget, PipelineJobService } from '../services/pipeline-job.service';
import { LayerStore } from '../services/layer-store.service';
import logger from '../services/logger.service';
import { JOB_TARGETS, handleValidation, idValidation, pipelineValidation } from '../utils/validation';

export interface PipelineRouterDeps {
  jobs: PipelineJobService;
  store: LayerStore;
}

const optionalInt = (value: unknown): number | undefined => (typeof value === 'number' ? value : undefined);
const optionalBool = (value: unknown): boolean | undefined => (typeof value === 'boolean' ? value : undefined);

function optionalTier(value: unknown): PriorityTier | undefined {
  if (value === 'high' || value === 'medium' || value === 'low') return value;
  return undefined;
}

const jobTarget = (value: unknown): JobTarget | undefined => JOB_TARGETS.find((t) => t === value);

/**
 * Stage options from a validated request body.
 */
export function runOptionsFromBody(data: Record<string, unknown>): PipelineRunOptions {
  return {
    harvest: { resume: optionalBool(data.resume), maxTiles: optionalInt(data.maxTiles) },
    enrich: {
      limit: optionalInt(data.limit),
      workers: optionalInt(data.workers),
      tier: optionalTier(data.tier),
    },
    'enrich-destination': { skipWikidata: optionalBool(data.skipWikidata) },
    load: { batchSize: optionalInt(data.batchSize), dryRun: optionalBool(data.dryRun) },
  };
}

export function createPipelineRouter({ jobs, store }: PipelineRouterDeps): Router {
  const router = Router();

  router.get('/status', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [layers, recentRuns] = await Promise.all([store.getStatus(), store.readRuns(20)]);
      return res.json({
        success: true,
        data: { layers, recentRuns, jobs: jobs.listJobs() },
      });
    } catch (error) {
      return next(error);
    }
  });

  router.get('/logs', pipelineValidation.logs, handleValidation, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lines } = matchedData(req);
      const logLines = await logger.tailLog(typeof lines === 'number' ? lines : 20);
      return res.json({ success: true, data: { lines: logLines } });
    } catch (error) {
      return next(error);
    }
  });

  router.get('/jobs', (req: Request, res: Response) => {
    const city = typeof req.query.city === 'string' ? req.query.city : undefined;
    return res.json({ success: true, data: jobs.listJobs(city) });
  });

  router.get('/jobs/:jobId', idValidation('jobId'), handleValidation, (req: Request, res: Response, next: NextFunction) => {
    try {
      return res.json({ success: true, data: jobs.getJob(req.params.jobId) });
    } catch (error) {
      return next(error);
    }
  });

  router.post('/:stage/:city', pipelineValidation.trigger, handleValidation, (req: Request, res: Response, next: NextFunction) => {
    try {
      const data = matchedData(req);
      const target = jobTarget(data.stage);
      if (!target) {
        return res.status(400).json({ success: false, error: 'Invalid stage' });
      }
      const job = jobs.startJob(target, req.params.city, runOptionsFromBody(data));
      return res.status(202).json({ success: true, data: job });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}

export default createPipelineRouter;
