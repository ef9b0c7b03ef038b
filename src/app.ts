import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import multer from 'multer';
import path from 'path';

import config from './config';
import createCitiesRouter from './routes/cities.routes';
import createPipelineRouter from './routes/pipeline.routes';
import { CsvImportService } from './services/csv-import.service';
import { LayerStore } from './services/layer-store.service';
import { PipelineJobService } from './services/pipeline-job.service';
import logger from './services/logger.service';
import { PipelineError } from './utils/errors';

export interface AppDeps {
  jobs: PipelineJobService;
  store: LayerStore;
  csvImport: CsvImportService;
  uploadDir?: string;
}

export function createApp(deps: AppDeps): Application {
  const app: Application = express();
  const uploadDir = deps.uploadDir ?? path.join(config.dataDir, 'uploads');

  app.use(helmet());
  app.use(cors(config.cors));
  app.use(compression());
  app.use(morgan(config.isDevelopment ? 'dev' : 'combined', { stream: logger.stream }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.env,
      uptime: Math.round(process.uptime()),
    });
  });

  app.use('/api/pipeline', createPipelineRouter({ jobs: deps.jobs, store: deps.store }));
  app.use('/api/cities', createCitiesRouter({ csvImport: deps.csvImport, store: deps.store, uploadDir }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Route not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof PipelineError && err.isOperational) {
      res.status(err.statusCode).json({ success: false, error: err.message });
      return;
    }
    if (err instanceof multer.MulterError) {
      res.status(400).json({ success: false, error: err.message });
      return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, error: 'Malformed JSON body' });
      return;
    }

    logger.logError(err, 'api');
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      message: config.isDevelopment ? err.message : undefined,
    });
  });

  return app;
}

export default createApp;
