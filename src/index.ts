import { promises as fs } from 'fs';
import { createServer, Server } from 'http';
import { join, resolve } from 'path';
import config from './config';
import pool from './config/database';
import { createApp } from './app';
import { PipelineCoordinator, StageFailedEvent } from './stages/coordinator';
import { CsvImportService } from './services/csv-import.service';
import { LayerStore } from './services/layer-store.service';
import { PipelineJobService } from './services/pipeline-job.service';
import logger from './services/logger.service';
import { errorMessage } from './utils/errors';
import { withRetry } from './utils/retry';
import GracefulShutdown from './utils/graceful-shutdown';

// Apply database/migrations/*.sql when RUN_MIGRATIONS=true
async function runMigrations(): Promise<void> {
  if (process.env.RUN_MIGRATIONS !== 'true') {
    logger.info('Migrations disabled (RUN_MIGRATIONS != true)');
    return;
  }

  await withRetry(() => pool.query('SELECT 1'), {
    retries: 10,
    baseDelayMs: 2000,
    maxDelayMs: 2000,
    onRetry: (_error, attempt) => logger.info(`Waiting for database... (${attempt}/10)`),
  });

  const migrationsDir = resolve(process.env.MIGRATIONS_DIR || 'database/migrations');
  const files = (await fs.readdir(migrationsDir)).filter((f) => f.endsWith('.sql')).sort();

  for (const file of files) {
    const sql = await fs.readFile(join(migrationsDir, file), 'utf-8');
    await pool.query(sql);
    logger.info(`Applied migration: ${file}`);
  }
}

export async function startServer(): Promise<Server> {
  await runMigrations();

  const store = new LayerStore();
  const coordinator = new PipelineCoordinator();
  const jobs = new PipelineJobService(coordinator);
  const app = createApp({ jobs, store, csvImport: new CsvImportService(store) });

  coordinator.on('stage.failed', (event: StageFailedEvent) => {
    logger.warn(`Stage ${event.stage} failed for ${event.city}`, { error: event.error });
  });

  const server = createServer(app);
  new GracefulShutdown(server, jobs);

  await new Promise<void>((resolve) => {
    server.listen(config.port, () => resolve());
  });
  logger.info(`Monitoring API listening on http://localhost:${config.port}`, {
    environment: config.env,
    dataDir: config.dataDir,
  });
  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
}
