import { Server } from 'http';
import { Socket } from 'net';
import pool from '../config/database';
import { PipelineJobService } from '../services/pipeline-job.service';
import logger from '../services/logger.service';
import { errorMessage } from './errors';

const JOB_DRAIN_TIMEOUT_MS = 10000;

export class GracefulShutdown {
  private server: Server;
  private jobs: PipelineJobService;
  private isShuttingDown = false;
  private connections = new Set<Socket>();

  constructor(server: Server, jobs: PipelineJobService) {
    this.server = server;
    this.jobs = jobs;
    this.setupHandlers();
    this.trackConnections();
  }

  private setupHandlers(): void {
    process.on('SIGTERM', () => this.handle('SIGTERM'));
    process.on('SIGINT', () => this.handle('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.logError(error, 'uncaughtException');
      this.handle('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
      this.handle('UNHANDLED_REJECTION');
    });
  }

  private trackConnections(): void {
    this.server.on('connection', (connection: Socket) => {
      this.connections.add(connection);
      connection.on('close', () => {
        this.connections.delete(connection);
      });
    });
  }

  private handle(signal: string): void {
    this.shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during graceful shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  }

  private async shutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Graceful shutdown initiated by ${signal}`);

    this.server.close(() => {
      logger.info('HTTP server closed');
    });
    this.connections.forEach((connection) => connection.end());

    const forceClose = setTimeout(() => {
      this.connections.forEach((connection) => connection.destroy());
    }, JOB_DRAIN_TIMEOUT_MS);
    forceClose.unref();

    // Stage runs checkpoint to disk, so an interrupted job can be resumed later
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), JOB_DRAIN_TIMEOUT_MS);
    });
    const outcome = await Promise.race([this.jobs.drain().then(() => 'drained' as const), timeout]);
    clearTimeout(timer);
    if (outcome === 'timeout') {
      logger.warn('Running jobs did not finish before shutdown');
    }

    await pool.end();
    logger.info('Database connections closed');
    logger.info('Graceful shutdown completed');
  }
}

export default GracefulShutdown;
