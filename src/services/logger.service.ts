import winston from 'winston';
import fs from 'fs';
import path from 'path';
import config from '../config';
import { isFileNotFound } from '../utils/json-file';

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
};

export type LogMeta = Record<string, unknown>;

const MAX_LOG_SIZE = 5242880; // 5MB

/**
 * Rotating file transports. `tailable` keeps the newest lines in the base
 * file name, which is the file `tailLog` reads.
 */
export function fileTransportOptions(logDir: string): winston.transports.FileTransportOptions[] {
  return [
    {
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    },
    {
      filename: path.join(logDir, 'pipeline.log'),
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    },
  ];
}

/**
 * Last `lines` non-empty lines of a file, oldest first. A missing file has none.
 */
export async function tailFile(file: string, lines: number): Promise<string[]> {
  try {
    const content = await fs.promises.readFile(file, 'utf-8');
    return content.split('\n').filter((line) => line.trim().length > 0).slice(-lines);
  } catch (error) {
    if (isFileNotFound(error)) {
      return [];
    }
    throw error;
  }
}

class LoggerService {
  private logger: winston.Logger;
  private static instance: LoggerService;
  readonly logFile: string;

  private constructor() {
    this.logFile = path.join(config.logDir, 'pipeline.log');

    const transports: winston.transport[] = [
      new winston.transports.Console({
        silent: config.isTest,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    if (!config.isTest) {
      fs.mkdirSync(config.logDir, { recursive: true });
      for (const options of fileTransportOptions(config.logDir)) {
        transports.push(new winston.transports.File(options));
      }
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || (config.isDevelopment ? 'debug' : 'info'),
      levels: logLevels,
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      transports,
      exitOnError: false
    });
  }

  static getInstance(): LoggerService {
    if (!LoggerService.instance) {
      LoggerService.instance = new LoggerService();
    }
    return LoggerService.instance;
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  http(message: string, meta?: LogMeta): void {
    this.logger.http(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  // Log error with stack trace
  logError(error: unknown, context?: string): void {
    if (error instanceof Error) {
      this.error(error.message, { stack: error.stack, context });
    } else {
      this.error(String(error), { context });
    }
  }

  /**
   * Last `lines` lines of the pipeline log, oldest first.
   */
  async tailLog(lines: number = 20): Promise<string[]> {
    return tailFile(this.logFile, lines);
  }

  // Stream for Morgan HTTP logger
  stream = {
    write: (message: string) => {
      this.http(message.trim());
    }
  };
}

export const logger = LoggerService.getInstance();
export default logger;
