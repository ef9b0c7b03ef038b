export class PipelineError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends PipelineError {
  constructor(resource: string) {
    super(`${resource} not found`, 404);
  }
}

export class ConflictError extends PipelineError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * A third-party API (Overpass, Ollama, Wikidata) kept failing after retries.
 */
export class UpstreamError extends PipelineError {
  service: string;

  constructor(service: string, message: string) {
    super(`${service}: ${message}`, 502);
    this.service = service;
  }
}

export class DatabaseError extends PipelineError {
  constructor(message: string = 'Database operation failed') {
    super(message, 500, false);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
