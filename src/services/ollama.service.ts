import axios, { AxiosInstance } from 'axios';
import config from '../config';
import { UpstreamError, errorMessage } from '../utils/errors';
import { RetryOptions, isRetryableHttpError, withRetry } from '../utils/retry';
import logger from './logger.service';

interface OllamaGenerateResponse {
  model: string;
  created_at?: string;
  response: string;
  done: boolean;
  total_duration?: number;
  eval_count?: number;
}

interface OllamaTagsResponse {
  models: Array<{ name: string }>;
}

export type JsonObject = Record<string, unknown>;

export interface OllamaServiceOptions {
  baseUrl?: string;
  model?: string;
  client?: AxiosInstance;
  retry?: RetryOptions;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the JSON object out of a model reply. Models sometimes wrap it in
 * prose or a ```json fence, so take the span from the first `{` to the last `}`.
 */
export function extractJson(text: string): JsonObject {
  const cleaned = text.replace(/```(?:json)?/gi, '');
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON object found in model response');
  }
  const parsed: unknown = JSON.parse(cleaned.slice(start, end + 1));
  if (!isJsonObject(parsed)) {
    throw new Error('Model response is not a JSON object');
  }
  return parsed;
}

/**
 * Client for a local Ollama server (`/api/generate`).
 */
export class OllamaService {
  private client: AxiosInstance;
  private retry: RetryOptions;
  readonly model: string;

  constructor(options: OllamaServiceOptions = {}) {
    this.model = options.model ?? config.ollama.model;
    this.retry = options.retry ?? {
      retries: 1,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      shouldRetry: isRetryableHttpError,
    };
    this.client = options.client ?? axios.create({
      baseURL: options.baseUrl ?? config.ollama.baseUrl,
      headers: { 'Content-Type': 'application/json' },
      timeout: config.ollama.timeoutMs,
    });
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.client.get<OllamaTagsResponse>('/api/tags', { timeout: 5000 });
      return Array.isArray(response.data.models);
    } catch {
      return false;
    }
  }

  async generate(prompt: string, options: { json?: boolean; temperature?: number } = {}): Promise<string> {
    try {
      const response = await withRetry(
        () =>
          this.client.post<OllamaGenerateResponse>('/api/generate', {
            model: this.model,
            prompt,
            stream: false,
            ...(options.json ? { format: 'json' } : {}),
            options: { temperature: options.temperature ?? config.ollama.temperature },
          }),
        {
          ...this.retry,
          onRetry: (error, attempt) => {
            logger.warn('Ollama request failed, retrying', { attempt, error: errorMessage(error) });
          },
        }
      );

      if (typeof response.data.response !== 'string') {
        throw new Error('missing "response" field');
      }
      return response.data.response;
    } catch (error) {
      throw new UpstreamError('Ollama', errorMessage(error));
    }
  }

  async generateJson(prompt: string, temperature?: number): Promise<JsonObject> {
    const text = await this.generate(prompt, { json: true, temperature });
    try {
      return extractJson(text);
    } catch (error) {
      throw new UpstreamError('Ollama', `unparseable JSON from ${this.model}: ${errorMessage(error)}`);
    }
  }
}
