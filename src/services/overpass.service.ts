import axios, { AxiosInstance } from 'axios';
import config from '../config';
import { BoundingBox, OverpassResponse } from '../types';
import { UpstreamError, errorMessage } from '../utils/errors';
import { RetryOptions, isRetryableHttpError, withRetry } from '../utils/retry';
import logger from './logger.service';

export interface OverpassServiceOptions {
  endpoints?: string[];
  client?: AxiosInstance;
  retry?: RetryOptions;
  queryTimeoutSec?: number;
}

/**
 * Overpass bbox filter order is (south, west, north, east).
 */
export function formatBbox(bbox: BoundingBox): string {
  return `${bbox.south},${bbox.west},${bbox.north},${bbox.east}`;
}

/**
 * Tourism-relevant features inside one tile. `out center` gives ways and
 * relations a representative point.
 */
export function buildTileQuery(bbox: BoundingBox, timeoutSec: number = config.overpass.queryTimeoutSec): string {
  const b = formatBbox(bbox);
  const filters = [
    '["tourism"]',
    '["historic"]',
    '["amenity"~"^(restaurant|cafe|bar|pub|marketplace|place_of_worship)$"]',
    '["natural"~"^(beach|waterfall|peak)$"]',
    '["leisure"~"^(park|garden|nature_reserve)$"]',
  ];

  const statements = filters
    .flatMap((f) => [`  node${f}(${b});`, `  way${f}(${b});`, `  relation${f}(${b});`])
    .join('\n');

  return `[out:json][timeout:${timeoutSec}];
(
${statements}
);
out center tags;`;
}

// Overpass answers 200 with a remark when a query dies mid-run; the elements are then partial
const FAILED_QUERY_REMARK = /runtime error|timed out|out of memory/i;

export function isFailedQueryRemark(remark: string | undefined): boolean {
  return remark !== undefined && FAILED_QUERY_REMARK.test(remark);
}

export class OverpassService {
  private client: AxiosInstance;
  private endpoints: string[];
  private retry: RetryOptions;
  readonly queryTimeoutSec: number;

  constructor(options: OverpassServiceOptions = {}) {
    this.endpoints = options.endpoints ?? config.overpass.endpoints;
    this.queryTimeoutSec = options.queryTimeoutSec ?? config.overpass.queryTimeoutSec;
    this.retry = options.retry ?? { ...config.retry, shouldRetry: isRetryableHttpError };
    this.client = options.client ?? axios.create({
      timeout: config.overpass.timeoutMs,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded;charset=UTF-8',
        Accept: 'application/json',
        'User-Agent': config.overpass.userAgent,
      },
    });

    if (this.endpoints.length === 0) {
      throw new Error('At least one Overpass endpoint must be configured');
    }
  }

  /**
   * Run a query, retrying each endpoint with backoff before failing over to the next.
   */
  async query(query: string): Promise<OverpassResponse> {
    let lastError: unknown = null;

    for (const endpoint of this.endpoints) {
      try {
        const data = await withRetry(async () => {
          const response = await this.client.post<OverpassResponse>(
            endpoint,
            new URLSearchParams({ data: query }).toString()
          );
          return response.data;
        }, {
          ...this.retry,
          onRetry: (error, attempt, wait) => {
            logger.warn('Overpass request failed, backing off', {
              endpoint,
              attempt,
              waitMs: wait,
              error: errorMessage(error),
            });
          },
        });

        if (!data || !Array.isArray(data.elements)) {
          throw new UpstreamError('Overpass', `malformed response from ${endpoint}`);
        }
        if (isFailedQueryRemark(data.remark)) {
          throw new UpstreamError('Overpass', `query failed on ${endpoint}: ${data.remark}`);
        }
        if (data.remark && data.elements.length === 0) {
          logger.warn('Overpass returned a remark', { endpoint, remark: data.remark });
        }
        return data;
      } catch (error) {
        lastError = error;
        logger.warn('Overpass endpoint failed, trying next', { endpoint, error: errorMessage(error) });
      }
    }

    throw new UpstreamError('Overpass', `all endpoints failed (${errorMessage(lastError)})`);
  }

  async fetchTile(bbox: BoundingBox): Promise<OverpassResponse> {
    return this.query(buildTileQuery(bbox, this.queryTimeoutSec));
  }
}
