import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import { createLogger } from '../logger';
import { RATE_LIMIT_HEADERS } from './types';
import type { Sleep, UsageSnapshot } from './types';

const logger = createLogger('rate-limiter');

export const RETRY_INTERVAL_HEADER = 'X-HubSpot-RateLimit-Interval-Milliseconds';
export const DEFAULT_RETRY_INTERVAL_MS = 10000;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

type ResponseHeaders = AxiosResponse['headers'];

export function readHeader(headers: ResponseHeaders, name: string): string | undefined {
  const value: unknown = headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export function retryIntervalFromHeaders(headers: ResponseHeaders): number {
  const raw = readHeader(headers, RETRY_INTERVAL_HEADER);
  if (raw === undefined) return DEFAULT_RETRY_INTERVAL_MS;
  const ms = Number.parseInt(raw, 10);
  return Number.isNaN(ms) || ms < 0 ? DEFAULT_RETRY_INTERVAL_MS : ms;
}

export function extractUsage(headers: ResponseHeaders, now: Date = new Date()): UsageSnapshot | null {
  const usage: UsageSnapshot['headers'] = {};
  let found = false;
  for (const name of RATE_LIMIT_HEADERS) {
    const value = readHeader(headers, name);
    if (value !== undefined) {
      usage[name] = value;
      found = true;
    }
  }
  return found ? { headers: usage, capturedAt: now.toISOString() } : null;
}

export class RateLimiter {
  constructor(private readonly wait: Sleep = sleep) {}

  /**
   * Sends once; on 429 waits the interval the remote asked for and sends exactly once more.
   * Whatever the second attempt returns goes back to the caller, 429 included.
   */
  async send<T>(operation: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    const response = await request();
    if (response.status !== 429) return response;

    const waitMs = retryIntervalFromHeaders(response.headers);
    logger.warn({ operation, waitMs, status_code: 429 }, 'Rate limit hit (429), waiting before single retry');
    await this.wait(waitMs);
    return request();
  }
}
