import http from 'http';
import https from 'https';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { createLogger } from '../logger';

const keepAliveHttp = new http.Agent({ keepAlive: true, maxSockets: 4 });
const keepAliveHttps = new https.Agent({ keepAlive: true, maxSockets: 4 });

const logger = createLogger('session');

export const DEFAULT_BASE_URL = 'https://api.hubapi.com';
export const USER_AGENT = 'Deals-Extraction-Service/1.0';

export type QueryParams = Record<string, string | number>;

export interface SessionOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export interface SessionRequest {
  /** Request-scoped credential; falls back to the one set with setToken. */
  accessToken?: string;
  params?: QueryParams;
}

export class AuthenticatedSession {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private token: string | null = null;

  constructor(options: SessionOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
      },
      httpAgent: keepAliveHttp,
      httpsAgent: keepAliveHttps,
      // Status handling belongs to the executor; only transport faults reject here.
      validateStatus: () => true,
    });
    logger.debug({ baseUrl: this.baseUrl, timeoutMs: options.timeoutMs ?? 30000 }, 'Session initialized');
  }

  setToken(token: string): void {
    this.token = token;
    logger.debug('Access token set');
  }

  async get(path: string, request: SessionRequest = {}): Promise<AxiosResponse<unknown>> {
    const token = request.accessToken ?? this.token;
    if (!token) {
      throw new Error('No access token: pass one with the request or call setToken first');
    }
    return this.http.get<unknown>(path, {
      params: request.params,
      headers: { Authorization: `Bearer ${token}` },
    });
  }
}
