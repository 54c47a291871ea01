import axios from 'axios';
import type { AxiosResponse } from 'axios';
import { createLogger, logApiCall } from '../logger';
import { RequestFailedError } from './errors';
import { RateLimiter } from './rateLimiter';
import type { AuthenticatedSession, QueryParams } from './session';

const logger = createLogger('executor');

export interface ExecuteOptions {
  accessToken: string;
  params?: QueryParams;
  /** Non-2xx statuses handed back to the caller instead of failing. */
  acceptStatuses?: readonly number[];
}

export interface ExecutedResponse {
  status: number;
  headers: AxiosResponse['headers'];
  data: unknown;
  durationMs: number;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class RequestExecutor {
  constructor(
    private readonly session: AuthenticatedSession,
    private readonly rateLimiter: RateLimiter
  ) {}

  async get(operation: string, path: string, options: ExecuteOptions): Promise<ExecutedResponse> {
    const startedAt = Date.now();
    let response: AxiosResponse<unknown>;

    try {
      response = await this.rateLimiter.send(operation, () =>
        this.session.get(path, { accessToken: options.accessToken, params: options.params })
      );
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const statusCode = axios.isAxiosError(err) ? err.response?.status ?? null : null;
      const reason = err instanceof Error ? err.message : String(err);
      logger.error({ operation, err, status_code: statusCode, duration_ms: durationMs }, 'Request failed');
      logApiCall(logger, operation, { method: 'GET', statusCode, durationMs });
      throw new RequestFailedError(`GET ${path} failed: ${reason}`, {
        operation,
        statusCode,
        durationMs,
        cause: err,
      });
    }

    const durationMs = Date.now() - startedAt;
    logApiCall(logger, operation, { method: 'GET', statusCode: response.status, durationMs });

    if (isSuccess(response.status) || options.acceptStatuses?.includes(response.status)) {
      return { status: response.status, headers: response.headers, data: response.data, durationMs };
    }

    logger.error({ operation, status_code: response.status, duration_ms: durationMs }, 'Unexpected response status');
    throw new RequestFailedError(`GET ${path} failed with status ${response.status}`, {
      operation,
      statusCode: response.status,
      durationMs,
    });
  }
}
