import type { z } from 'zod';
import { createLogger } from '../logger';
import { RequestFailedError } from './errors';
import { RequestExecutor } from './executor';
import type { ExecutedResponse } from './executor';
import { RateLimiter, sleep } from './rateLimiter';
import { AuthenticatedSession } from './session';
import type { QueryParams } from './session';
import { DealPropertiesResponseSchema, DealSchema, DealsPageSchema } from './types';
import type { ApiClientConfig, Deal, DealProperty, GetDealOptions, GetDealsParams, PageResult, Sleep } from './types';

const logger = createLogger('deals-client');

export const MAX_PAGE_SIZE = 100;

export const DEFAULT_DEAL_PROPERTIES: readonly string[] = [
  'dealname',
  'amount',
  'dealstage',
  'pipeline',
  'closedate',
  'createdate',
  'hs_lastmodifieddate',
];

export const PATHS = {
  dealProperties: '/crm/v3/properties/deals',
  deals: '/crm/v3/objects/deals',
  accountInfo: '/integrations/v1/me',
} as const;

function parseBody<S extends z.ZodTypeAny>(
  operation: string,
  path: string,
  schema: S,
  response: ExecutedResponse
): z.output<S> {
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw new RequestFailedError(`GET ${path} returned an unexpected body: ${parsed.error.message}`, {
      operation,
      statusCode: response.status,
      durationMs: response.durationMs,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function joinIfAny(values: readonly string[] | undefined): string | undefined {
  return values && values.length > 0 ? values.join(',') : undefined;
}

// Whole number in 1..MAX_PAGE_SIZE; anything non-finite falls back to the maximum
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return MAX_PAGE_SIZE;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE);
}

export class DealsApiClient {
  readonly session: AuthenticatedSession;
  readonly executor: RequestExecutor;
  private readonly testDelayMs: number;
  private readonly wait: Sleep;

  constructor(config: ApiClientConfig = {}) {
    this.wait = config.sleep ?? sleep;
    this.testDelayMs = config.testDelayMs ?? 0;
    this.session = new AuthenticatedSession({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });
    this.executor = new RequestExecutor(this.session, new RateLimiter(this.wait));
  }

  async getDealProperties(accessToken: string): Promise<DealProperty[]> {
    const operation = 'get_deal_properties';
    logger.info({ operation }, 'Fetching deal properties');

    const response = await this.executor.get(operation, PATHS.dealProperties, { accessToken });
    const body = parseBody(operation, PATHS.dealProperties, DealPropertiesResponseSchema, response);

    logger.info(
      { operation, property_count: body.results.length, duration_ms: response.durationMs },
      `Retrieved ${body.results.length} deal properties`
    );
    return body.results;
  }

  async getDeals(accessToken: string, request: GetDealsParams = {}): Promise<PageResult> {
    const operation = 'get_deals';

    if (this.testDelayMs > 0) {
      logger.info({ operation, delay_type: 'test_delay', delay_ms: this.testDelayMs }, 'Test delay before request');
      await this.wait(this.testDelayMs);
    }

    const params: QueryParams = { limit: clampLimit(request.limit) };
    if (request.after) params.after = request.after;

    // undefined selects the default field set; an explicit [] sends no properties parameter
    const properties = joinIfAny(request.properties ?? DEFAULT_DEAL_PROPERTIES);
    if (properties) params.properties = properties;

    const associations = joinIfAny(request.associations);
    if (associations) params.associations = associations;

    logger.info(
      {
        operation,
        limit: params.limit,
        has_cursor: request.after !== undefined,
        properties_count: request.properties ? request.properties.length : 'default',
      },
      'Fetching deals'
    );

    const response = await this.executor.get(operation, PATHS.deals, { accessToken, params });
    const body = parseBody(operation, PATHS.deals, DealsPageSchema, response);
    const nextCursor = body.paging?.next?.after ?? null;

    logger.info(
      {
        operation,
        status_code: response.status,
        duration_ms: response.durationMs,
        deal_count: body.results.length,
        has_more: nextCursor !== null,
      },
      'Deals retrieved'
    );

    return { deals: body.results, nextCursor };
  }

  async getDealById(accessToken: string, dealId: string, options: GetDealOptions = {}): Promise<Deal | null> {
    const operation = 'get_deal_by_id';
    const path = `${PATHS.deals}/${encodeURIComponent(dealId)}`;

    const params: QueryParams = {};
    const properties = joinIfAny(options.properties);
    if (properties) params.properties = properties;
    const associations = joinIfAny(options.associations);
    if (associations) params.associations = associations;

    const response = await this.executor.get(operation, path, { accessToken, params, acceptStatuses: [404] });

    if (response.status === 404) {
      logger.warn({ operation, deal_id: dealId }, `Deal not found: ${dealId}`);
      return null;
    }

    return parseBody(operation, path, DealSchema, response);
  }
}

export function createDealsClient(config: ApiClientConfig = {}): DealsApiClient {
  return new DealsApiClient(config);
}
