export { DealsApiClient, createDealsClient, DEFAULT_DEAL_PROPERTIES, MAX_PAGE_SIZE } from './client';
export { ConnectionDiagnostics } from './diagnostics';
export { RequestFailedError } from './errors';
export { AuthenticatedSession, DEFAULT_BASE_URL } from './session';
export { RateLimiter, DEFAULT_RETRY_INTERVAL_MS, extractUsage, retryIntervalFromHeaders } from './rateLimiter';
export * from './types';
