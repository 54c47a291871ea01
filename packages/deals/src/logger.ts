import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(name: string): Logger {
  return pino({ name, level: process.env.LOG_LEVEL ?? 'info' });
}

export interface ApiCallRecord {
  method: string;
  statusCode: number | null;
  durationMs: number;
}

// One line per outbound request, whatever its outcome
export function logApiCall(logger: Logger, operation: string, call: ApiCallRecord): void {
  logger.info(
    {
      type: 'api_call',
      operation,
      method: call.method,
      status_code: call.statusCode,
      duration_ms: Math.round(call.durationMs * 100) / 100,
    },
    `API call ${operation}`
  );
}
