import { z } from 'zod';
import { DEFAULT_BASE_URL } from './api/session';

const csv = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
  );

// `KEY=` in .env means unset, not 0 or ""
function unsetIfEmpty<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const EnvSchema = z.object({
  HUBSPOT_ACCESS_TOKEN: z.string().min(1, 'HUBSPOT_ACCESS_TOKEN is required'),
  HUBSPOT_BASE_URL: unsetIfEmpty(z.string().url().default(DEFAULT_BASE_URL)),
  HUBSPOT_TIMEOUT_MS: unsetIfEmpty(z.coerce.number().int().positive().default(30000)),
  HUBSPOT_TEST_DELAY_MS: unsetIfEmpty(z.coerce.number().int().min(0).default(0)),
  DEALS_PAGE_SIZE: unsetIfEmpty(z.coerce.number().int().min(1).max(100).default(100)),
  DEALS_PROPERTIES: csv,
  DEALS_ASSOCIATIONS: csv,
  DEALS_OUTPUT_FILE: unsetIfEmpty(z.string().min(1).default('deals.ndjson')),
  DEALS_MAX_PAGES: unsetIfEmpty(z.coerce.number().int().positive().optional()),
});

export interface ExtractionConfig {
  accessToken: string;
  baseUrl: string;
  timeoutMs: number;
  testDelayMs: number;
  pageSize: number;
  /** Unset keeps the client's default field set. */
  properties?: string[];
  associations?: string[];
  outputFile: string;
  maxPages?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  return {
    accessToken: e.HUBSPOT_ACCESS_TOKEN,
    baseUrl: e.HUBSPOT_BASE_URL,
    timeoutMs: e.HUBSPOT_TIMEOUT_MS,
    testDelayMs: e.HUBSPOT_TEST_DELAY_MS,
    pageSize: e.DEALS_PAGE_SIZE,
    properties: e.DEALS_PROPERTIES,
    associations: e.DEALS_ASSOCIATIONS,
    outputFile: e.DEALS_OUTPUT_FILE,
    maxPages: e.DEALS_MAX_PAGES,
  };
}
