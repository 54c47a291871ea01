import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

// Unlisted keys from the remote are kept (passthrough) on every object below
const AssociationListSchema = z
  .object({
    results: z.array(z.object({ id: z.string(), type: z.string() }).passthrough()),
  })
  .passthrough();

export const DealSchema = z.object({
  id: z.string(),
  properties: z.record(JsonValueSchema),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  archived: z.boolean().optional(),
  associations: z.record(AssociationListSchema).optional(),
}).passthrough();

// Remote page shape: { results: [...], paging: { next: { after, link } } }
export const DealsPageSchema = z.object({
  results: z.array(DealSchema),
  paging: z
    .object({
      next: z.object({ after: z.string(), link: z.string().optional() }).optional(),
    })
    .optional(),
}).passthrough();

export const DealPropertySchema = z.object({
  name: z.string(),
  label: z.string().optional(),
  type: z.string().optional(),
  fieldType: z.string().optional(),
  groupName: z.string().optional(),
  description: z.string().optional(),
}).passthrough();

export const DealPropertiesResponseSchema = z.object({
  results: z.array(DealPropertySchema),
});

export const AccountInfoSchema = z.record(JsonValueSchema);

export type Deal = z.infer<typeof DealSchema>;
export type DealProperty = z.infer<typeof DealPropertySchema>;
export type AccountInfo = z.infer<typeof AccountInfoSchema>;

export interface PageResult {
  deals: Deal[];
  nextCursor: string | null; // from paging.next.after; null ends pagination
}

export interface GetDealsParams {
  limit?: number;
  after?: string;
  /** Omit for the default field set; pass [] to send no properties parameter at all. */
  properties?: readonly string[];
  associations?: readonly string[];
}

export interface GetDealOptions {
  properties?: readonly string[];
  associations?: readonly string[];
}

export const RATE_LIMIT_HEADERS = [
  'X-HubSpot-RateLimit-Daily',
  'X-HubSpot-RateLimit-Daily-Remaining',
  'X-HubSpot-RateLimit-Interval-Milliseconds',
  'X-HubSpot-RateLimit-Max',
  'X-HubSpot-RateLimit-Remaining',
  'X-HubSpot-RateLimit-Secondly',
  'X-HubSpot-RateLimit-Secondly-Remaining',
] as const;

export type RateLimitHeader = (typeof RATE_LIMIT_HEADERS)[number];

export interface UsageSnapshot {
  headers: Partial<Record<RateLimitHeader, string>>;
  capturedAt: string;
}

export interface ConnectionReport {
  readonly tokenValid: boolean;
  readonly apiReachable: boolean;
  readonly dataAccessible: boolean;
  readonly accountInfo: AccountInfo | null;
  readonly usageInfo: UsageSnapshot | null;
  readonly error: string | null;
}

export type DiagnosticResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'absent' }
  | { status: 'failed'; error: string };

export type Sleep = (ms: number) => Promise<void>;

export interface ApiClientConfig {
  baseUrl?: string;
  timeoutMs?: number;
  /** Fixed wait before every getDeals request, for simulating a slow upstream. */
  testDelayMs?: number;
  sleep?: Sleep;
}
