import { http, HttpResponse } from 'msw';

/**
 * Default CRM API stand-ins shared by every test.
 * Individual tests override them with server.use(...).
 */

export const TEST_BASE_URL = 'https://api.hubapi.com';

export const testFixtures = {
  properties: [
    { name: 'dealname', label: 'Deal Name', type: 'string', fieldType: 'text', groupName: 'dealinformation' },
    { name: 'amount', label: 'Amount', type: 'number', fieldType: 'number', groupName: 'dealinformation' },
  ],
  deal: {
    id: 'deal-1',
    properties: { dealname: 'Office chairs', amount: '1200', dealstage: 'appointmentscheduled' },
    createdAt: '2024-03-01T10:00:00.000Z',
    updatedAt: '2024-03-02T10:00:00.000Z',
    archived: false,
  },
  account: { portalId: 12345, hubDomain: 'example-test.com', timeZone: 'Europe/Bucharest' },
  usageHeaders: {
    'X-HubSpot-RateLimit-Daily': '250000',
    'X-HubSpot-RateLimit-Daily-Remaining': '249990',
    'X-HubSpot-RateLimit-Remaining': '99',
  },
} as const;

export const handlers = [
  http.get(`${TEST_BASE_URL}/crm/v3/properties/deals`, () =>
    HttpResponse.json({ results: testFixtures.properties }, { headers: testFixtures.usageHeaders })
  ),

  http.get(`${TEST_BASE_URL}/crm/v3/objects/deals`, () =>
    HttpResponse.json({ results: [testFixtures.deal] })
  ),

  http.get(`${TEST_BASE_URL}/crm/v3/objects/deals/:dealId`, ({ params }) => {
    if (params.dealId === 'missing') {
      return HttpResponse.json({ status: 'error', message: 'resource not found' }, { status: 404 });
    }
    return HttpResponse.json({ ...testFixtures.deal, id: params.dealId });
  }),

  http.get(`${TEST_BASE_URL}/integrations/v1/me`, () => HttpResponse.json(testFixtures.account)),
];

/**
 * Answers 429 for the first `failures` requests, then delegates to `success`.
 * `calls` counts every request the handler has seen.
 */
export function createRateLimitedHandler(
  url: string,
  options: { failures: number; intervalMs?: string; success?: () => Response }
) {
  const state = { calls: 0 };
  const handler = http.get(url, () => {
    state.calls++;
    if (state.calls <= options.failures) {
      const headers: Record<string, string> =
        options.intervalMs === undefined ? {} : { 'X-HubSpot-RateLimit-Interval-Milliseconds': options.intervalMs };
      return HttpResponse.json({ status: 'error', category: 'RATE_LIMITS' }, { status: 429, headers });
    }
    return options.success ? options.success() : HttpResponse.json({ results: [] });
  });
  return { handler, state };
}

export function createFailingHandler(url: string, status: number) {
  return http.get(url, () => HttpResponse.json({ status: 'error' }, { status }));
}
