import { describe, it, expect, vi } from 'vitest';
import { http, HttpResponse, type JsonBodyType } from 'msw';
import { DealsApiClient, DEFAULT_DEAL_PROPERTIES } from '../api/client';
import { RequestFailedError } from '../api/errors';
import {
  server,
  testFixtures,
  TEST_BASE_URL,
  createRateLimitedHandler,
  createFailingHandler,
} from '../__mocks__/setup';

const TOKEN = 'test-token';
const DEALS_URL = `${TEST_BASE_URL}/crm/v3/objects/deals`;
const PROPERTIES_URL = `${TEST_BASE_URL}/crm/v3/properties/deals`;

function createClient(testDelayMs = 0) {
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
  const client = new DealsApiClient({ sleep, testDelayMs });
  return { client, sleep };
}

function captureDealsQuery(body: JsonBodyType = { results: [] }) {
  const seen: URLSearchParams[] = [];
  server.use(
    http.get(DEALS_URL, ({ request }) => {
      seen.push(new URL(request.url).searchParams);
      return HttpResponse.json(body);
    })
  );
  return seen;
}

describe('DealsApiClient', () => {
  describe('getDealProperties', () => {
    it('returns the property list', async () => {
      const { client } = createClient();

      const properties = await client.getDealProperties(TOKEN);

      expect(properties.map((p) => p.name)).toEqual(['dealname', 'amount']);
      expect(properties[0]?.label).toBe('Deal Name');
    });

    it('sends the bearer token and fixed headers', async () => {
      const seen: Headers[] = [];
      server.use(
        http.get(PROPERTIES_URL, ({ request }) => {
          seen.push(request.headers);
          return HttpResponse.json({ results: [] });
        })
      );
      const { client } = createClient();

      await client.getDealProperties(TOKEN);

      expect(seen[0]?.get('authorization')).toBe('Bearer test-token');
      expect(seen[0]?.get('accept')).toBe('application/json');
      expect(seen[0]?.get('user-agent')).toBe('Deals-Extraction-Service/1.0');
    });

    it('throws RequestFailedError on a 500', async () => {
      server.use(createFailingHandler(PROPERTIES_URL, 500));
      const { client } = createClient();

      const error = await client.getDealProperties(TOKEN).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toMatchObject({ operation: 'get_deal_properties', statusCode: 500 });
    });

    it('records the elapsed duration on the error', async () => {
      server.use(createFailingHandler(PROPERTIES_URL, 500));
      const { client } = createClient();

      const error = await client.getDealProperties(TOKEN).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestFailedError);
      if (error instanceof RequestFailedError) {
        expect(Number.isFinite(error.durationMs)).toBe(true);
        expect(error.durationMs).toBeGreaterThanOrEqual(0);
      }
    });

    it('keeps property attributes it does not model', async () => {
      server.use(
        http.get(PROPERTIES_URL, () =>
          HttpResponse.json({
            results: [
              {
                name: 'dealstage',
                type: 'enumeration',
                hidden: false,
                options: [{ label: 'Closed won', value: 'closedwon' }],
              },
            ],
          })
        )
      );
      const { client } = createClient();

      const [property] = await client.getDealProperties(TOKEN);

      expect(property).toEqual({
        name: 'dealstage',
        type: 'enumeration',
        hidden: false,
        options: [{ label: 'Closed won', value: 'closedwon' }],
      });
    });

    it('throws RequestFailedError when the body has no results array', async () => {
      server.use(http.get(PROPERTIES_URL, () => HttpResponse.json({ unexpected: true })));
      const { client } = createClient();

      await expect(client.getDealProperties(TOKEN)).rejects.toBeInstanceOf(RequestFailedError);
    });
  });

  describe('getDeals', () => {
    it('caps the transmitted limit at 100', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN, { limit: 250 });
      await client.getDeals(TOKEN, { limit: 101 });

      expect(seen.map((q) => q.get('limit'))).toEqual(['100', '100']);
    });

    it('sends at least 1 and a whole number', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN, { limit: 0 });
      await client.getDeals(TOKEN, { limit: -5 });
      await client.getDeals(TOKEN, { limit: 2.7 });
      await client.getDeals(TOKEN, { limit: Number.NaN });

      expect(seen.map((q) => q.get('limit'))).toEqual(['1', '1', '2', '100']);
    });

    it('keeps deal fields it does not model', async () => {
      captureDealsQuery({
        results: [
          {
            id: '7',
            properties: {},
            archivedAt: '2024-04-01T00:00:00.000Z',
            associations: {
              contacts: { results: [{ id: 'c-1', type: 'deal_to_contact' }], paging: { next: { after: 'a1' } } },
            },
          },
        ],
      });
      const { client } = createClient();

      const page = await client.getDeals(TOKEN);

      expect(page.deals[0]).toEqual({
        id: '7',
        properties: {},
        archivedAt: '2024-04-01T00:00:00.000Z',
        associations: {
          contacts: { results: [{ id: 'c-1', type: 'deal_to_contact' }], paging: { next: { after: 'a1' } } },
        },
      });
    });

    it('passes smaller limits through unchanged', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN, { limit: 25 });

      expect(seen[0]?.get('limit')).toBe('25');
    });

    it('requests the default property set when none is given', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN);

      expect(seen[0]?.get('properties')).toBe(
        'dealname,amount,dealstage,pipeline,closedate,createdate,hs_lastmodifieddate'
      );
      expect(DEFAULT_DEAL_PROPERTIES).toHaveLength(7);
      expect(seen[0]?.get('limit')).toBe('100');
      expect(seen[0]?.has('after')).toBe(false);
      expect(seen[0]?.has('associations')).toBe(false);
    });

    it('sends no properties parameter for an explicit empty list', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN, { properties: [] });

      expect(seen[0]?.has('properties')).toBe(false);
    });

    it('joins properties and associations and forwards the cursor', async () => {
      const seen = captureDealsQuery();
      const { client } = createClient();

      await client.getDeals(TOKEN, {
        after: 'cursor-42',
        properties: ['dealname', 'amount'],
        associations: ['contacts', 'companies'],
      });

      expect(seen[0]?.get('after')).toBe('cursor-42');
      expect(seen[0]?.get('properties')).toBe('dealname,amount');
      expect(seen[0]?.get('associations')).toBe('contacts,companies');
    });

    it('returns the next cursor when the remote reports more pages', async () => {
      captureDealsQuery({
        results: [testFixtures.deal],
        paging: { next: { after: 'c1', link: `${DEALS_URL}?after=c1` } },
      });
      const { client } = createClient();

      const page = await client.getDeals(TOKEN);

      expect(page.nextCursor).toBe('c1');
      expect(page.deals).toHaveLength(1);
      expect(page.deals[0]?.id).toBe('deal-1');
      expect(page.deals[0]?.properties.amount).toBe('1200');
    });

    it('returns a null cursor on the last page', async () => {
      const { client } = createClient();

      const page = await client.getDeals(TOKEN);

      expect(page.nextCursor).toBeNull();
    });

    it('waits the configured test delay before sending', async () => {
      const seen = captureDealsQuery();
      const { client, sleep } = createClient(1500);

      await client.getDeals(TOKEN);

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1500);
      expect(seen).toHaveLength(1);
    });

    it('fails with RequestFailedError and a null status on a network fault', async () => {
      server.use(http.get(DEALS_URL, () => HttpResponse.error()));
      const { client } = createClient();

      const error = await client.getDeals(TOKEN).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toMatchObject({ operation: 'get_deals', statusCode: null });
    });
  });

  describe('rate limiting', () => {
    it('retries once after the interval named by the remote', async () => {
      const { handler, state } = createRateLimitedHandler(DEALS_URL, {
        failures: 1,
        intervalMs: '2500',
        success: () => HttpResponse.json({ results: [testFixtures.deal] }),
      });
      server.use(handler);
      const { client, sleep } = createClient();

      const page = await client.getDeals(TOKEN);

      expect(state.calls).toBe(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(2500);
      expect(page.deals).toHaveLength(1);
    });

    it('waits 10000 ms when the interval header is missing', async () => {
      const { handler } = createRateLimitedHandler(DEALS_URL, { failures: 1 });
      server.use(handler);
      const { client, sleep } = createClient();

      await client.getDeals(TOKEN);

      expect(sleep).toHaveBeenCalledWith(10000);
    });

    it('waits 10000 ms when the interval header is not a number', async () => {
      const { handler } = createRateLimitedHandler(DEALS_URL, { failures: 1, intervalMs: 'soon' });
      server.use(handler);
      const { client, sleep } = createClient();

      await client.getDeals(TOKEN);

      expect(sleep).toHaveBeenCalledWith(10000);
    });

    it('does not retry a second 429', async () => {
      const { handler, state } = createRateLimitedHandler(DEALS_URL, { failures: 5, intervalMs: '100' });
      server.use(handler);
      const { client, sleep } = createClient();

      const error = await client.getDeals(TOKEN).catch((err: unknown) => err);

      expect(state.calls).toBe(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toMatchObject({ statusCode: 429 });
    });

    it('applies the same retry to the properties listing', async () => {
      const { handler, state } = createRateLimitedHandler(PROPERTIES_URL, {
        failures: 1,
        intervalMs: '50',
        success: () => HttpResponse.json({ results: testFixtures.properties }),
      });
      server.use(handler);
      const { client, sleep } = createClient();

      const properties = await client.getDealProperties(TOKEN);

      expect(state.calls).toBe(2);
      expect(sleep).toHaveBeenCalledWith(50);
      expect(properties).toHaveLength(2);
    });
  });

  describe('getDealById', () => {
    it('returns the deal', async () => {
      const { client } = createClient();

      const deal = await client.getDealById(TOKEN, 'deal-7');

      expect(deal?.id).toBe('deal-7');
      expect(deal?.properties.dealname).toBe('Office chairs');
    });

    it('returns null on a 404 without throwing', async () => {
      const { client } = createClient();

      await expect(client.getDealById(TOKEN, 'missing')).resolves.toBeNull();
    });

    it('throws RequestFailedError on a 500', async () => {
      server.use(createFailingHandler(`${DEALS_URL}/:dealId`, 500));
      const { client } = createClient();

      const error = await client.getDealById(TOKEN, 'deal-7').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestFailedError);
      expect(error).toMatchObject({ operation: 'get_deal_by_id', statusCode: 500 });
    });

    it('returns null when the retry after a 429 finds no deal', async () => {
      const { handler, state } = createRateLimitedHandler(`${DEALS_URL}/:dealId`, {
        failures: 1,
        intervalMs: '20',
        success: () => HttpResponse.json({ status: 'error', message: 'resource not found' }, { status: 404 }),
      });
      server.use(handler);
      const { client, sleep } = createClient();

      await expect(client.getDealById(TOKEN, 'deal-9')).resolves.toBeNull();
      expect(state.calls).toBe(2);
      expect(sleep).toHaveBeenCalledWith(20);
    });

    it('keeps unmodelled fields on a single deal', async () => {
      server.use(
        http.get(`${DEALS_URL}/:dealId`, ({ params }) =>
          HttpResponse.json({ id: params.dealId, properties: {}, archivedAt: '2024-04-01T00:00:00.000Z' })
        )
      );
      const { client } = createClient();

      const deal = await client.getDealById(TOKEN, '7');

      expect(deal).toHaveProperty('archivedAt', '2024-04-01T00:00:00.000Z');
    });

    it('sends properties and associations only when given', async () => {
      const seen: URLSearchParams[] = [];
      server.use(
        http.get(`${DEALS_URL}/:dealId`, ({ request, params }) => {
          seen.push(new URL(request.url).searchParams);
          return HttpResponse.json({ id: params.dealId, properties: {} });
        })
      );
      const { client } = createClient();

      await client.getDealById(TOKEN, 'deal-7');
      await client.getDealById(TOKEN, 'deal-7', { properties: ['amount'], associations: ['contacts'] });

      expect(seen[0]?.toString()).toBe('');
      expect(seen[1]?.get('properties')).toBe('amount');
      expect(seen[1]?.get('associations')).toBe('contacts');
    });
  });
});
