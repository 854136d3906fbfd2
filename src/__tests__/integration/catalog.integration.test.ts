/**
 * Integration Tests — Catalog Search & Lookup Endpoints
 *
 *   GET /api/v1/catalog/search?term=...   — term search, or lookup when id is given
 *   GET /api/v1/catalog/lookup/:id        — lookup by identifier
 *
 * The real middleware chain, controller, service and ItunesClient run; only
 * the HttpTransport is swapped for a jest fake through the DI container, so
 * no request leaves the process.
 *
 * The app must be created AFTER the container override: catalogRoutes
 * resolves CatalogService (and through it the client and transport) when
 * it is first imported.
 */
import { TOKENS } from '@core/types';
import type { HttpTransport } from '@domain/interfaces/IHttpTransport';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { emptyResultBody, sampleLookupBody, sampleSearchResult } from '../helpers/fixtures';
import { createMockTransport, fakeResponse, MockTransport } from '../helpers/mockTransport';

let app: Express;
let transport: MockTransport;

beforeAll(async () => {
  await import('@core/container');

  transport = createMockTransport();
  container.register<HttpTransport>(TOKENS.HttpTransport, { useValue: transport });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  transport.mockReset();
});

describe('GET /api/v1/catalog/search', () => {
  it('should return 200 with the decoded results', async () => {
    transport.mockResolvedValue(fakeResponse({ body: JSON.stringify(sampleSearchResult) }));

    const res = await request(app).get('/api/v1/catalog/search?term=Change&limit=12');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('success');
    expect(res.body.resultCount).toBe(1);
    expect(res.body.results[0].trackId).toBe(1440857781);
    expect(res.body.results[0].currency).toBe('USD');
    expect(typeof res.body.meta.upstreamTimeMs).toBe('number');
    expect(typeof res.body.meta.totalTimeMs).toBe('number');
    expect(transport.mock.calls[0]?.[0]).toBe(
      'https://itunes.apple.com/search?term=Change&limit=12',
    );
  });

  it('should translate explicit=false into the remote No', async () => {
    transport.mockResolvedValue(fakeResponse({ body: emptyResultBody }));

    const res = await request(app).get('/api/v1/catalog/search?term=x&entity=podcast&explicit=false');

    expect(res.status).toBe(200);
    expect(transport.mock.calls[0]?.[0]).toBe(
      'https://itunes.apple.com/search?term=x&entity=podcast&explicit=No',
    );
  });

  it('should switch to the lookup endpoint when an id is given', async () => {
    transport.mockResolvedValue(fakeResponse({ body: sampleLookupBody }));

    const res = await request(app).get('/api/v1/catalog/search?id=263058648&term=ignored');

    expect(res.status).toBe(200);
    expect(res.body.results[0].trackName).toBe('Example');
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0]?.[0]).toBe('https://itunes.apple.com/lookup?id=263058648');
  });

  it('should return 400 for a limit above the upstream maximum', async () => {
    const res = await request(app).get('/api/v1/catalog/search?term=x&limit=500');

    expect(res.status).toBe(400);
    expect(res.body.status).toBe('error');
    expect(res.body.message).toBe('limit must be at most 200');
    expect(transport).not.toHaveBeenCalled();
  });

  it('should return 400 for an unknown entity', async () => {
    const res = await request(app).get('/api/v1/catalog/search?term=x&entity=song');

    expect(res.status).toBe(400);
    expect(res.body.message).toContain('entity must be one of');
    expect(transport).not.toHaveBeenCalled();
  });

  it('should return 502 when the upstream answers non-2xx', async () => {
    transport.mockResolvedValue(fakeResponse({ status: 503, statusText: 'Service Unavailable' }));

    const res = await request(app).get('/api/v1/catalog/search?term=x');

    expect(res.status).toBe(502);
    expect(res.body.message).toBe('Unexpected upstream status: 503 Service Unavailable');
  });

  it('should return 502 when the upstream body is not JSON', async () => {
    transport.mockResolvedValue(fakeResponse({ body: '<html></html>' }));

    const res = await request(app).get('/api/v1/catalog/search?term=x');

    expect(res.status).toBe(502);
    expect(res.body.message).toMatch(/^Failed to decode upstream response: /);
  });

  it('should return 502 when the upstream cannot be reached', async () => {
    transport.mockRejectedValue(new TypeError('fetch failed'));

    const res = await request(app).get('/api/v1/catalog/search?term=x');

    expect(res.status).toBe(502);
    expect(res.body.message).toBe(
      'Request failed: https://itunes.apple.com/search?term=x: fetch failed',
    );
  });
});

describe('GET /api/v1/catalog/lookup/:id', () => {
  it('should return 200 with the looked-up item', async () => {
    transport.mockResolvedValue(fakeResponse({ body: sampleLookupBody }));

    const res = await request(app).get('/api/v1/catalog/lookup/263058648');

    expect(res.status).toBe(200);
    expect(res.body.resultCount).toBe(1);
    expect(res.body.results).toEqual([{ trackId: 263058648, trackName: 'Example' }]);
  });

  it('should return 404 when the lookup finds nothing', async () => {
    transport.mockResolvedValue(fakeResponse({ body: emptyResultBody }));

    const res = await request(app).get('/api/v1/catalog/lookup/999');

    expect(res.status).toBe(404);
    expect(res.body.status).toBe('error');
    expect(res.body.message).toBe('Catalog item not found: 999');
  });
});
