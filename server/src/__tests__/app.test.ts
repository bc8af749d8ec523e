import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { InMemoryStoreProvider } from '../db/memoryStore';
import { ScrapeEngine } from '../services/scraping/engine';
import { PageFetcher } from '../services/scraping/http';
import { TEST_PAGE_HTML, TEST_PAGE_URL } from '../services/scraping/__tests__/fixtures';

const SECRET = 'test-secret';

function response(status: number, data = ''): AxiosResponse<unknown> {
  return { status, data, statusText: '', headers: {}, config: { headers: new AxiosHeaders() } };
}

function buildApp(apiSecret: string | null = SECRET) {
  const storeProvider = new InMemoryStoreProvider();
  const fetcher = new PageFetcher({
    http: { get: async (url: string) => (url === TEST_PAGE_URL ? response(200, TEST_PAGE_HTML) : response(500)) },
    hooks: { sleep: async () => {} },
  });
  const engine = new ScrapeEngine({ storeProvider, fetcher });
  return createApp({ storeProvider, engine, apiSecret });
}

describe('HTTP API', () => {
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    app = buildApp();
  });

  it('reports health with engine metadata', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', adapter: 'Eater', concurrency: 5 });
  });

  it('requires the API secret for scrape routes', async () => {
    const res = await request(app).post('/api/scrape/run').send({ urls: [TEST_PAGE_URL] });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Unauthorized' });
  });

  it('rejects every scrape request when no secret is configured', async () => {
    const res = await request(buildApp(null)).post('/api/scrape/run').set('x-api-secret', SECRET).send({ urls: [] });
    expect(res.status).toBe(401);
  });

  it('validates the batch body', async () => {
    const res = await request(app).post('/api/scrape/run').set('x-api-secret', SECRET).send({ urls: 'nope' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid request');
  });

  it('runs a batch and serves the stored restaurants', async () => {
    const run = await request(app)
      .post('/api/scrape/run')
      .set('Authorization', `Bearer ${SECRET}`)
      .send({ urls: [TEST_PAGE_URL, 'https://eater.com/down'], concurrency: 2 });

    expect(run.status).toBe(200);
    expect(run.body).toMatchObject({ status: 'ok', total: 2, succeeded: 1, failed: 1, adapter: 'Eater' });
    expect(run.body.outcomes[0]).toEqual({ url: TEST_PAGE_URL, status: 'ok', records: 1, created: 1, updated: 0 });

    const list = await request(app).get('/api/restaurants');
    expect(list.status).toBe(200);
    expect(list.body).toMatchObject({ skip: 0, limit: 20 });
    expect(list.body.data).toHaveLength(1);
    expect(list.body.data[0]).toMatchObject({
      id: 1,
      name: 'Test Restaurant',
      address: '123 Test St, Test City, TC 12345',
      source: 'eater',
      llm_info: null,
    });

    const one = await request(app).get('/api/restaurants/1');
    expect(one.body.data.description).toBe('A fantastic test restaurant.');
  });

  it('scrapes a single page', async () => {
    const res = await request(app).post('/api/scrape/page').set('x-api-secret', SECRET).send({ url: TEST_PAGE_URL });
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', created: 1, updated: 0 });
    expect(res.body.records[0].name).toBe('Test Restaurant');
  });

  it('maps an exhausted fetch to 502', async () => {
    const res = await request(app).post('/api/scrape/page').set('x-api-secret', SECRET).send({ url: 'https://eater.com/down' });
    expect(res.status).toBe(502);
    expect(res.body.code).toBe('FETCH_FAILED');
  });

  it('returns 404 for unknown restaurants and routes', async () => {
    const missing = await request(app).get('/api/restaurants/99');
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: 'Restaurant 99 not found', code: 'NOT_FOUND' });

    const unknown = await request(app).get('/nope');
    expect(unknown.status).toBe(404);
    expect(unknown.body).toEqual({ error: 'Not Found' });
  });

  it('validates list paging', async () => {
    const res = await request(app).get('/api/restaurants?limit=500');
    expect(res.status).toBe(400);
  });
});
