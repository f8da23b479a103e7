/**
 * Integration tests for the cross-cutting middleware (API key, rate limit,
 * health, 404) and the external map preview route.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { api, createTestApp, fakeTileSource, TEST_API_KEY, type TestApp } from '../helpers/test-helpers.js';

let app: TestApp;

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

async function parse(res: Response): Promise<{ success: boolean; error?: string; data?: unknown }> {
  return JSON.parse(await res.text());
}

describe('API key', () => {
  beforeEach(async () => {
    app = await createTestApp();
  });

  it('rejects a request without the key', async () => {
    const res = await fetch(`${app.baseUrl}/api/satellites`);

    expect(res.status).toBe(401);
    expect(await parse(res)).toMatchObject({ success: false, error: 'Unauthorized' });
  });

  it('rejects a wrong key', async () => {
    const res = await fetch(`${app.baseUrl}/api/satellites`, { headers: { 'x-api-key': 'wrong-secret' } });

    expect(res.status).toBe(401);
  });

  it('leaves the health check public', async () => {
    const res = await fetch(`${app.baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(await parse(res)).toMatchObject({ success: true, data: { status: 'healthy', inFlightTasks: 0 } });
  });

  it('takes the key from the query string on download routes only', async () => {
    const download = await fetch(`${app.baseUrl}/api/downloads/cmd-missing?apiKey=${TEST_API_KEY}`);
    const commands = await fetch(`${app.baseUrl}/api/commands?apiKey=${TEST_API_KEY}`);

    expect(download.status).toBe(404);
    expect(await parse(download)).toMatchObject({ error: 'command not found' });
    expect(commands.status).toBe(401);
  });

  it('answers unknown API paths with 404', async () => {
    const res = await api<null>(app, 'GET', '/api/orbits');

    expect(res.status).toBe(404);
    expect(res.body.error).toBe('Not found');
  });
});

describe('Rate limit', () => {
  beforeEach(async () => {
    app = await createTestApp({ rateLimitPerMin: 2 });
  });

  it('returns 429 once the per-minute budget is spent', async () => {
    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await api<unknown>(app, 'GET', '/api/satellites')).status);
    }

    expect(statuses).toEqual([200, 200, 429]);
  });

  it('does not count unauthenticated requests', async () => {
    await fetch(`${app.baseUrl}/api/satellites`);
    await fetch(`${app.baseUrl}/api/satellites`);

    expect((await api<unknown>(app, 'GET', '/api/satellites')).status).toBe(200);
  });
});

describe('GET /api/preview/external-map', () => {
  it('returns a PNG mosaic', async () => {
    app = await createTestApp();

    const res = await fetch(`${app.baseUrl}/api/preview/external-map?lat=37.5&lon=127&zoom=12&width=256&height=256`, {
      headers: { 'x-api-key': TEST_API_KEY },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('image/png');
    expect(app.tiles.requests).toHaveLength(9);
    expect(app.tiles.requests.every(t => t.zoom === 12)).toBe(true);
  });

  it('returns 400 for a missing coordinate', async () => {
    app = await createTestApp();

    const res = await api<null>(app, 'GET', '/api/preview/external-map?lat=37.5');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('lon: Expected number, received nan');
  });

  it('returns 502 when the tile provider fails', async () => {
    app = await createTestApp({ tiles: fakeTileSource({ failWith: 'offline' }) });

    const res = await api<null>(app, 'GET', '/api/preview/external-map?lat=37.5&lon=127');

    expect(res.status).toBe(502);
    expect(res.body.error).toBe('external map preview failed: external map tile fetch failed: offline');
  });
});
