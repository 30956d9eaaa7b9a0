/**
 * API Endpoint Tests
 *
 * Tests the REST API endpoints in process, with a fake upstream and an in-memory store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { ApiServer } from '../src/server/express.js';
import { createRelayApp, type RelayApp } from '../src/app.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import { MemoryKeyValueStore } from '../src/storage/kv-store.js';
import { fakeUpstream, hangingUpstream, KPIT_METAR, textResponse, type FakeUpstream } from './helpers.js';

describe('API Endpoints', () => {
  let upstream: FakeUpstream;
  let store: MemoryKeyValueStore;
  let app: RelayApp;
  let server: ApiServer;
  let now: number;

  beforeEach(() => {
    now = 1_700_000_000;
    upstream = fakeUpstream(() => textResponse(KPIT_METAR));
    store = new MemoryKeyValueStore();
    app = createRelayApp(DEFAULT_CONFIG, { store, fetcher: upstream.fetcher, clock: () => now });
    server = new ApiServer(app.relay);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /api/health', () => {
    it('returns ok status', async () => {
      const res = await request(server.getApp()).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(typeof res.body.timestamp).toBe('number');
    });
  });

  describe('GET /api/metar', () => {
    it('returns a fresh report as JSON with an open CORS header', async () => {
      const res = await request(server.getApp()).get('/api/metar?station=KPIT');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
      expect(res.headers['access-control-allow-origin']).toBe('*');
      expect(res.body).toEqual({ ok: true, station: 'KPIT', metar: KPIT_METAR, cached: false });
    });

    it('serves the second request from cache', async () => {
      await request(server.getApp()).get('/api/metar?station=KPIT');
      now += 59;
      const res = await request(server.getApp()).get('/api/metar?station=KPIT');

      expect(res.body).toEqual({ ok: true, station: 'KPIT', metar: KPIT_METAR, cached: true });
      expect(upstream.calls).toHaveLength(1);
    });

    it('normalizes the station parameter', async () => {
      const res = await request(server.getApp()).get('/api/metar').query({ station: ' kpit ' });

      expect(res.status).toBe(200);
      expect(res.body.station).toBe('KPIT');
    });

    it('uses the first of repeated station parameters', async () => {
      const res = await request(server.getApp()).get('/api/metar?station=kpit&station=nope!');

      expect(res.status).toBe(200);
      expect(res.body.station).toBe('KPIT');
    });

    it('returns 400 for a malformed station', async () => {
      const res = await request(server.getApp()).get('/api/metar?station=kpit1');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ ok: false, error: 'Invalid station. Use 4-letter ICAO like KPIT.' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('returns 400 when the station is missing', async () => {
      const res = await request(server.getApp()).get('/api/metar');

      expect(res.status).toBe(400);
      expect(res.body.ok).toBe(false);
    });

    it('returns 502 when upstream times out', async () => {
      const slow = createRelayApp(
        { ...DEFAULT_CONFIG, upstream: { ...DEFAULT_CONFIG.upstream, timeoutMs: 20 } },
        { store, fetcher: hangingUpstream().fetcher, clock: () => now },
      );
      const res = await request(new ApiServer(slow.relay).getApp()).get('/api/metar?station=KPIT');

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ ok: false, error: 'Upstream fetch failed (aviationweather.gov).' });
      expect(store.size).toBe(0);
    });
  });

  describe('GET /metar', () => {
    it('serves the same relay', async () => {
      const res = await request(server.getApp()).get('/metar?station=KPIT');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true, station: 'KPIT', metar: KPIT_METAR, cached: false });
    });
  });

  describe('GET /api/stats', () => {
    it('reports relay counters', async () => {
      await request(server.getApp()).get('/api/metar?station=KPIT');
      await request(server.getApp()).get('/api/metar?station=KPIT');

      const res = await request(server.getApp()).get('/api/stats');

      expect(res.body).toEqual({
        requests: 2,
        cacheHits: 1,
        upstreamFetches: 1,
        failures: 0,
        cacheWriteFailures: 0,
      });
    });
  });

  describe('lifecycle', () => {
    it('starts and stops on an ephemeral port', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const live = new ApiServer(app.relay, { port: 0, host: '127.0.0.1' });

      await expect(live.start()).resolves.toBeUndefined();
      await expect(live.stop()).resolves.toBeUndefined();
    });
  });

  describe('errors', () => {
    it('returns a JSON 404 for unknown routes', async () => {
      const res = await request(server.getApp()).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ ok: false, error: 'Not found' });
    });

    it('hides unexpected exceptions behind a generic envelope', async () => {
      vi.spyOn(app.relay, 'handle').mockRejectedValue(new Error('secret stack detail'));
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      const res = await request(server.getApp()).get('/api/metar?station=KPIT');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ ok: false, error: 'Internal server error' });
    });
  });
});
