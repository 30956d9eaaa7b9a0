/**
 * Tests for the report cache: keys, freshness, defensive reads, best-effort writes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReportCache, isFresh } from '../src/storage/report-cache.js';
import { MemoryKeyValueStore } from '../src/storage/kv-store.js';
import { FailingReadStore, FailingWriteStore, KPIT_METAR, stationId } from './helpers.js';

const NOW = 1_700_000_000;

describe('isFresh', () => {
  const record = { fetchedAt: NOW, report: KPIT_METAR };

  it('is fresh at age zero', () => {
    expect(isFresh(record, NOW)).toBe(true);
  });

  it('is fresh exactly at the TTL boundary', () => {
    expect(isFresh(record, NOW + 60)).toBe(true);
  });

  it('is stale one second past the TTL', () => {
    expect(isFresh(record, NOW + 61)).toBe(false);
  });

  it('honors a custom TTL', () => {
    expect(isFresh(record, NOW + 300, 300)).toBe(true);
    expect(isFresh(record, NOW + 11, 10)).toBe(false);
  });

  it('is never fresh when stamped in the future', () => {
    expect(isFresh(record, NOW - 1)).toBe(false);
  });
});

describe('ReportCache', () => {
  let store: MemoryKeyValueStore;
  let cache: ReportCache;
  const KPIT = stationId('KPIT');

  beforeEach(() => {
    store = new MemoryKeyValueStore();
    cache = new ReportCache(store);
  });

  it('derives one key per station', () => {
    expect(cache.keyFor(KPIT)).toBe('metar_KPIT');
    expect(cache.keyFor(stationId('KAGC'))).toBe('metar_KAGC');
  });

  it('writes the persisted record shape', async () => {
    const written = await cache.store(KPIT, KPIT_METAR, NOW);

    expect(written).toBe(true);
    expect(await store.get('metar_KPIT')).toBe(
      '{"ts":1700000000,"metar":"KPIT 011651Z 00000KT 10SM CLR 22/14 A3002"}'
    );
  });

  it('reads back a stored record', async () => {
    await cache.store(KPIT, KPIT_METAR, NOW);

    expect(await cache.lookup(KPIT)).toEqual({ fetchedAt: NOW, report: KPIT_METAR });
  });

  it('returns undefined when nothing is stored', async () => {
    expect(await cache.lookup(KPIT)).toBeUndefined();
  });

  it.each([
    ['truncated JSON', '{"ts":17000'],
    ['not an object', '"KPIT"'],
    ['null', 'null'],
    ['missing metar', '{"ts":1700000000}'],
    ['missing ts', '{"metar":"KPIT 011651Z"}'],
    ['string ts', '{"ts":"1700000000","metar":"KPIT 011651Z"}'],
    ['empty metar', '{"ts":1700000000,"metar":""}'],
    ['non-string metar', '{"ts":1700000000,"metar":42}'],
  ])('treats %s as absent', async (_label, raw) => {
    await store.set('metar_KPIT', raw);

    expect(await cache.lookup(KPIT)).toBeUndefined();
  });

  it('treats a failing read as absent', async () => {
    const failing = new ReportCache(new FailingReadStore());

    expect(await failing.lookup(KPIT)).toBeUndefined();
  });

  it('absorbs write failures', async () => {
    const failing = new ReportCache(new FailingWriteStore());

    await expect(failing.store(KPIT, KPIT_METAR, NOW)).resolves.toBe(false);
  });

  describe('lookupFresh', () => {
    it('returns a record within the TTL', async () => {
      await cache.store(KPIT, KPIT_METAR, NOW);

      expect(await cache.lookupFresh(KPIT, NOW + 60)).toEqual({ fetchedAt: NOW, report: KPIT_METAR });
    });

    it('ignores a stale record without removing it', async () => {
      await cache.store(KPIT, KPIT_METAR, NOW);

      expect(await cache.lookupFresh(KPIT, NOW + 61)).toBeUndefined();
      expect(await cache.lookup(KPIT)).toEqual({ fetchedAt: NOW, report: KPIT_METAR });
    });

    it('uses the configured TTL', async () => {
      const shortLived = new ReportCache(store, { ttlSeconds: 5 });
      await shortLived.store(KPIT, KPIT_METAR, NOW);

      expect(shortLived.getTtlSeconds()).toBe(5);
      expect(await shortLived.lookupFresh(KPIT, NOW + 6)).toBeUndefined();
    });
  });
});
