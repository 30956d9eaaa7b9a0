/**
 * Report Cache
 * Keyed lookup and best-effort write-back of fetched reports, with TTL freshness
 */

import { z } from 'zod';
import type { CacheRecord, StationId } from '../types/index.js';
import type { KeyValueStore } from './kv-store.js';

// ============================================
// Types
// ============================================

export interface ReportCacheConfig {
  /** Maximum record age in seconds still served from cache */
  ttlSeconds: number;
  /** Prefix joined to the station to form the storage key */
  keyPrefix: string;
}

/** On-disk shape: `{"ts": <unix seconds>, "metar": "<report>"}` */
const StoredRecordSchema = z.object({
  ts: z.number().finite(),
  metar: z.string().min(1),
});

export const DEFAULT_TTL_SECONDS = 60;

// ============================================
// Freshness
// ============================================

/**
 * Fresh iff the record is at most `ttlSeconds` old. A record stamped after
 * `now` is not fresh; no clock-skew correction is attempted.
 */
export function isFresh(record: CacheRecord, now: number, ttlSeconds: number = DEFAULT_TTL_SECONDS): boolean {
  const age = now - record.fetchedAt;
  return age >= 0 && age <= ttlSeconds;
}

// ============================================
// Report Cache
// ============================================

export class ReportCache {
  private config: ReportCacheConfig;

  constructor(
    private readonly kv: KeyValueStore,
    config: Partial<ReportCacheConfig> = {},
  ) {
    this.config = {
      ttlSeconds: DEFAULT_TTL_SECONDS,
      keyPrefix: 'metar_',
      ...config,
    };
  }

  keyFor(station: StationId): string {
    return `${this.config.keyPrefix}${station}`;
  }

  getTtlSeconds(): number {
    return this.config.ttlSeconds;
  }

  /**
   * Read the record for a station. Unreadable, corrupt or incomplete
   * values all come back as undefined.
   */
  async lookup(station: StationId): Promise<CacheRecord | undefined> {
    let raw: string | undefined;
    try {
      raw = await this.kv.get(this.keyFor(station));
    } catch (error) {
      console.warn(`[cache] Read failed for ${station}:`, errorMessage(error));
      return undefined;
    }
    if (raw === undefined) return undefined;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      console.warn(`[cache] Ignoring undecodable record for ${station}`);
      return undefined;
    }

    const parsed = StoredRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      console.warn(`[cache] Ignoring malformed record for ${station}`);
      return undefined;
    }

    return { fetchedAt: parsed.data.ts, report: parsed.data.metar };
  }

  /**
   * Look up a record and return it only if still fresh at `now`
   */
  async lookupFresh(station: StationId, now: number): Promise<CacheRecord | undefined> {
    const record = await this.lookup(station);
    if (record && isFresh(record, now, this.config.ttlSeconds)) {
      return record;
    }
    return undefined;
  }

  /**
   * Best-effort write-back. Never rejects: a failed write is logged and
   * reported as `false`, and the caller's response does not depend on it.
   */
  async store(station: StationId, report: string, now: number): Promise<boolean> {
    const value = JSON.stringify({ ts: now, metar: report });
    try {
      await this.kv.set(this.keyFor(station), value);
      return true;
    } catch (error) {
      console.warn(`[cache] Write failed for ${station}:`, errorMessage(error));
      return false;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
