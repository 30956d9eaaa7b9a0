/**
 * Report Relay
 * Validator -> cache -> upstream -> write-back -> responder, per request
 */

import type { RelayOutcome, RelayResponse } from '../types/index.js';
import type { ReportCache } from '../storage/report-cache.js';
import { validateStation } from './validator.js';
import { UpstreamClient } from './upstream-client.js';
import { respond } from './responder.js';

// ============================================
// Types
// ============================================

/** Current time in unix seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface ReportRelayDeps {
  cache: ReportCache;
  upstream: UpstreamClient;
  clock?: Clock;
}

export interface RelayStats {
  requests: number;
  cacheHits: number;
  upstreamFetches: number;
  failures: number;
  cacheWriteFailures: number;
}

// ============================================
// Report Relay
// ============================================

export class ReportRelay {
  private cache: ReportCache;
  private upstream: UpstreamClient;
  private clock: Clock;
  private stats: RelayStats = {
    requests: 0,
    cacheHits: 0,
    upstreamFetches: 0,
    failures: 0,
    cacheWriteFailures: 0,
  };

  constructor(deps: ReportRelayDeps) {
    this.cache = deps.cache;
    this.upstream = deps.upstream;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Handle one request for a raw station value. Every failure is mapped to
   * an envelope; this never rejects.
   */
  async handle(rawStation: unknown): Promise<RelayResponse> {
    this.stats.requests++;
    const outcome = await this.resolve(rawStation);
    if (outcome.kind === 'failure') {
      this.stats.failures++;
    }
    return respond(outcome, this.upstream.getHost());
  }

  private async resolve(rawStation: unknown): Promise<RelayOutcome> {
    const validated = validateStation(rawStation);
    if (!validated.ok) {
      return { kind: 'failure', failure: validated.error };
    }
    const station = validated.value;

    const hit = await this.cache.lookupFresh(station, this.clock());
    if (hit) {
      this.stats.cacheHits++;
      return { kind: 'report', station, report: hit.report, cached: true };
    }

    this.stats.upstreamFetches++;
    const fetched = await this.upstream.fetchReport(station);
    if (!fetched.ok) {
      console.warn(`[relay] ${station}: ${fetched.error.kind}${fetched.error.detail ? ` (${fetched.error.detail})` : ''}`);
      return { kind: 'failure', failure: fetched.error };
    }

    // Stamp after the fetch so the TTL counts from when the report arrived
    const persisted = await this.cache.store(station, fetched.value, this.clock());
    if (!persisted) {
      this.stats.cacheWriteFailures++;
    }

    return { kind: 'report', station, report: fetched.value, cached: false };
  }

  getStats(): RelayStats {
    return { ...this.stats };
  }
}
