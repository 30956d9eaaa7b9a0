/**
 * Upstream Client
 * Single-attempt raw METAR fetch from the AviationWeather data API
 */

import type { Result, StationId } from '../types/index.js';

// ============================================
// Types
// ============================================

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpstreamConfig {
  /** Endpoint queried with `ids`, `format`, `hours` and `taf` parameters */
  url: string;
  /** Sent as the User-Agent header */
  userAgent: string;
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  /** Recent window requested from upstream, in hours */
  hours: number;
}

export const DEFAULT_UPSTREAM_CONFIG: UpstreamConfig = {
  url: 'https://aviationweather.gov/api/data/metar',
  userAgent: 'metar-relay/1.0',
  timeoutMs: 8000,
  hours: 2,
};

// Error pages served by the provider or a proxy in front of it
const MARKUP_MARKERS = ['<html', '<!doctype'];

/**
 * True when a body is empty or looks like an HTML document rather than report text
 */
export function isUnusableBody(body: string): boolean {
  if (body === '') return true;
  const lower = body.toLowerCase();
  return MARKUP_MARKERS.some((marker) => lower.includes(marker));
}

// ============================================
// Upstream Client
// ============================================

export class UpstreamClient {
  private config: UpstreamConfig;
  private fetcher: FetchFunction;

  constructor(config: Partial<UpstreamConfig> = {}, fetcher: FetchFunction = fetch) {
    this.config = { ...DEFAULT_UPSTREAM_CONFIG, ...config };
    this.fetcher = fetcher;
  }

  buildUrl(station: StationId): string {
    const url = new URL(this.config.url);
    url.searchParams.set('ids', station);
    url.searchParams.set('format', 'raw');
    url.searchParams.set('hours', String(this.config.hours));
    url.searchParams.set('taf', 'false');
    return url.toString();
  }

  /** Host shown in client-facing failure messages */
  getHost(): string {
    return new URL(this.config.url).host;
  }

  /**
   * Fetch the raw report for a station. Transport errors, timeouts and
   * non-2xx statuses are `FetchFailed`; a usable transport with an empty or
   * markup body is `InvalidUpstreamContent`. No retries.
   */
  async fetchReport(station: StationId): Promise<Result<string>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let body: string;
    try {
      const response = await this.fetcher(this.buildUrl(station), {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/plain',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        await response.body?.cancel();
        return {
          ok: false,
          error: { kind: 'FetchFailed', detail: `HTTP ${response.status} ${response.statusText}`.trim() },
        };
      }

      body = (await response.text()).trim();
    } catch (error) {
      const detail = controller.signal.aborted
        ? `timed out after ${this.config.timeoutMs}ms`
        : error instanceof Error ? error.message : String(error);
      return { ok: false, error: { kind: 'FetchFailed', detail } };
    } finally {
      clearTimeout(timer);
    }

    if (isUnusableBody(body)) {
      return {
        ok: false,
        error: { kind: 'InvalidUpstreamContent', detail: body === '' ? 'empty body' : 'markup body' },
      };
    }

    return { ok: true, value: body };
  }
}
