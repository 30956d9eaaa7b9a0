/**
 * Core types for the METAR relay
 * Focus: the request pipeline from raw station input to JSON envelope
 */

// ============================================
// Stations
// ============================================

declare const stationIdBrand: unique symbol;

/** Four-character uppercase alphanumeric ICAO code, e.g. `KPIT`. Only the validator mints these. */
export type StationId = string & { readonly [stationIdBrand]: true };

// ============================================
// Cache
// ============================================

export interface CacheRecord {
  /** Unix seconds at which the report was fetched */
  fetchedAt: number;
  /** Raw report text as returned by upstream, trimmed */
  report: string;
}

// ============================================
// Failures
// ============================================

export type FailureKind = 'InvalidStation' | 'FetchFailed' | 'InvalidUpstreamContent';

export interface RelayFailure {
  kind: FailureKind;
  /** Internal detail for logs; never sent to clients */
  detail?: string;
}

export type Result<T, E = RelayFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ============================================
// Pipeline outcomes
// ============================================

export type RelayOutcome =
  | { kind: 'report'; station: StationId; report: string; cached: boolean }
  | { kind: 'failure'; failure: RelayFailure };

// ============================================
// Response envelope
// ============================================

export interface ReportSuccessEnvelope {
  ok: true;
  station: StationId;
  metar: string;
  cached: boolean;
}

export interface ReportErrorEnvelope {
  ok: false;
  error: string;
}

export type ReportEnvelope = ReportSuccessEnvelope | ReportErrorEnvelope;

export interface RelayResponse {
  status: number;
  body: ReportEnvelope;
}
