/**
 * Responder
 * Maps pipeline outcomes onto the JSON envelope and HTTP status
 */

import type { FailureKind, RelayOutcome, RelayResponse } from '../types/index.js';

export const STATUS_BY_FAILURE: Record<FailureKind, number> = {
  InvalidStation: 400,
  FetchFailed: 502,
  InvalidUpstreamContent: 502,
};

export function failureMessage(kind: FailureKind, upstreamHost: string): string {
  switch (kind) {
    case 'InvalidStation':
      return 'Invalid station. Use 4-letter ICAO like KPIT.';
    case 'FetchFailed':
      return `Upstream fetch failed (${upstreamHost}).`;
    case 'InvalidUpstreamContent':
      return 'Upstream returned non-METAR content.';
  }
}

export function respond(outcome: RelayOutcome, upstreamHost: string): RelayResponse {
  if (outcome.kind === 'report') {
    return {
      status: 200,
      body: { ok: true, station: outcome.station, metar: outcome.report, cached: outcome.cached },
    };
  }

  const { kind } = outcome.failure;
  return {
    status: STATUS_BY_FAILURE[kind],
    body: { ok: false, error: failureMessage(kind, upstreamHost) },
  };
}
