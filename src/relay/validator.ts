/**
 * Station Validator
 * Normalizes raw station input and checks it against the ICAO code shape
 */

import type { Result, StationId } from '../types/index.js';

const STATION_PATTERN = /^[A-Z0-9]{4}$/;
// Checked before uppercasing, which would otherwise fold e.g. `ß` or `ı` into ASCII
const RAW_STATION_PATTERN = /^[A-Za-z0-9]{4}$/;

export function isStationId(value: string): value is StationId {
  return STATION_PATTERN.test(value);
}

/**
 * Trim and uppercase a raw station value. Anything that is not a string
 * (a missing query parameter, a parsed object) is treated as empty.
 * Only ASCII letters and digits are accepted.
 */
export function validateStation(raw: unknown): Result<StationId> {
  const trimmed = typeof raw === 'string' ? raw.trim() : '';
  const station = RAW_STATION_PATTERN.test(trimmed) ? trimmed.toUpperCase() : '';

  if (!isStationId(station)) {
    return {
      ok: false,
      error: { kind: 'InvalidStation', detail: trimmed === '' ? 'empty station' : `rejected "${trimmed}"` },
    };
  }

  return { ok: true, value: station };
}
