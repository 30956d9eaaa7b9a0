/**
 * MCP tool helpers
 * Query a running relay and turn its envelope into tool text
 */

import { z } from 'zod';
import type { FetchFunction } from '../relay/upstream-client.js';

const EnvelopeSchema = z.union([
  z.object({ ok: z.literal(true), station: z.string(), metar: z.string(), cached: z.boolean() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export type RelayEnvelope = z.infer<typeof EnvelopeSchema>;

export function describeEnvelope(envelope: RelayEnvelope): string {
  if (!envelope.ok) {
    return `Error: ${envelope.error}`;
  }
  return envelope.cached ? `(cached) ${envelope.metar}` : envelope.metar;
}

/**
 * Call `/api/metar` on the relay. Error statuses still carry an envelope,
 * so the body is parsed whatever the status.
 */
export async function queryRelay(
  apiBase: string,
  station: string,
  fetcher: FetchFunction = fetch,
): Promise<{ text: string; isError: boolean }> {
  const res = await fetcher(`${apiBase}/api/metar?station=${encodeURIComponent(station)}`);
  const parsed = EnvelopeSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`Unexpected relay response (${res.status})`);
  }
  return { text: describeEnvelope(parsed.data), isError: !parsed.data.ok };
}
