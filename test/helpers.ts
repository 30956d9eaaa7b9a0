/**
 * Shared test doubles: upstream fakes, failing stores, station ids
 */

import type { FetchFunction } from '../src/relay/upstream-client.js';
import { validateStation } from '../src/relay/validator.js';
import type { KeyValueStore } from '../src/storage/kv-store.js';
import type { StationId } from '../src/types/index.js';

export const KPIT_METAR = 'KPIT 011651Z 00000KT 10SM CLR 22/14 A3002';

export function stationId(raw: string): StationId {
  const result = validateStation(raw);
  if (!result.ok) {
    throw new Error(`Test station "${raw}" is invalid`);
  }
  return result.value;
}

export interface FakeUpstream {
  fetcher: FetchFunction;
  calls: Array<{ url: string; init?: RequestInit }>;
}

/**
 * Fetch fake that records every call and answers with `reply`
 */
export function fakeUpstream(reply: (url: string) => Response | Promise<Response>): FakeUpstream {
  const calls: FakeUpstream['calls'] = [];
  const fetcher: FetchFunction = async (url, init) => {
    calls.push({ url, init });
    return reply(url);
  };
  return { fetcher, calls };
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

/**
 * Fetch fake that never answers and rejects once its signal aborts
 */
export function hangingUpstream(): FakeUpstream {
  const calls: FakeUpstream['calls'] = [];
  const fetcher: FetchFunction = (url, init) => {
    calls.push({ url, init });
    return new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
    });
  };
  return { fetcher, calls };
}

export class FailingWriteStore implements KeyValueStore {
  async get(): Promise<string | undefined> {
    return undefined;
  }

  async set(): Promise<void> {
    throw new Error('disk full');
  }
}

export class FailingReadStore implements KeyValueStore {
  writes = 0;

  async get(): Promise<string | undefined> {
    throw new Error('permission denied');
  }

  async set(): Promise<void> {
    this.writes++;
  }
}
