/**
 * Application wiring
 * Builds the store, cache, upstream client and relay from a resolved config
 */

import type { RelayConfig } from './config.js';
import { ReportRelay, UpstreamClient, type Clock, type FetchFunction } from './relay/index.js';
import { createKeyValueStore, ReportCache, type KeyValueStore } from './storage/index.js';

export interface RelayApp {
  relay: ReportRelay;
  store: KeyValueStore;
  close(): void;
}

export interface RelayAppOptions {
  /** Replaces the configured backend, e.g. with an in-memory store */
  store?: KeyValueStore;
  fetcher?: FetchFunction;
  clock?: Clock;
}

export function createRelayApp(config: RelayConfig, options: RelayAppOptions = {}): RelayApp {
  const store = options.store ?? createKeyValueStore(config.store, config.cacheDir);
  const cache = new ReportCache(store, { ttlSeconds: config.ttlSeconds });
  const upstream = new UpstreamClient(config.upstream, options.fetcher);
  const relay = new ReportRelay({ cache, upstream, clock: options.clock });

  return {
    relay,
    store,
    close: () => store.close?.(),
  };
}
