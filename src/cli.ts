/**
 * CLI argument parsing
 */

import { resolve } from 'path';
import type { RelayConfig } from './config.js';
import type { StoreKind } from './storage/kv-store.js';

// ============================================
// CLI Arguments
// ============================================

export interface CliArgs {
  command: 'serve' | 'fetch' | 'help';
  /** Station for `fetch` */
  station?: string;
  config: RelayConfig;
  errors: string[];
}

const STORE_KINDS: readonly StoreKind[] = ['file', 'sqlite', 'memory'];

function isStoreKind(value: string): value is StoreKind {
  return STORE_KINDS.some((kind) => kind === value);
}

/**
 * Apply command-line arguments over an already resolved config. Unknown
 * flags and bad values are collected in `errors` rather than thrown.
 */
export function parseArgs(argv: string[], base: RelayConfig): CliArgs {
  const result: CliArgs = {
    command: 'serve',
    config: { ...base, upstream: { ...base.upstream } },
    errors: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'help') {
      result.command = arg;
    } else if (arg === 'fetch') {
      result.command = 'fetch';
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        result.station = next;
        i++;
      }
    } else if (arg === '--port' || arg === '-p') {
      const port = Number(argv[++i]);
      if (Number.isInteger(port) && port >= 0 && port <= 65535) {
        result.config.port = port;
      } else {
        result.errors.push(`Invalid port: ${argv[i] ?? '(missing)'}`);
      }
    } else if (arg === '--host') {
      const host = argv[++i];
      if (host) result.config.host = host;
      else result.errors.push('Missing value for --host');
    } else if (arg === '--store') {
      const store = argv[++i] ?? '';
      if (isStoreKind(store)) result.config.store = store;
      else result.errors.push(`Invalid store: ${store || '(missing)'} (expected ${STORE_KINDS.join(', ')})`);
    } else if (arg === '--cache-dir') {
      const dir = argv[++i];
      if (dir) result.config.cacheDir = resolve(dir);
      else result.errors.push('Missing value for --cache-dir');
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      result.errors.push(`Unknown argument: ${arg}`);
    }
  }

  if (result.command === 'fetch' && result.station === undefined) {
    result.errors.push('fetch requires a station, e.g. `metar-relay fetch KPIT`');
  }

  return result;
}

export const HELP_TEXT = `
METAR Relay - cached raw METAR reports as JSON

Usage: metar-relay [command] [options]

Commands:
  serve            Start the HTTP relay (default)
  fetch <station>  Resolve one station through the relay and print the JSON envelope
  help             Show this help message

Options:
  -p, --port <port>      Server port (default: 3001)
  --host <host>          Bind address (default: localhost)
  --store <kind>         Cache backend: file, sqlite or memory (default: file)
  --cache-dir <dir>      Cache directory (default: .metar-cache)
  -h, --help             Show help

Environment:
  METAR_RELAY_PORT, METAR_RELAY_HOST, METAR_RELAY_STORE, METAR_RELAY_CACHE_DIR,
  METAR_RELAY_TTL_SECONDS, METAR_RELAY_TIMEOUT_MS, METAR_RELAY_UPSTREAM_URL,
  METAR_RELAY_USER_AGENT

Examples:
  metar-relay                      Serve on localhost:3001
  metar-relay -p 8080 --store sqlite
  metar-relay fetch KPIT
`;
