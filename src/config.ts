/**
 * Relay configuration
 * Defaults, overridden by METAR_RELAY_* environment variables
 */

import { z } from 'zod';
import type { StoreKind } from './storage/kv-store.js';
import { DEFAULT_UPSTREAM_CONFIG, type UpstreamConfig } from './relay/upstream-client.js';
import { DEFAULT_TTL_SECONDS } from './storage/report-cache.js';

// ============================================
// Types
// ============================================

export interface RelayConfig {
  port: number;
  host: string;
  store: StoreKind;
  cacheDir: string;
  ttlSeconds: number;
  upstream: UpstreamConfig;
}

export const DEFAULT_CONFIG: RelayConfig = {
  port: 3001,
  host: 'localhost',
  store: 'file',
  cacheDir: '.metar-cache',
  ttlSeconds: DEFAULT_TTL_SECONDS,
  upstream: DEFAULT_UPSTREAM_CONFIG,
};

const port = z.coerce.number().int().min(0).max(65535);

const EnvSchema = z.object({
  METAR_RELAY_PORT: port.optional(),
  METAR_RELAY_HOST: z.string().min(1).optional(),
  METAR_RELAY_STORE: z.enum(['file', 'sqlite', 'memory']).optional(),
  METAR_RELAY_CACHE_DIR: z.string().min(1).optional(),
  METAR_RELAY_TTL_SECONDS: z.coerce.number().int().nonnegative().optional(),
  METAR_RELAY_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  METAR_RELAY_UPSTREAM_URL: z.string().url().optional(),
  METAR_RELAY_USER_AGENT: z.string().min(1).optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Resolve configuration from an environment map. Blank variables count as
 * unset; invalid ones throw a ConfigError naming the variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('METAR_RELAY_') && value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.METAR_RELAY_PORT ?? DEFAULT_CONFIG.port,
    host: vars.METAR_RELAY_HOST ?? DEFAULT_CONFIG.host,
    store: vars.METAR_RELAY_STORE ?? DEFAULT_CONFIG.store,
    cacheDir: vars.METAR_RELAY_CACHE_DIR ?? DEFAULT_CONFIG.cacheDir,
    ttlSeconds: vars.METAR_RELAY_TTL_SECONDS ?? DEFAULT_CONFIG.ttlSeconds,
    upstream: {
      ...DEFAULT_CONFIG.upstream,
      url: vars.METAR_RELAY_UPSTREAM_URL ?? DEFAULT_CONFIG.upstream.url,
      userAgent: vars.METAR_RELAY_USER_AGENT ?? DEFAULT_CONFIG.upstream.userAgent,
      timeoutMs: vars.METAR_RELAY_TIMEOUT_MS ?? DEFAULT_CONFIG.upstream.timeoutMs,
    },
  };
}
