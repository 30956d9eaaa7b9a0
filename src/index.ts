#!/usr/bin/env node
/**
 * METAR Relay - Main Entry Point
 * Provides CLI for starting the relay server or resolving a single station
 */

import { createRelayApp } from './app.js';
import { HELP_TEXT, parseArgs } from './cli.js';
import { loadConfig, type RelayConfig } from './config.js';
import { ApiServer } from './server/index.js';

// ============================================
// Commands
// ============================================

async function runFetch(config: RelayConfig, station: string): Promise<boolean> {
  const app = createRelayApp(config);
  try {
    const { status, body } = await app.relay.handle(station);
    console.log(`HTTP ${status}`);
    console.log(JSON.stringify(body, null, 2));
    return body.ok;
  } finally {
    app.close();
  }
}

async function runServe(config: RelayConfig): Promise<void> {
  console.log('Starting METAR relay...');
  console.log(`Cache: ${config.store}${config.store === 'memory' ? '' : ` (${config.cacheDir})`}, TTL ${config.ttlSeconds}s`);
  console.log(`Upstream: ${config.upstream.url}`);

  const app = createRelayApp(config);
  const server = new ApiServer(app.relay, { port: config.port, host: config.host });
  await server.start();

  console.log(`
METAR relay running!

Endpoints:
  GET /api/metar?station=KPIT - Raw METAR as JSON
  GET /api/health             - Health check
  GET /api/stats              - Relay counters

Press Ctrl+C to stop
`);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`\nReceived ${signal}, shutting down...`);
    try {
      await server.stop();
    } catch (error) {
      console.error('Error stopping server:', error);
      process.exitCode = 1;
    } finally {
      app.close();
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), loadConfig());

  if (args.errors.length > 0) {
    for (const error of args.errors) {
      console.error(`Error: ${error}`);
    }
    console.error('Run with --help for usage.');
    process.exitCode = 1;
    return;
  }

  switch (args.command) {
    case 'help':
      console.log(HELP_TEXT);
      break;

    case 'fetch':
      if (!(await runFetch(args.config, args.station ?? ''))) {
        process.exitCode = 1;
      }
      break;

    case 'serve':
      await runServe(args.config);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
