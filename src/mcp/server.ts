/**
 * METAR Relay MCP Server
 * Exposes station lookups via Model Context Protocol
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { queryRelay } from './tools.js';

const API_BASE = process.env.METAR_RELAY_API || 'http://localhost:3001';

const server = new McpServer({
  name: 'metar-relay',
  version: '1.0.0',
});

// Tool: Latest raw METAR for one station
server.registerTool(
  'get_metar',
  {
    title: 'Get METAR',
    description: 'Fetch the latest raw METAR for a 4-character ICAO station code (e.g. KPIT)',
    inputSchema: {
      station: z.string().describe('ICAO station code'),
    },
  },
  async ({ station }) => {
    const { text, isError } = await queryRelay(API_BASE, station);
    return {
      content: [{ type: 'text', text }],
      isError,
    };
  }
);

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`METAR relay MCP server connected (API: ${API_BASE})`);
}

main().catch((error: unknown) => {
  console.error('MCP server error:', error);
  process.exit(1);
});
