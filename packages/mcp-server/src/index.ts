#!/usr/bin/env node
/**
 * fan-duct MCP Server
 *
 * Exposes the fan duct pipeline (build, query, mesh, export) as tools.
 * Runs over stdio, so stdout carries protocol only; diagnostics go to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer } from './server.js';

const server = createServer();
const transport = new StdioServerTransport();

try {
  await server.connect(transport);
} catch (err) {
  console.error(`fan-duct MCP server failed to start: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
