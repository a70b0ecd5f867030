#!/usr/bin/env node
/**
 * meshwork MCP Server
 *
 * Wraps the mesh kernel as 9 callable tools for LLM agents.
 * Runs over stdio transport; diagnostics go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools } from './tools.js';
import { loadConfig } from './config.js';
import type { ServerConfig } from './config.js';

let config: ServerConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

const server = new McpServer({
  name: 'meshwork',
  version: '0.1.0',
});

registerTools(server, config);

const transport = new StdioServerTransport();
await server.connect(transport);

console.error(
  `meshwork MCP server ready (mesh dir: ${config.meshDir}, statistics: ${config.statsExecutor}` +
  `${config.statsWorkers !== undefined ? ` x${config.statsWorkers}` : ''})`
);
