#!/usr/bin/env node
/**
 * cad-relay MCP Server
 *
 * Exposes the host add-in's modeling operations as MCP tools.
 * Runs over stdio transport; the host add-in must be listening.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Bridge } from './bridge.js';
import { loadConfig } from './config.js';
import { HostClient } from './host-client.js';
import { createLogger } from './logger.js';
import { registerTools } from './tools.js';

const config = loadConfig();
const logger = createLogger(config.logLevel);

const client = new HostClient({ url: config.hostUrl, requestTimeoutMs: config.requestTimeoutMs }, logger);
const bridge = new Bridge(client, logger.child({ component: 'bridge' }), { encoding: config.encoding });

const server = new McpServer({
  name: 'cad-relay',
  version: '0.1.0',
});

registerTools(server, bridge);

if (!(await client.health())) {
  logger.warn({ url: client.url }, 'host add-in not reachable yet; tool calls will fail until it starts');
}

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info({ url: client.url, encoding: bridge.encoding }, 'bridge ready on stdio');
