#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { getPackageVersion } from './utils/version.js';

const server = new McpServer({
  name: 'stencil-sync',
  version: getPackageVersion(),
});

registerAllTools(server);

const transport = new StdioServerTransport();
await server.connect(transport);
