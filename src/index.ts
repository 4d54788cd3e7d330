#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { sessionFromEnv } from './lib/cli.js';
import { executeAuthStatus } from './lib/tools/auth-status.js';
import { organizationsArgsSchema, executeOrganizations } from './lib/tools/organizations.js';
import { productsArgsSchema, executeProducts } from './lib/tools/products.js';
import { tenantsArgsSchema, executeTenants } from './lib/tools/tenants.js';
import { TOOL_DEFINITIONS, executeServerInfo } from './lib/tools/server-info.js';

// Validate config at startup; the session (and its token) lives for the server's lifetime
const session = sessionFromEnv();

const server = new Server(
  { name: 'cloudiq-mcp', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOL_DEFINITIONS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args = {} } = request.params;

  try {
    let result: string;
    switch (name) {
      case 'ciq_auth_status':
        result = await executeAuthStatus(session);
        break;
      case 'ciq_organizations':
        result = await executeOrganizations(session, organizationsArgsSchema.parse(args));
        break;
      case 'ciq_products':
        result = await executeProducts(session, productsArgsSchema.parse(args));
        break;
      case 'ciq_tenants':
        result = await executeTenants(session, tenantsArgsSchema.parse(args));
        break;
      case 'ciq_server_info':
        result = await executeServerInfo(session);
        break;
      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }

    return { content: [{ type: 'text', text: result }] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${message}\n\nTip: Use ciq_auth_status to check your connection.`,
        },
      ],
      isError: true,
    };
  }
});

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
