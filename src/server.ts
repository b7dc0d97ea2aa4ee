import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { dispatchTool, formatToolFailure } from './dispatcher.js';
import { listTools } from './tools/index.js';
import type { ToolContext } from './types/tools.js';
import type { ConnectionManager } from './utils/connectionManager.js';
import { FieldMetadataCache } from './utils/fieldCache.js';

export const SERVER_NAME = 'salesforce-mcp';
export const SERVER_VERSION = '0.1.0';

export function createToolContext(connection: ConnectionManager): ToolContext {
  return {
    connection,
    fieldCache: new FieldMetadataCache(),
  };
}

/**
 * MCP server exposing the Salesforce tools over whatever transport it is
 * connected to
 */
export function createSalesforceServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await dispatchTool(context, name, args ?? {});

    if (result.ok) {
      return {
        content: [{ type: 'text', text: result.text }],
        isError: false,
      };
    }

    return {
      content: [{ type: 'text', text: formatToolFailure(result) }],
      isError: true,
    };
  });

  return server;
}
