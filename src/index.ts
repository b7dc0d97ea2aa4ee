#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import dotenv from 'dotenv';
import { createSalesforceServer, createToolContext, SERVER_NAME } from './server.js';
import { ConnectionManager } from './utils/connectionManager.js';
import { createJsforceConnector } from './utils/jsforceClient.js';

dotenv.config();

async function main(): Promise<void> {
  const connection = new ConnectionManager(
    createJsforceConnector({ version: process.env.SALESFORCE_API_VERSION })
  );

  // A failed connection is recorded; tools report it on each call
  await connection.connect(process.env);

  const server = createSalesforceServer(createToolContext(connection));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} running on stdio`);
}

main().catch((error) => {
  console.error('Fatal error running server:', error);
  process.exit(1);
});
