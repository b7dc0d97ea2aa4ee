import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createSalesforceServer, createToolContext } from './server.js';
import { FakeSalesforceClient, createFakeConnector, queryResult } from './testing/fakeSalesforce.js';
import { ConnectionManager } from './utils/connectionManager.js';

async function connectClient(connection: ConnectionManager): Promise<Client> {
  const server = createSalesforceServer(createToolContext(connection));
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

async function callText(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const block = result.content[0];
  return {
    isError: result.isError,
    text: block && block.type === 'text' ? block.text : undefined,
  };
}

describe('Salesforce MCP server', () => {
  let salesforce: FakeSalesforceClient;
  let client: Client | undefined;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    salesforce = new FakeSalesforceClient();
  });

  afterEach(async () => {
    await client?.close();
    client = undefined;
    vi.restoreAllMocks();
  });

  it('lists all tools', async () => {
    const connection = new ConnectionManager(createFakeConnector(salesforce));
    connection.useClient(salesforce);
    client = await connectClient(connection);

    const { tools } = await client.listTools();

    expect(tools).toHaveLength(25);
    expect(tools.map((tool) => tool.name)).toContain('export_data_csv');
  });

  it('returns tool output as text content', async () => {
    salesforce.query.mockResolvedValue(queryResult([{ Id: '001000000000001AAA' }]));
    const connection = new ConnectionManager(createFakeConnector(salesforce));
    connection.useClient(salesforce);
    client = await connectClient(connection);

    const result = await callText(client, 'export_data_csv', { query: 'SELECT Id FROM Account' });

    expect(result).toEqual({ isError: false, text: 'Id\n001000000000001AAA' });
  });

  it('flags failures with isError and a JSON body', async () => {
    const connection = new ConnectionManager(createFakeConnector(salesforce));
    await connection.connect({});
    client = await connectClient(connection);

    const result = await callText(client, 'run_soql_query', { query: 'SELECT Id FROM Account' });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text ?? '')).toMatchObject({ kind: 'connection' });
    expect(salesforce.query).not.toHaveBeenCalled();
  });

  it('keeps serving after an unknown tool', async () => {
    const connection = new ConnectionManager(createFakeConnector(salesforce));
    connection.useClient(salesforce);
    client = await connectClient(connection);

    const unknown = await callText(client, 'create_case', {});
    const listed = await client.listTools();

    expect(unknown).toEqual({
      isError: true,
      text: '{\n  "error": "Unknown tool: create_case",\n  "kind": "unknown_tool"\n}',
    });
    expect(listed.tools).toHaveLength(25);
  });
});
