import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFakeConnector, FakeSalesforceClient } from '../testing/fakeSalesforce.js';
import { ConnectionManager } from './connectionManager.js';
import { ConnectionError } from './errorHandler.js';

describe('ConnectionManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports not connected before connect is called', () => {
    const manager = new ConnectionManager(createFakeConnector(new FakeSalesforceClient()));

    expect(() => manager.getClient()).toThrow('Salesforce connection not established.');
  });

  it('hands out the connected client', async () => {
    const client = new FakeSalesforceClient();
    const manager = new ConnectionManager(createFakeConnector(client));

    const connected = await manager.connect({
      SALESFORCE_ACCESS_TOKEN: 'test-access-token',
      SALESFORCE_INSTANCE_URL: 'https://example.my.salesforce.com',
    });

    expect(connected).toBe(true);
    expect(manager.getClient()).toBe(client);
  });

  it('records a configuration failure instead of throwing', async () => {
    const manager = new ConnectionManager(createFakeConnector(new FakeSalesforceClient()));

    await expect(manager.connect({})).resolves.toBe(false);

    expect(() => manager.getClient()).toThrow(ConnectionError);
    expect(() => manager.getClient()).toThrow(/SALESFORCE_ACCESS_TOKEN/);
  });

  it('records a rejected login with a readable reason', async () => {
    const connector = createFakeConnector(new FakeSalesforceClient());
    connector.login.mockRejectedValue(
      new Error('INVALID_LOGIN: Invalid username, password, security token; or user locked out.')
    );
    const manager = new ConnectionManager(connector);

    const connected = await manager.connect({
      SALESFORCE_USERNAME: 'user@example.com',
      SALESFORCE_PASSWORD: 'test-password',
      SALESFORCE_SECURITY_TOKEN: 'test-token',
    });

    expect(connected).toBe(false);
    expect(connector.login).toHaveBeenCalledTimes(1);
    expect(() => manager.getClient()).toThrow(
      'Salesforce connection not established: Invalid username, password, or security token. Please verify your credentials.'
    );
  });
});
