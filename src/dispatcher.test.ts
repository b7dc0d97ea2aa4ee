import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { dispatchTool, formatToolFailure } from './dispatcher.js';
import {
  FakeSalesforceClient,
  connectedContext,
  createFakeConnector,
  parseJsonBody,
  queryResult,
} from './testing/fakeSalesforce.js';
import type { SalesforceDescribeResponse } from './types/salesforce.js';
import type { ToolContext } from './types/tools.js';
import { ConnectionManager } from './utils/connectionManager.js';
import { FieldMetadataCache } from './utils/fieldCache.js';

const ACCOUNT_DESCRIBE: SalesforceDescribeResponse = {
  name: 'Account',
  label: 'Account',
  custom: false,
  fields: [
    {
      name: 'Id',
      label: 'Account ID',
      type: 'id',
      nillable: false,
      createable: false,
      updateable: false,
      custom: false,
      length: 18,
    },
    {
      name: 'Industry',
      label: 'Industry',
      type: 'picklist',
      nillable: true,
      createable: true,
      updateable: true,
      custom: false,
      length: 255,
      picklistValues: [{ value: 'Banking', label: 'Banking', active: true }],
    },
  ],
  recordTypeInfos: [],
};

describe('dispatchTool', () => {
  let client: FakeSalesforceClient;
  let context: ToolContext;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    client = new FakeSalesforceClient();
    context = connectedContext(client);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ==========================================
  // Failures
  // ==========================================

  describe('failures', () => {
    it('reports a connection failure when Salesforce was never reached', async () => {
      const disconnected: ToolContext = {
        connection: new ConnectionManager(createFakeConnector(client)),
        fieldCache: new FieldMetadataCache(),
      };

      const result = await dispatchTool(disconnected, 'run_soql_query', { query: 'SELECT Id FROM Account' });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'connection', message: 'Salesforce connection not established.' },
      });
      expect(client.query).not.toHaveBeenCalled();
    });

    it('rejects invalid arguments before calling Salesforce', async () => {
      const result = await dispatchTool(context, 'update_record', {
        object_name: 'Account',
        data: { Name: 'Acme' },
      });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'invalid_arguments',
          message: 'Invalid arguments for update_record: record_id: Required',
        },
      });
      expect(client.update).not.toHaveBeenCalled();
    });

    it('validates arguments even when not connected', async () => {
      const disconnected: ToolContext = {
        connection: new ConnectionManager(createFakeConnector(client)),
        fieldCache: new FieldMetadataCache(),
      };

      const result = await dispatchTool(disconnected, 'get_record', { object_name: 'Account' });

      expect(result.ok ? undefined : result.error.kind).toBe('invalid_arguments');
    });

    it('reports unknown tools', async () => {
      const result = await dispatchTool(context, 'create_case', {});

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unknown_tool', message: 'Unknown tool: create_case' },
      });
    });

    it('passes Salesforce errors through with their code', async () => {
      client.query.mockRejectedValue(
        Object.assign(new Error("unexpected token: 'FORM'"), { errorCode: 'MALFORMED_QUERY' })
      );

      const result = await dispatchTool(context, 'run_soql_query', { query: 'SELECT Id FORM Account' });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'remote', message: "[MALFORMED_QUERY] unexpected token: 'FORM'" },
      });
    });

    it('reports an expired session as a connection failure', async () => {
      client.query.mockRejectedValue(
        Object.assign(new Error('Session expired or invalid'), { errorCode: 'INVALID_SESSION_ID' })
      );

      const result = await dispatchTool(context, 'run_soql_query', { query: 'SELECT Id FROM Account' });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'connection',
          message: 'Your Salesforce session has expired. Please re-authenticate to continue.',
        },
      });
    });

    it('turns unsuccessful save results into remote errors', async () => {
      client.create.mockResolvedValue({
        success: false,
        errors: [
          {
            message: 'Required fields are missing: [LastName]',
            statusCode: 'REQUIRED_FIELD_MISSING',
            fields: ['LastName'],
          },
        ],
      });

      const result = await dispatchTool(context, 'create_record', {
        object_name: 'Contact',
        data: { FirstName: 'Ada' },
      });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'remote',
          message:
            'Failed to create Contact record: Required fields are missing: [LastName] (Field: LastName) [REQUIRED_FIELD_MISSING]',
        },
      });
    });

    it('renders failures as JSON with error and kind', () => {
      expect(
        formatToolFailure({ ok: false, error: { kind: 'unknown_tool', message: 'Unknown tool: x' } })
      ).toBe('{\n  "error": "Unknown tool: x",\n  "kind": "unknown_tool"\n}');
    });
  });

  // ==========================================
  // Records
  // ==========================================

  describe('records', () => {
    it('runs SOQL queries as given', async () => {
      client.query.mockResolvedValue(queryResult([{ Id: '001000000000001AAA', Name: 'Acme' }]));

      const result = await dispatchTool(context, 'run_soql_query', { query: 'SELECT Id, Name FROM Account' });

      expect(client.query).toHaveBeenCalledWith('SELECT Id, Name FROM Account');
      expect(result.ok).toBe(true);
      expect(result.ok ? parseJsonBody(result.text) : undefined).toEqual({
        totalSize: 1,
        done: true,
        records: [{ Id: '001000000000001AAA', Name: 'Acme' }],
      });
    });

    it('sends the record Id with the update', async () => {
      client.update.mockResolvedValue({ success: true, id: '001000000000001AAA', errors: [] });

      const result = await dispatchTool(context, 'update_record', {
        object_name: 'Account',
        record_id: '001000000000001AAA',
        data: { Name: 'Acme Corp' },
      });

      expect(client.update).toHaveBeenCalledWith('Account', { Name: 'Acme Corp', Id: '001000000000001AAA' });
      expect(result.ok ? result.text.split('\n')[0] : undefined).toBe('Update Account Record Result (JSON):');
    });
  });

  // ==========================================
  // Field metadata memo
  // ==========================================

  describe('get_object_fields', () => {
    it('describes each object once', async () => {
      client.describe.mockResolvedValue(ACCOUNT_DESCRIBE);

      const first = await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });
      const second = await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });

      expect(client.describe).toHaveBeenCalledTimes(1);
      expect(second).toEqual(first);
      expect(first.ok ? parseJsonBody(first.text) : undefined).toEqual([
        {
          name: 'Id',
          label: 'Account ID',
          type: 'id',
          nillable: false,
          createable: false,
          updateable: false,
          length: 18,
          picklistValues: [],
        },
        {
          name: 'Industry',
          label: 'Industry',
          type: 'picklist',
          nillable: true,
          createable: true,
          updateable: true,
          length: 255,
          picklistValues: [{ value: 'Banking', label: 'Banking', active: true }],
        },
      ]);
    });

    it('describes again when refresh is set', async () => {
      client.describe.mockResolvedValue(ACCOUNT_DESCRIBE);

      await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });
      await dispatchTool(context, 'get_object_fields', { object_name: 'Account', refresh: true });

      expect(client.describe).toHaveBeenCalledTimes(2);
    });

    it('does not cache a failed describe', async () => {
      client.describe
        .mockRejectedValueOnce(Object.assign(new Error('sObject type not supported'), { errorCode: 'NOT_FOUND' }))
        .mockResolvedValueOnce(ACCOUNT_DESCRIBE);

      const failed = await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });
      const retried = await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });

      expect(failed.ok).toBe(false);
      expect(retried.ok).toBe(true);
      expect(context.fieldCache.get('Account')).toHaveLength(2);
    });

    it('forgets an object after a custom field is created on it', async () => {
      client.describe.mockResolvedValue(ACCOUNT_DESCRIBE);
      client.request.mockResolvedValue({ id: '00N000000000001AAA', success: true, errors: [] });

      await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });
      await dispatchTool(context, 'create_custom_field', {
        object_name: 'Account',
        field_name: 'Score',
        label: 'Score',
        type: 'Number',
      });
      await dispatchTool(context, 'get_object_fields', { object_name: 'Account' });

      expect(client.describe).toHaveBeenCalledTimes(2);
    });
  });

  // ==========================================
  // Bulk
  // ==========================================

  describe('bulk tools', () => {
    it('reports one outcome per record in input order', async () => {
      client.bulkLoad.mockResolvedValue([
        { id: '003000000000001AAA', success: true, errors: [] },
        { id: null, success: false, errors: ['REQUIRED_FIELD_MISSING:Required fields are missing: [LastName]'] },
        { id: '003000000000003AAA', success: true, errors: [] },
      ]);
      const records = [{ LastName: 'A' }, { FirstName: 'B' }, { LastName: 'C' }];

      const result = await dispatchTool(context, 'bulk_create_records', { object_name: 'Contact', records });

      expect(client.bulkLoad).toHaveBeenCalledWith('Contact', 'insert', records);
      expect(result.ok ? result.text.split('\n')[0] : undefined).toBe('Bulk INSERT Contact Result (JSON):');
      expect(result.ok ? parseJsonBody(result.text) : undefined).toEqual({
        object: 'Contact',
        operation: 'insert',
        processed: 3,
        succeeded: 2,
        failed: 1,
        results: [
          { index: 0, id: '003000000000001AAA', success: true, errors: [] },
          {
            index: 1,
            id: null,
            success: false,
            errors: ['REQUIRED_FIELD_MISSING:Required fields are missing: [LastName]'],
          },
          { index: 2, id: '003000000000003AAA', success: true, errors: [] },
        ],
      });
    });

    it('marks records without a batch result as failed', async () => {
      client.bulkLoad.mockResolvedValue([{ id: '003000000000001AAA', success: true, errors: [] }]);

      const result = await dispatchTool(context, 'bulk_update_records', {
        object_name: 'Contact',
        records: [
          { Id: '003000000000001AAA', Title: 'CEO' },
          { Id: '003000000000002AAA', Title: 'CTO' },
        ],
      });

      expect(result.ok ? parseJsonBody(result.text) : undefined).toMatchObject({
        processed: 2,
        succeeded: 1,
        failed: 1,
        results: [
          { index: 0, success: true },
          { index: 1, id: null, success: false, errors: ['No result returned for this record'] },
        ],
      });
    });

    it('sends only Ids for deletes', async () => {
      client.bulkLoad.mockResolvedValue([{ id: '003000000000001AAA', success: true, errors: [] }]);

      await dispatchTool(context, 'bulk_delete_records', {
        object_name: 'Contact',
        records: [{ Id: '003000000000001AAA', LastName: 'A' }],
      });

      expect(client.bulkLoad).toHaveBeenCalledWith('Contact', 'delete', [{ Id: '003000000000001AAA' }]);
    });

    it('requires a valid Id on every record to update', async () => {
      const result = await dispatchTool(context, 'bulk_update_records', {
        object_name: 'Contact',
        records: [{ Id: 'bad' }],
      });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'invalid_arguments',
          message: 'Invalid arguments for bulk_update_records: records.0.Id: must be a 15 or 18 character Salesforce ID',
        },
      });
      expect(client.bulkLoad).not.toHaveBeenCalled();
    });

    it('rejects an empty batch', async () => {
      const result = await dispatchTool(context, 'bulk_create_records', { object_name: 'Contact', records: [] });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'invalid_arguments',
          message: 'Invalid arguments for bulk_create_records: records: must contain at least one record',
        },
      });
    });
  });

  // ==========================================
  // CSV export
  // ==========================================

  describe('export_data_csv', () => {
    it('writes the query result as CSV in SELECT order', async () => {
      client.query.mockResolvedValue(
        queryResult([
          { attributes: { type: 'Account' }, Id: '001000000000001AAA', Name: 'Acme, Inc.' },
          { attributes: { type: 'Account' }, Id: '001000000000002AAA', Name: 'Globex' },
        ])
      );

      const result = await dispatchTool(context, 'export_data_csv', { query: 'SELECT Id, Name FROM Account' });

      expect(result).toEqual({
        ok: true,
        text: 'Id,Name\n001000000000001AAA,"Acme, Inc."\n001000000000002AAA,Globex',
      });
    });

    it('writes only the header when nothing matches', async () => {
      const result = await dispatchTool(context, 'export_data_csv', {
        query: "SELECT Id, Name FROM Account WHERE Name = 'Nobody'",
      });

      expect(result).toEqual({ ok: true, text: 'Id,Name' });
    });

    it('rejects queries without a SELECT list', async () => {
      const result = await dispatchTool(context, 'export_data_csv', { query: 'FIND {Acme}' });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'invalid_arguments',
          message: 'query must be a SELECT ... FROM ... statement with at least one field',
        },
      });
      expect(client.query).not.toHaveBeenCalled();
    });
  });

  // ==========================================
  // Field-level security
  // ==========================================

  describe('set_field_permissions', () => {
    it('updates existing permissions and creates missing ones', async () => {
      client.query.mockImplementation(async (soql: string) => {
        if (soql.includes('IsOwnedByProfile = true')) {
          return queryResult([{ Id: '0PS000000000001AAA', Profile: { Name: 'System Administrator' } }]);
        }
        if (soql.includes('IsOwnedByProfile = false')) {
          return queryResult([{ Id: '0PS000000000002AAA', Name: 'Sales_Ops' }]);
        }
        if (soql.includes('FROM FieldPermissions')) {
          return queryResult([{ Id: '01k000000000001AAA', ParentId: '0PS000000000001AAA' }]);
        }
        return queryResult([]);
      });
      client.update.mockResolvedValue({ success: true, id: '01k000000000001AAA', errors: [] });
      client.create.mockResolvedValue({ success: true, id: '01k000000000002AAA', errors: [] });

      const result = await dispatchTool(context, 'set_field_permissions', {
        object_name: 'Account',
        field_name: 'Score__c',
        profile_names: ['System Administrator'],
        permission_set_names: ['Sales_Ops', 'Missing_Set'],
        read: false,
        edit: true,
      });

      expect(client.update).toHaveBeenCalledWith('FieldPermissions', {
        Id: '01k000000000001AAA',
        PermissionsRead: true,
        PermissionsEdit: true,
      });
      expect(client.create).toHaveBeenCalledWith('FieldPermissions', {
        ParentId: '0PS000000000002AAA',
        SobjectType: 'Account',
        Field: 'Account.Score__c',
        PermissionsRead: true,
        PermissionsEdit: true,
      });
      expect(result.ok ? parseJsonBody(result.text) : undefined).toEqual({
        field: 'Account.Score__c',
        read: true,
        edit: true,
        results: [
          { parent: 'System Administrator', kind: 'profile', action: 'updated', success: true },
          { parent: 'Sales_Ops', kind: 'permissionSet', action: 'created', success: true },
        ],
        notFound: ['Missing_Set'],
      });
    });

    it('keeps going when one parent fails', async () => {
      client.query.mockImplementation(async (soql: string) =>
        soql.includes('IsOwnedByProfile = true')
          ? queryResult([
              { Id: '0PS000000000001AAA', Profile: { Name: 'Standard User' } },
              { Id: '0PS000000000003AAA', Profile: { Name: 'Read Only' } },
            ])
          : queryResult([])
      );
      client.create
        .mockRejectedValueOnce(Object.assign(new Error('insufficient access'), { errorCode: 'INSUFFICIENT_ACCESS' }))
        .mockResolvedValueOnce({ success: true, id: '01k000000000004AAA', errors: [] });

      const result = await dispatchTool(context, 'set_field_permissions', {
        object_name: 'Account',
        field_name: 'Score__c',
        profile_names: ['Standard User', 'Read Only'],
      });

      expect(result.ok ? parseJsonBody(result.text) : undefined).toEqual({
        field: 'Account.Score__c',
        read: true,
        edit: false,
        results: [
          {
            parent: 'Standard User',
            kind: 'profile',
            action: 'created',
            success: false,
            error: '[INSUFFICIENT_ACCESS] insufficient access',
          },
          { parent: 'Read Only', kind: 'profile', action: 'created', success: true },
        ],
        notFound: [],
      });
    });

    it('needs at least one profile or permission set', async () => {
      const result = await dispatchTool(context, 'set_field_permissions', {
        object_name: 'Account',
        field_name: 'Score__c',
      });

      expect(result.ok ? undefined : result.error).toEqual({
        kind: 'invalid_arguments',
        message:
          'Invalid arguments for set_field_permissions: profile_names or permission_set_names must name at least one profile or permission set',
      });
    });
  });

  // ==========================================
  // Raw requests
  // ==========================================

  describe('escape hatches', () => {
    it('builds REST paths with query parameters', async () => {
      client.request.mockResolvedValue({ totalSize: 0, done: true, records: [] });

      await dispatchTool(context, 'restful', {
        path: 'query',
        params: { q: 'SELECT Id FROM Account', limit: 5 },
      });

      expect(client.request).toHaveBeenCalledWith({
        method: 'GET',
        url: '/query?q=SELECT+Id+FROM+Account&limit=5',
        body: undefined,
      });
    });

    it('calls Apex REST endpoints below /services/apexrest', async () => {
      client.request.mockResolvedValue({ status: 'ok' });

      const result = await dispatchTool(context, 'apex_execute', {
        action: '/MyService/42',
        method: 'post',
        data: { name: 'Widget' },
      });

      expect(client.request).toHaveBeenCalledWith({
        method: 'POST',
        url: '/services/apexrest/MyService/42',
        body: { name: 'Widget' },
      });
      expect(result).toEqual({
        ok: true,
        text: 'Apex Execute Result (JSON):\n{\n  "status": "ok"\n}',
      });
    });

    it('sends Tooling requests below /tooling', async () => {
      client.request.mockResolvedValue(undefined);

      const result = await dispatchTool(context, 'tooling_execute', {
        action: 'sobjects/ApexClass/01p000000000001AAA',
        method: 'DELETE',
      });

      expect(client.request).toHaveBeenCalledWith({
        method: 'DELETE',
        url: '/tooling/sobjects/ApexClass/01p000000000001AAA',
        body: undefined,
      });
      expect(result).toEqual({ ok: true, text: 'Tooling Execute Result (JSON):\nnull' });
    });
  });
});
