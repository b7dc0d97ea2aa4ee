import jsforce, { type Connection } from 'jsforce';
import { z } from 'zod';
import type {
  BulkOperation,
  BulkRecordResult,
  DescribeGlobalResponse,
  IdentityInfo,
  QueryResult,
  RawRequest,
  SalesforceClient,
  SalesforceDescribeResponse,
  SaveResult,
  SearchResult,
  SObjectRecord,
} from '../types/salesforce.js';
import type { ConnectionOptions } from '../types/connection.js';
import type { SalesforceConnector } from './connection.js';

/**
 * Upper bound on rows pulled when following nextRecordsUrl
 */
export const MAX_QUERY_ROWS = 50000;

// Bulk API (v1) batch results arrive in input order; errors are plain strings
const bulkResultSchema = z.array(
  z.object({
    id: z.string().nullish(),
    success: z.boolean(),
    errors: z.array(z.string()).nullish(),
  })
);

/**
 * SalesforceClient backed by a jsforce Connection
 */
export class JsforceClient implements SalesforceClient {
  constructor(private readonly conn: Connection) {}

  get instanceUrl(): string {
    return this.conn.instanceUrl;
  }

  async query(soql: string): Promise<QueryResult> {
    return await this.conn.query(soql, { autoFetch: true, maxFetch: MAX_QUERY_ROWS });
  }

  async search(sosl: string): Promise<SearchResult> {
    return await this.conn.search(sosl);
  }

  async describe(objectName: string): Promise<SalesforceDescribeResponse> {
    return await this.conn.describe(objectName);
  }

  async describeGlobal(): Promise<DescribeGlobalResponse> {
    return await this.conn.describeGlobal();
  }

  async retrieve(objectName: string, recordId: string): Promise<SObjectRecord> {
    return await this.conn.retrieve(objectName, recordId);
  }

  async create(objectName: string, record: SObjectRecord): Promise<SaveResult> {
    return await this.conn.create(objectName, record);
  }

  async update(objectName: string, record: SObjectRecord & { Id: string }): Promise<SaveResult> {
    return await this.conn.update(objectName, record);
  }

  async destroy(objectName: string, recordId: string): Promise<SaveResult> {
    return await this.conn.destroy(objectName, recordId);
  }

  async bulkLoad(
    objectName: string,
    operation: BulkOperation,
    records: SObjectRecord[]
  ): Promise<BulkRecordResult[]> {
    const raw: unknown = await this.conn.bulk.load(objectName, operation, records);
    return bulkResultSchema.parse(raw).map((result) => ({
      id: result.id ?? null,
      success: result.success,
      errors: result.errors ?? [],
    }));
  }

  async toolingQuery(soql: string): Promise<QueryResult> {
    return await this.conn.tooling.query(soql);
  }

  async identity(): Promise<IdentityInfo> {
    return await this.conn.identity();
  }

  async request(request: RawRequest): Promise<unknown> {
    const hasBody = request.body !== undefined && request.method !== 'GET';
    return await this.conn.request<unknown>({
      method: request.method,
      url: request.url,
      body: hasBody ? JSON.stringify(request.body) : undefined,
      headers: hasBody ? { 'Content-Type': 'application/json' } : {},
    });
  }
}

/**
 * Connector that builds jsforce connections
 */
export function createJsforceConnector(options: ConnectionOptions = {}): SalesforceConnector {
  const versionOption = options.version ? { version: options.version } : {};

  return {
    fromAccessToken(instanceUrl: string, accessToken: string): SalesforceClient {
      const connection = new jsforce.Connection({
        ...versionOption,
        instanceUrl,
        accessToken,
      });
      return new JsforceClient(connection);
    },

    async login(loginUrl: string, username: string, password: string): Promise<SalesforceClient> {
      const connection = new jsforce.Connection({ ...versionOption, loginUrl });
      await connection.login(username, password);
      return new JsforceClient(connection);
    },
  };
}
