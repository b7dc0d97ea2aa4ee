/**
 * A Salesforce record as returned by the REST API
 */
export type SObjectRecord = Record<string, unknown>;

export interface QueryResult {
  totalSize: number;
  done: boolean;
  records: SObjectRecord[];
  nextRecordsUrl?: string;
}

export interface SearchResult {
  searchRecords: SObjectRecord[];
}

export interface PicklistValue {
  value: string;
  label?: string | null;
  active?: boolean;
}

export interface SalesforceField {
  name: string;
  label: string;
  type: string;
  nillable: boolean;
  createable: boolean;
  updateable: boolean;
  custom: boolean;
  length: number;
  precision?: number;
  scale?: number;
  defaultValue?: unknown;
  calculatedFormula?: string | null;
  inlineHelpText?: string | null;
  picklistValues?: PicklistValue[] | null;
  referenceTo?: string[] | null;
  relationshipName?: string | null;
}

export interface RecordTypeInfo {
  name: string;
  recordTypeId?: string | null;
  developerName?: string;
  active?: boolean;
  available: boolean;
  defaultRecordTypeMapping: boolean;
  master: boolean;
}

export interface SalesforceDescribeResponse {
  name: string;
  label: string;
  custom: boolean;
  fields: SalesforceField[];
  recordTypeInfos: RecordTypeInfo[];
}

export interface GlobalSObject {
  name: string;
  label: string;
  custom: boolean;
  queryable: boolean;
  createable: boolean;
  updateable: boolean;
  deletable: boolean;
  keyPrefix?: string | null;
}

export interface DescribeGlobalResponse {
  sobjects: GlobalSObject[];
}

export interface SaveError {
  message: string;
  errorCode?: string;
  statusCode?: string;
  fields?: string[];
}

export interface SaveResult {
  success: boolean;
  id?: string;
  errors: SaveError[];
}

export interface IdentityInfo {
  user_id: string;
  organization_id: string;
  username: string;
  display_name?: string;
}

export type BulkOperation = 'insert' | 'update' | 'delete';

/**
 * Outcome of one record within a Bulk API batch, in the batch's input order
 */
export interface BulkRecordResult {
  id: string | null;
  success: boolean;
  errors: string[];
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RawRequest {
  method: HttpMethod;
  /** Absolute path such as /services/apexrest/Foo, or a path relative to the versioned data API */
  url: string;
  body?: unknown;
}

/**
 * The Salesforce operations the tools rely on. Implemented over jsforce by
 * JsforceClient; tests provide in-process fakes.
 */
export interface SalesforceClient {
  readonly instanceUrl: string;
  query(soql: string): Promise<QueryResult>;
  search(sosl: string): Promise<SearchResult>;
  describe(objectName: string): Promise<SalesforceDescribeResponse>;
  describeGlobal(): Promise<DescribeGlobalResponse>;
  retrieve(objectName: string, recordId: string): Promise<SObjectRecord>;
  create(objectName: string, record: SObjectRecord): Promise<SaveResult>;
  update(objectName: string, record: SObjectRecord & { Id: string }): Promise<SaveResult>;
  destroy(objectName: string, recordId: string): Promise<SaveResult>;
  bulkLoad(objectName: string, operation: BulkOperation, records: SObjectRecord[]): Promise<BulkRecordResult[]>;
  toolingQuery(soql: string): Promise<QueryResult>;
  identity(): Promise<IdentityInfo>;
  request(request: RawRequest): Promise<unknown>;
}
