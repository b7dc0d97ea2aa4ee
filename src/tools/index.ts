import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { RegisteredTool } from "../types/tools.js";
import { defineTool } from "./defineTool.js";
import {
  BULK_CREATE_RECORDS,
  BULK_DELETE_RECORDS,
  BULK_UPDATE_RECORDS,
  bulkCreateRecordsArgs,
  bulkDeleteRecordsArgs,
  bulkUpdateRecordsArgs,
  handleBulkCreateRecords,
  handleBulkDeleteRecords,
  handleBulkUpdateRecords,
} from "./bulkRecords.js";
import { CREATE_RECORD, createRecordArgs, handleCreateRecord } from "./createRecord.js";
import {
  CREATE_CUSTOM_FIELD,
  UPDATE_CUSTOM_FIELD,
  createCustomFieldArgs,
  handleCreateCustomField,
  handleUpdateCustomField,
  updateCustomFieldArgs,
} from "./customField.js";
import { DELETE_RECORD, deleteRecordArgs, handleDeleteRecord } from "./deleteRecord.js";
import { EXPORT_DATA_CSV, exportDataCsvArgs, handleExportDataCsv } from "./exportDataCsv.js";
import { GET_FIELD_DETAILS, getFieldDetailsArgs, handleGetFieldDetails } from "./fieldDetails.js";
import {
  GET_FIELD_PERMISSIONS,
  SET_FIELD_PERMISSIONS,
  getFieldPermissionsArgs,
  handleGetFieldPermissions,
  handleSetFieldPermissions,
  setFieldPermissionsArgs,
} from "./fieldPermissions.js";
import { GET_RECORD, getRecordArgs, handleGetRecord } from "./getRecord.js";
import { LIST_REPORTS, handleListReports, listReportsArgs } from "./listReports.js";
import { LIST_SOBJECTS, handleListSObjects, listSObjectsArgs } from "./listSObjects.js";
import { LIST_USERS, handleListUsers, listUsersArgs } from "./listUsers.js";
import { GET_OBJECT_FIELDS, getObjectFieldsArgs, handleGetObjectFields } from "./objectFields.js";
import { GET_ORG_LIMITS, getOrgLimitsArgs, handleGetOrgLimits } from "./orgLimits.js";
import {
  APEX_EXECUTE,
  RESTFUL,
  TOOLING_EXECUTE,
  apexExecuteArgs,
  handleApexExecute,
  handleRestful,
  handleToolingExecute,
  restfulArgs,
  toolingExecuteArgs,
} from "./rawRequests.js";
import { GET_RECORD_TYPES, getRecordTypesArgs, handleGetRecordTypes } from "./recordTypes.js";
import { RUN_SOQL_QUERY, handleRunSoqlQuery, runSoqlQueryArgs } from "./runSoqlQuery.js";
import { RUN_SOSL_SEARCH, handleRunSoslSearch, runSoslSearchArgs } from "./runSoslSearch.js";
import { UPDATE_RECORD, handleUpdateRecord, updateRecordArgs } from "./updateRecord.js";
import { GET_USER_PERMISSIONS, getUserPermissionsArgs, handleGetUserPermissions } from "./userPermissions.js";

/**
 * Every tool the server exposes, keyed by tool name, in listing order
 */
export const TOOL_REGISTRY = {
  run_soql_query: defineTool(RUN_SOQL_QUERY, runSoqlQueryArgs, handleRunSoqlQuery),
  run_sosl_search: defineTool(RUN_SOSL_SEARCH, runSoslSearchArgs, handleRunSoslSearch),

  get_object_fields: defineTool(GET_OBJECT_FIELDS, getObjectFieldsArgs, handleGetObjectFields),
  list_sobjects: defineTool(LIST_SOBJECTS, listSObjectsArgs, handleListSObjects),
  get_record_types: defineTool(GET_RECORD_TYPES, getRecordTypesArgs, handleGetRecordTypes),
  get_user_permissions: defineTool(GET_USER_PERMISSIONS, getUserPermissionsArgs, handleGetUserPermissions),
  get_field_details: defineTool(GET_FIELD_DETAILS, getFieldDetailsArgs, handleGetFieldDetails),

  get_record: defineTool(GET_RECORD, getRecordArgs, handleGetRecord),
  create_record: defineTool(CREATE_RECORD, createRecordArgs, handleCreateRecord),
  update_record: defineTool(UPDATE_RECORD, updateRecordArgs, handleUpdateRecord),
  delete_record: defineTool(DELETE_RECORD, deleteRecordArgs, handleDeleteRecord),

  bulk_create_records: defineTool(BULK_CREATE_RECORDS, bulkCreateRecordsArgs, handleBulkCreateRecords),
  bulk_update_records: defineTool(BULK_UPDATE_RECORDS, bulkUpdateRecordsArgs, handleBulkUpdateRecords),
  bulk_delete_records: defineTool(BULK_DELETE_RECORDS, bulkDeleteRecordsArgs, handleBulkDeleteRecords),

  create_custom_field: defineTool(CREATE_CUSTOM_FIELD, createCustomFieldArgs, handleCreateCustomField),
  update_custom_field: defineTool(UPDATE_CUSTOM_FIELD, updateCustomFieldArgs, handleUpdateCustomField),

  set_field_permissions: defineTool(SET_FIELD_PERMISSIONS, setFieldPermissionsArgs, handleSetFieldPermissions),
  get_field_permissions: defineTool(GET_FIELD_PERMISSIONS, getFieldPermissionsArgs, handleGetFieldPermissions),

  export_data_csv: defineTool(EXPORT_DATA_CSV, exportDataCsvArgs, handleExportDataCsv),

  list_reports: defineTool(LIST_REPORTS, listReportsArgs, handleListReports),
  list_users: defineTool(LIST_USERS, listUsersArgs, handleListUsers),
  get_org_limits: defineTool(GET_ORG_LIMITS, getOrgLimitsArgs, handleGetOrgLimits),

  tooling_execute: defineTool(TOOLING_EXECUTE, toolingExecuteArgs, handleToolingExecute),
  apex_execute: defineTool(APEX_EXECUTE, apexExecuteArgs, handleApexExecute),
  restful: defineTool(RESTFUL, restfulArgs, handleRestful),
} satisfies Record<string, RegisteredTool>;

export type ToolName = keyof typeof TOOL_REGISTRY;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_REGISTRY, name);
}

export function listTools(): Tool[] {
  return Object.values(TOOL_REGISTRY).map((tool) => tool.definition);
}
