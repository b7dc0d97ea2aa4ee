import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type {
  BulkOperation,
  BulkRecordResult,
  SalesforceClient,
  SObjectRecord,
} from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { MAX_BULK_RECORDS, objectNameSchema, recordsSchema, recordsWithIdSchema } from "./schemas.js";

export interface BulkRecordOutcome {
  index: number;
  id: string | null;
  success: boolean;
  errors: string[];
}

export interface BulkSummary {
  object: string;
  operation: BulkOperation;
  processed: number;
  succeeded: number;
  failed: number;
  results: BulkRecordOutcome[];
}

function bulkTool(name: string, verb: string, recordsDescription: string): Tool {
  return {
    name,
    description: `${verb} up to ${MAX_BULK_RECORDS} records in a single Bulk API job. Returns one outcome per input record, in input order.`,
    inputSchema: {
      type: "object",
      properties: {
        object_name: {
          type: "string",
          description: "API name of the object, e.g. Contact",
        },
        records: {
          type: "array",
          items: { type: "object" },
          description: recordsDescription,
        },
      },
      required: ["object_name", "records"],
    },
  };
}

export const BULK_CREATE_RECORDS = bulkTool(
  "bulk_create_records",
  "Creates",
  "Records to insert, each a map of field API name to value"
);

export const BULK_UPDATE_RECORDS = bulkTool(
  "bulk_update_records",
  "Updates",
  "Records to update; each must include Id plus the fields to change"
);

export const BULK_DELETE_RECORDS = bulkTool(
  "bulk_delete_records",
  "Deletes",
  "Records to delete; each must include Id"
);

export const bulkCreateRecordsArgs = z.object({
  object_name: objectNameSchema,
  records: recordsSchema,
});

export const bulkUpdateRecordsArgs = z.object({
  object_name: objectNameSchema,
  records: recordsWithIdSchema,
});

export const bulkDeleteRecordsArgs = bulkUpdateRecordsArgs;

export type BulkCreateRecordsArgs = z.infer<typeof bulkCreateRecordsArgs>;
export type BulkUpdateRecordsArgs = z.infer<typeof bulkUpdateRecordsArgs>;
export type BulkDeleteRecordsArgs = z.infer<typeof bulkDeleteRecordsArgs>;

/**
 * Pair each input record with its batch result by position. A result the
 * Bulk API did not return is reported as a failure for that record.
 */
export function alignBulkResults(inputCount: number, results: BulkRecordResult[]): BulkRecordOutcome[] {
  const outcomes: BulkRecordOutcome[] = [];
  for (let index = 0; index < inputCount; index++) {
    const result = results[index];
    outcomes.push(
      result
        ? { index, id: result.id, success: result.success, errors: result.errors }
        : { index, id: null, success: false, errors: ["No result returned for this record"] }
    );
  }
  return outcomes;
}

async function runBulk(
  client: SalesforceClient,
  objectName: string,
  operation: BulkOperation,
  records: SObjectRecord[]
): Promise<string> {
  const results = await client.bulkLoad(objectName, operation, records);
  const outcomes = alignBulkResults(records.length, results);
  const succeeded = outcomes.filter((outcome) => outcome.success).length;

  const summary: BulkSummary = {
    object: objectName,
    operation,
    processed: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    results: outcomes,
  };

  return formatJson(`Bulk ${operation.toUpperCase()} ${objectName} Result (JSON)`, summary);
}

export async function handleBulkCreateRecords(
  client: SalesforceClient,
  args: BulkCreateRecordsArgs
): Promise<string> {
  return await runBulk(client, args.object_name, "insert", args.records);
}

export async function handleBulkUpdateRecords(
  client: SalesforceClient,
  args: BulkUpdateRecordsArgs
): Promise<string> {
  return await runBulk(client, args.object_name, "update", args.records);
}

export async function handleBulkDeleteRecords(
  client: SalesforceClient,
  args: BulkDeleteRecordsArgs
): Promise<string> {
  const records = args.records.map((record) => ({ Id: record.Id }));
  return await runBulk(client, args.object_name, "delete", records);
}
