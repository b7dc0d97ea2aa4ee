import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatSaveError } from "../utils/errorHandler.js";
import { formatJson } from "../utils/format.js";
import { fieldValuesSchema, objectNameSchema, recordIdSchema } from "./schemas.js";

export const UPDATE_RECORD: Tool = {
  name: "update_record",
  description: "Updates fields on an existing record.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Opportunity",
      },
      record_id: {
        type: "string",
        description: "ID of the record to update",
      },
      data: {
        type: "object",
        description: "Field values to change, keyed by field API name",
      },
    },
    required: ["object_name", "record_id", "data"],
  },
};

export const updateRecordArgs = z.object({
  object_name: objectNameSchema,
  record_id: recordIdSchema,
  data: fieldValuesSchema,
});

export type UpdateRecordArgs = z.infer<typeof updateRecordArgs>;

export async function handleUpdateRecord(client: SalesforceClient, args: UpdateRecordArgs): Promise<string> {
  const result = await client.update(args.object_name, { ...args.data, Id: args.record_id });
  if (!result.success) {
    throw new Error(formatSaveError(result, `update ${args.object_name} record ${args.record_id}`));
  }
  return formatJson(`Update ${args.object_name} Record Result (JSON)`, result);
}
