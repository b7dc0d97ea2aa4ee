import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatSaveError } from "../utils/errorHandler.js";
import { formatJson } from "../utils/format.js";
import { objectNameSchema, recordIdSchema } from "./schemas.js";

export const DELETE_RECORD: Tool = {
  name: "delete_record",
  description: "Deletes a record by ID. Deleted records go to the recycle bin.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Case",
      },
      record_id: {
        type: "string",
        description: "ID of the record to delete",
      },
    },
    required: ["object_name", "record_id"],
  },
};

export const deleteRecordArgs = z.object({
  object_name: objectNameSchema,
  record_id: recordIdSchema,
});

export type DeleteRecordArgs = z.infer<typeof deleteRecordArgs>;

export async function handleDeleteRecord(client: SalesforceClient, args: DeleteRecordArgs): Promise<string> {
  const result = await client.destroy(args.object_name, args.record_id);
  if (!result.success) {
    throw new Error(formatSaveError(result, `delete ${args.object_name} record ${args.record_id}`));
  }
  return formatJson(`Delete ${args.object_name} Record Result (JSON)`, result);
}
