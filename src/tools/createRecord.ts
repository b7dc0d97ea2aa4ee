import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatSaveError } from "../utils/errorHandler.js";
import { formatJson } from "../utils/format.js";
import { fieldValuesSchema, objectNameSchema } from "./schemas.js";

export const CREATE_RECORD: Tool = {
  name: "create_record",
  description: "Creates a new record. Use get_object_fields first to find the createable and required fields.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Account",
      },
      data: {
        type: "object",
        description: 'Field values keyed by field API name, e.g. {"Name": "Acme", "Industry": "Energy"}',
      },
    },
    required: ["object_name", "data"],
  },
};

export const createRecordArgs = z.object({
  object_name: objectNameSchema,
  data: fieldValuesSchema,
});

export type CreateRecordArgs = z.infer<typeof createRecordArgs>;

export async function handleCreateRecord(client: SalesforceClient, args: CreateRecordArgs): Promise<string> {
  const result = await client.create(args.object_name, args.data);
  if (!result.success) {
    throw new Error(formatSaveError(result, `create ${args.object_name} record`));
  }
  return formatJson(`Create ${args.object_name} Record Result (JSON)`, result);
}
