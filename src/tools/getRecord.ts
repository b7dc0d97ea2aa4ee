import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { objectNameSchema, recordIdSchema } from "./schemas.js";

export const GET_RECORD: Tool = {
  name: "get_record",
  description: "Retrieves a single record by ID with all of its fields.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Contact",
      },
      record_id: {
        type: "string",
        description: "15 or 18 character record ID",
      },
    },
    required: ["object_name", "record_id"],
  },
};

export const getRecordArgs = z.object({
  object_name: objectNameSchema,
  record_id: recordIdSchema,
});

export type GetRecordArgs = z.infer<typeof getRecordArgs>;

export async function handleGetRecord(client: SalesforceClient, args: GetRecordArgs): Promise<string> {
  const record = await client.retrieve(args.object_name, args.record_id);
  return formatJson(`${args.object_name} Record (JSON)`, record);
}
