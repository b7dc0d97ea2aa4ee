import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { objectNameSchema } from "./schemas.js";

export const GET_RECORD_TYPES: Tool = {
  name: "get_record_types",
  description: "Lists the record types of a Salesforce object, including which one is the default for the current user.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Opportunity",
      },
    },
    required: ["object_name"],
  },
};

export const getRecordTypesArgs = z.object({
  object_name: objectNameSchema,
});

export type GetRecordTypesArgs = z.infer<typeof getRecordTypesArgs>;

export async function handleGetRecordTypes(client: SalesforceClient, args: GetRecordTypesArgs): Promise<string> {
  const describe = await client.describe(args.object_name);

  const recordTypes = describe.recordTypeInfos.map((info) => ({
    name: info.name,
    developerName: info.developerName ?? null,
    recordTypeId: info.recordTypeId ?? null,
    active: info.active ?? null,
    available: info.available,
    isDefault: info.defaultRecordTypeMapping,
    isMaster: info.master,
  }));

  return formatJson(`${describe.name} Record Types (JSON)`, recordTypes);
}
