import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient, SalesforceField } from "../types/salesforce.js";
import type { ToolContext } from "../types/tools.js";
import type { FieldSummary } from "../utils/fieldCache.js";
import { formatJson } from "../utils/format.js";
import { objectNameSchema } from "./schemas.js";

export const GET_OBJECT_FIELDS: Tool = {
  name: "get_object_fields",
  description: "Retrieves field names, labels, types and create/update flags for a Salesforce object. Results are cached per object; pass refresh to describe the object again.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Account or Invoice__c",
      },
      refresh: {
        type: "boolean",
        description: "Ignore the cached field list and describe the object again",
      },
    },
    required: ["object_name"],
  },
};

export const getObjectFieldsArgs = z.object({
  object_name: objectNameSchema,
  refresh: z.boolean().default(false),
});

export type GetObjectFieldsArgs = z.infer<typeof getObjectFieldsArgs>;

export function summarizeField(field: SalesforceField): FieldSummary {
  return {
    name: field.name,
    label: field.label,
    type: field.type,
    nillable: field.nillable,
    createable: field.createable,
    updateable: field.updateable,
    length: field.length,
    picklistValues: field.picklistValues ?? [],
  };
}

export async function handleGetObjectFields(
  client: SalesforceClient,
  args: GetObjectFieldsArgs,
  context: ToolContext
): Promise<string> {
  const { object_name: objectName, refresh } = args;

  let fields = refresh ? undefined : context.fieldCache.get(objectName);
  if (!fields) {
    const describe = await client.describe(objectName);
    fields = describe.fields.map(summarizeField);
    context.fieldCache.set(objectName, fields);
  }

  return formatJson(`${objectName} Metadata (JSON)`, fields);
}
