import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { ValidationError } from "../utils/errorHandler.js";
import { formatJson } from "../utils/format.js";
import { fieldNameSchema, objectNameSchema } from "./schemas.js";

export const GET_FIELD_DETAILS: Tool = {
  name: "get_field_details",
  description: "Returns the full description of one field: type, length, precision, picklist values, references, formula, default value and help text.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: {
        type: "string",
        description: "API name of the object, e.g. Account",
      },
      field_name: {
        type: "string",
        description: "API name of the field, e.g. Industry or Score__c",
      },
    },
    required: ["object_name", "field_name"],
  },
};

export const getFieldDetailsArgs = z.object({
  object_name: objectNameSchema,
  field_name: fieldNameSchema,
});

export type GetFieldDetailsArgs = z.infer<typeof getFieldDetailsArgs>;

export async function handleGetFieldDetails(client: SalesforceClient, args: GetFieldDetailsArgs): Promise<string> {
  const describe = await client.describe(args.object_name);
  const wanted = args.field_name.toLowerCase();
  const field = describe.fields.find((candidate) => candidate.name.toLowerCase() === wanted);

  if (!field) {
    throw new ValidationError(`Field ${args.field_name} does not exist on ${describe.name}`);
  }

  return formatJson(`${describe.name}.${field.name} Field Details (JSON)`, {
    name: field.name,
    label: field.label,
    type: field.type,
    custom: field.custom,
    length: field.length,
    precision: field.precision ?? null,
    scale: field.scale ?? null,
    nillable: field.nillable,
    createable: field.createable,
    updateable: field.updateable,
    defaultValue: field.defaultValue ?? null,
    calculatedFormula: field.calculatedFormula ?? null,
    inlineHelpText: field.inlineHelpText ?? null,
    referenceTo: field.referenceTo ?? [],
    relationshipName: field.relationshipName ?? null,
    picklistValues: field.picklistValues ?? [],
  });
}
