import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import type { ToolContext } from "../types/tools.js";
import { ValidationError } from "../utils/errorHandler.js";
import { formatJson, soqlString } from "../utils/format.js";
import { isRecord } from "../utils/records.js";
import { fieldNameSchema, nonEmptyString, objectNameSchema } from "./schemas.js";

export const CUSTOM_FIELD_TYPES = [
  "Text",
  "TextArea",
  "LongTextArea",
  "Html",
  "Number",
  "Currency",
  "Percent",
  "Checkbox",
  "Date",
  "DateTime",
  "Email",
  "Phone",
  "Url",
  "Picklist",
  "MultiselectPicklist",
  "Lookup",
  "MasterDetail",
] as const;

export type CustomFieldType = (typeof CUSTOM_FIELD_TYPES)[number];

interface PicklistValueMetadata {
  fullName: string;
  label: string;
  default: boolean;
}

/**
 * The Metadata block of a Tooling API CustomField
 */
export interface CustomFieldMetadata {
  label?: string;
  type?: CustomFieldType;
  required?: boolean;
  description?: string;
  inlineHelpText?: string;
  length?: number;
  precision?: number;
  scale?: number;
  visibleLines?: number;
  defaultValue?: string;
  unique?: boolean;
  externalId?: boolean;
  referenceTo?: string;
  relationshipName?: string;
  relationshipLabel?: string;
  deleteConstraint?: "SetNull" | "Restrict" | "Cascade";
  valueSet?: {
    restricted: boolean;
    valueSetDefinition: {
      sorted: boolean;
      value: PicklistValueMetadata[];
    };
  };
}

/**
 * Custom field API names always end in __c
 */
export function toCustomFieldName(fieldName: string): string {
  return /__c$/i.test(fieldName) ? fieldName : `${fieldName}__c`;
}

function toValueSet(values: string[]): NonNullable<CustomFieldMetadata["valueSet"]> {
  return {
    restricted: true,
    valueSetDefinition: {
      sorted: false,
      value: values.map((value) => ({ fullName: value, label: value, default: false })),
    },
  };
}

const fieldOptionsShape = {
  object_name: objectNameSchema,
  field_name: fieldNameSchema,
  length: z.number().int().positive().optional(),
  precision: z.number().int().positive().max(18).optional(),
  scale: z.number().int().min(0).max(17).optional(),
  required: z.boolean().optional(),
  description: z.string().optional(),
  help_text: z.string().optional(),
  default_value: z.string().optional(),
  picklist_values: z.array(nonEmptyString).min(1).optional(),
  visible_lines: z.number().int().positive().optional(),
};

export const createCustomFieldArgs = z
  .object({
    ...fieldOptionsShape,
    label: nonEmptyString,
    type: z.enum(CUSTOM_FIELD_TYPES),
    reference_to: objectNameSchema.optional(),
    relationship_name: fieldNameSchema.optional(),
    unique: z.boolean().optional(),
    external_id: z.boolean().optional(),
  })
  .superRefine((args, ctx) => {
    if ((args.type === "Picklist" || args.type === "MultiselectPicklist") && !args.picklist_values) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["picklist_values"],
        message: `is required for ${args.type} fields`,
      });
    }
    if ((args.type === "Lookup" || args.type === "MasterDetail") && !args.reference_to) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["reference_to"],
        message: `is required for ${args.type} fields`,
      });
    }
  });

export type CreateCustomFieldArgs = z.infer<typeof createCustomFieldArgs>;

export const updateCustomFieldArgs = z
  .object({
    ...fieldOptionsShape,
    label: nonEmptyString.optional(),
  })
  .refine(
    (args) =>
      Object.entries(args).some(
        ([key, value]) => key !== "object_name" && key !== "field_name" && value !== undefined
      ),
    "at least one attribute to change is required"
  );

export type UpdateCustomFieldArgs = z.infer<typeof updateCustomFieldArgs>;

const fieldProperties = {
  object_name: { type: "string", description: "API name of the object, e.g. Account" },
  field_name: { type: "string", description: "Field API name; __c is appended when missing" },
  label: { type: "string", description: "Field label shown in the UI" },
  length: { type: "number", description: "Text length (Text defaults to 255, long text to 32768)" },
  precision: { type: "number", description: "Total digits for Number, Currency and Percent" },
  scale: { type: "number", description: "Decimal places for Number, Currency and Percent" },
  required: { type: "boolean", description: "Whether the field is required on every record" },
  description: { type: "string", description: "Field description" },
  help_text: { type: "string", description: "Inline help text" },
  default_value: { type: "string", description: "Default value formula or literal" },
  picklist_values: {
    type: "array",
    items: { type: "string" },
    description: "Values for Picklist and MultiselectPicklist fields",
  },
  visible_lines: { type: "number", description: "Visible lines for long text and multi-select picklists" },
};

export const CREATE_CUSTOM_FIELD: Tool = {
  name: "create_custom_field",
  description: "Creates a custom field through the Tooling API. New fields are not visible to any profile until set_field_permissions grants access.",
  inputSchema: {
    type: "object",
    properties: {
      ...fieldProperties,
      type: {
        type: "string",
        enum: [...CUSTOM_FIELD_TYPES],
        description: "Field type",
      },
      reference_to: { type: "string", description: "Target object for Lookup and MasterDetail fields" },
      relationship_name: { type: "string", description: "Relationship name for Lookup and MasterDetail fields" },
      unique: { type: "boolean", description: "Enforce unique values" },
      external_id: { type: "boolean", description: "Mark the field as an external ID" },
    },
    required: ["object_name", "field_name", "label", "type"],
  },
};

export const UPDATE_CUSTOM_FIELD: Tool = {
  name: "update_custom_field",
  description: "Changes attributes of an existing custom field through the Tooling API. Attributes that are not passed keep their current values.",
  inputSchema: {
    type: "object",
    properties: fieldProperties,
    required: ["object_name", "field_name"],
  },
};

/**
 * Metadata for a new field, with the defaults each type needs
 */
export function buildCustomFieldMetadata(args: CreateCustomFieldArgs): CustomFieldMetadata {
  const metadata: CustomFieldMetadata = {
    label: args.label,
    type: args.type,
    description: args.description,
    inlineHelpText: args.help_text,
  };

  switch (args.type) {
    case "Text":
      metadata.length = args.length ?? 255;
      metadata.unique = args.unique;
      metadata.externalId = args.external_id;
      break;
    case "LongTextArea":
      metadata.length = args.length ?? 32768;
      metadata.visibleLines = args.visible_lines ?? 3;
      break;
    case "Html":
      metadata.length = args.length ?? 32768;
      metadata.visibleLines = args.visible_lines ?? 25;
      break;
    case "Number":
      metadata.precision = args.precision ?? 18;
      metadata.scale = args.scale ?? 0;
      metadata.unique = args.unique;
      metadata.externalId = args.external_id;
      break;
    case "Currency":
      metadata.precision = args.precision ?? 18;
      metadata.scale = args.scale ?? 2;
      break;
    case "Percent":
      metadata.precision = args.precision ?? 5;
      metadata.scale = args.scale ?? 2;
      break;
    case "Checkbox":
      metadata.defaultValue = args.default_value ?? "false";
      break;
    case "Picklist":
      metadata.valueSet = toValueSet(args.picklist_values ?? []);
      break;
    case "MultiselectPicklist":
      metadata.valueSet = toValueSet(args.picklist_values ?? []);
      metadata.visibleLines = args.visible_lines ?? 4;
      break;
    case "Lookup":
    case "MasterDetail":
      metadata.referenceTo = args.reference_to;
      metadata.relationshipName = args.relationship_name ?? toCustomFieldName(args.field_name).replace(/__c$/i, "");
      metadata.relationshipLabel = args.label;
      if (args.type === "Lookup") {
        metadata.deleteConstraint = "SetNull";
      }
      break;
    case "TextArea":
    case "Date":
    case "DateTime":
    case "Email":
    case "Phone":
    case "Url":
      break;
  }

  // Salesforce rejects required on checkboxes and master-detail fields
  if (args.required !== undefined && args.type !== "Checkbox" && args.type !== "MasterDetail") {
    metadata.required = args.required;
  }
  if (args.default_value !== undefined && metadata.defaultValue === undefined) {
    metadata.defaultValue = args.default_value;
  }

  return dropUndefined(metadata);
}

function dropUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}

export async function handleCreateCustomField(
  client: SalesforceClient,
  args: CreateCustomFieldArgs,
  context: ToolContext
): Promise<string> {
  const fullName = `${args.object_name}.${toCustomFieldName(args.field_name)}`;
  const metadata = buildCustomFieldMetadata(args);

  const response = await client.request({
    method: "POST",
    url: "/tooling/sobjects/CustomField",
    body: { FullName: fullName, Metadata: metadata },
  });

  context.fieldCache.invalidate(args.object_name);

  return formatJson("Create Custom Field Result (JSON)", {
    fullName,
    metadata,
    response,
  });
}

/**
 * Changed attributes of an update, in Tooling Metadata terms
 */
export function buildMetadataChanges(args: UpdateCustomFieldArgs): CustomFieldMetadata {
  return dropUndefined<CustomFieldMetadata>({
    label: args.label,
    length: args.length,
    precision: args.precision,
    scale: args.scale,
    required: args.required,
    description: args.description,
    inlineHelpText: args.help_text,
    defaultValue: args.default_value,
    visibleLines: args.visible_lines,
    valueSet: args.picklist_values ? toValueSet(args.picklist_values) : undefined,
  });
}

export async function handleUpdateCustomField(
  client: SalesforceClient,
  args: UpdateCustomFieldArgs,
  context: ToolContext
): Promise<string> {
  const fieldName = toCustomFieldName(args.field_name);
  const fullName = `${args.object_name}.${fieldName}`;

  // DeveloperName has neither the namespace prefix nor the __c suffix
  const baseName = fieldName.replace(/__c$/i, "");
  const namespaceSplit = baseName.indexOf("__");
  const developerName = namespaceSplit === -1 ? baseName : baseName.slice(namespaceSplit + 2);

  const lookup = await client.toolingQuery(
    "SELECT Id, Metadata FROM CustomField " +
      `WHERE EntityDefinition.QualifiedApiName = ${soqlString(args.object_name)} ` +
      `AND DeveloperName = ${soqlString(developerName)} LIMIT 1`
  );
  const existing = lookup.records[0];
  const fieldId = existing ? existing["Id"] : undefined;
  if (!existing || typeof fieldId !== "string") {
    throw new ValidationError(`Custom field ${fullName} was not found`);
  }

  const currentMetadata: Record<string, unknown> = {};
  const rawMetadata = existing["Metadata"];
  if (isRecord(rawMetadata)) {
    for (const [key, value] of Object.entries(rawMetadata)) {
      if (value !== null) {
        currentMetadata[key] = value;
      }
    }
  }

  const changes = buildMetadataChanges(args);
  await client.request({
    method: "PATCH",
    url: `/tooling/sobjects/CustomField/${fieldId}`,
    body: { Metadata: { ...currentMetadata, ...changes } },
  });

  context.fieldCache.invalidate(args.object_name);

  return formatJson("Update Custom Field Result (JSON)", {
    fullName,
    id: fieldId,
    updated: changes,
  });
}
