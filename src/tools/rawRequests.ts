import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { httpMethodSchema, nonEmptyString } from "./schemas.js";

const methodProperty = {
  type: "string",
  enum: ["GET", "POST", "PUT", "PATCH", "DELETE"],
  description: "HTTP method (default GET)",
};

const dataProperty = {
  type: "object",
  description: "JSON request body",
};

export const TOOLING_EXECUTE: Tool = {
  name: "tooling_execute",
  description: 'Sends a request to the Tooling API. action is relative to /services/data/vXX.X/tooling/, e.g. "query/?q=SELECT+Id+FROM+ApexClass" or "sobjects/ApexClass".',
  inputSchema: {
    type: "object",
    properties: {
      action: { type: "string", description: "Path below the Tooling API root" },
      method: methodProperty,
      data: dataProperty,
    },
    required: ["action"],
  },
};

export const APEX_EXECUTE: Tool = {
  name: "apex_execute",
  description: "Calls a custom Apex REST endpoint. action is relative to /services/apexrest/.",
  inputSchema: {
    type: "object",
    properties: {
      action: { type: "string", description: 'Path below /services/apexrest/, e.g. "MyService/123"' },
      method: methodProperty,
      data: dataProperty,
    },
    required: ["action"],
  },
};

export const RESTFUL: Tool = {
  name: "restful",
  description: 'Makes a direct REST API call. path is relative to /services/data/vXX.X/, e.g. "sobjects/Account/describe" or "limits".',
  inputSchema: {
    type: "object",
    properties: {
      path: { type: "string", description: "Path below the versioned REST API root" },
      method: methodProperty,
      params: {
        type: "object",
        description: "Query string parameters",
      },
      data: dataProperty,
    },
    required: ["path"],
  },
};

const bodySchema = z.record(z.unknown()).optional();

export const toolingExecuteArgs = z.object({
  action: nonEmptyString,
  method: httpMethodSchema,
  data: bodySchema,
});

export const apexExecuteArgs = toolingExecuteArgs;

export const restfulArgs = z.object({
  path: nonEmptyString,
  method: httpMethodSchema,
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  data: bodySchema,
});

export type ToolingExecuteArgs = z.infer<typeof toolingExecuteArgs>;
export type ApexExecuteArgs = z.infer<typeof apexExecuteArgs>;
export type RestfulArgs = z.infer<typeof restfulArgs>;

function trimSlashes(path: string): string {
  return path.replace(/^\/+/, "");
}

export function withQueryString(path: string, params?: Record<string, string | number | boolean>): string {
  if (!params || Object.keys(params).length === 0) {
    return path;
  }
  const query = new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
  ).toString();
  return `${path}${path.includes("?") ? "&" : "?"}${query}`;
}

export async function handleToolingExecute(client: SalesforceClient, args: ToolingExecuteArgs): Promise<string> {
  const result = await client.request({
    method: args.method,
    url: `/tooling/${trimSlashes(args.action)}`,
    body: args.data,
  });
  return formatJson("Tooling Execute Result (JSON)", result ?? null);
}

export async function handleApexExecute(client: SalesforceClient, args: ApexExecuteArgs): Promise<string> {
  const result = await client.request({
    method: args.method,
    url: `/services/apexrest/${trimSlashes(args.action)}`,
    body: args.data,
  });
  return formatJson("Apex Execute Result (JSON)", result ?? null);
}

export async function handleRestful(client: SalesforceClient, args: RestfulArgs): Promise<string> {
  const result = await client.request({
    method: args.method,
    url: withQueryString(`/${trimSlashes(args.path)}`, args.params),
    body: args.data,
  });
  return formatJson("RESTful API Call Result (JSON)", result ?? null);
}
