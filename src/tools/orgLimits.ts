import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { isRecord } from "../utils/records.js";
import { nonEmptyString } from "./schemas.js";

export const GET_ORG_LIMITS: Tool = {
  name: "get_org_limits",
  description: "Returns the org limits (maximum and remaining), such as DailyApiRequests and DataStorageMB.",
  inputSchema: {
    type: "object",
    properties: {
      names: {
        type: "array",
        items: { type: "string" },
        description: 'Only return these limits, e.g. ["DailyApiRequests"]',
      },
    },
    required: [],
  },
};

export const getOrgLimitsArgs = z.object({
  names: z.array(nonEmptyString).optional(),
});

export type GetOrgLimitsArgs = z.infer<typeof getOrgLimitsArgs>;

export async function handleGetOrgLimits(client: SalesforceClient, args: GetOrgLimitsArgs): Promise<string> {
  const limits = await client.request({ method: "GET", url: "/limits" });

  if (!args.names || !isRecord(limits)) {
    return formatJson("Org Limits (JSON)", limits);
  }

  const wanted = new Set(args.names.map((name) => name.toLowerCase()));
  const selected = Object.fromEntries(
    Object.entries(limits).filter(([name]) => wanted.has(name.toLowerCase()))
  );
  return formatJson("Org Limits (JSON)", selected);
}
