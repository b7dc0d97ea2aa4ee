import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { nonEmptyString } from "./schemas.js";

export const RUN_SOSL_SEARCH: Tool = {
  name: "run_sosl_search",
  description: "Executes a SOSL search against Salesforce.",
  inputSchema: {
    type: "object",
    properties: {
      search: {
        type: "string",
        description: "SOSL search, e.g. FIND {Acme} IN NAME FIELDS RETURNING Account(Id, Name), Contact(Id, Name)",
      },
    },
    required: ["search"],
  },
};

export const runSoslSearchArgs = z.object({
  search: nonEmptyString,
});

export type RunSoslSearchArgs = z.infer<typeof runSoslSearchArgs>;

export async function handleRunSoslSearch(client: SalesforceClient, args: RunSoslSearchArgs): Promise<string> {
  const result = await client.search(args.search);
  return formatJson("SOSL Search Results (JSON)", result);
}
