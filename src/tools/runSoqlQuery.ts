import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";
import { nonEmptyString } from "./schemas.js";

export const RUN_SOQL_QUERY: Tool = {
  name: "run_soql_query",
  description: "Executes a SOQL query against Salesforce and returns every matching row (all result pages are fetched, up to 50,000 rows).",
  inputSchema: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "SOQL query, e.g. SELECT Id, Name FROM Account WHERE Industry = 'Energy'",
      },
    },
    required: ["query"],
  },
};

export const runSoqlQueryArgs = z.object({
  query: nonEmptyString,
});

export type RunSoqlQueryArgs = z.infer<typeof runSoqlQueryArgs>;

export async function handleRunSoqlQuery(client: SalesforceClient, args: RunSoqlQueryArgs): Promise<string> {
  const result = await client.query(args.query);
  return formatJson("SOQL Query Results (JSON)", result);
}
