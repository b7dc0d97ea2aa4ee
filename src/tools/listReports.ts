import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson, soqlContainsPattern } from "../utils/format.js";

export const LIST_REPORTS: Tool = {
  name: "list_reports",
  description: "Lists reports in the org, optionally filtered by name.",
  inputSchema: {
    type: "object",
    properties: {
      search: {
        type: "string",
        description: "Substring matched against the report name",
      },
      limit: {
        type: "number",
        description: "Maximum number of reports to return (default 50, max 2000)",
      },
    },
    required: [],
  },
};

export const listReportsArgs = z.object({
  search: z.string().trim().min(1).optional(),
  limit: z.number().int().positive().max(2000).default(50),
});

export type ListReportsArgs = z.infer<typeof listReportsArgs>;

export async function handleListReports(client: SalesforceClient, args: ListReportsArgs): Promise<string> {
  const where = args.search ? ` WHERE Name LIKE ${soqlContainsPattern(args.search)}` : "";
  const result = await client.query(
    `SELECT Id, Name, DeveloperName, FolderName, Format, Description, LastRunDate FROM Report${where} ` +
      `ORDER BY Name LIMIT ${args.limit}`
  );
  return formatJson(`Reports (${result.records.length})`, result.records);
}
