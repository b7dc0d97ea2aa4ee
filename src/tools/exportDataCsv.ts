import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { extractSelectFields, toCsv } from "../utils/csv.js";
import { ValidationError } from "../utils/errorHandler.js";
import { nonEmptyString } from "./schemas.js";

export const EXPORT_DATA_CSV: Tool = {
  name: "export_data_csv",
  description: "Runs a SOQL query and returns the rows as CSV. Columns follow the order of the SELECT list; relationship fields such as Account.Name are supported, sub-queries are left out.",
  inputSchema: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "SOQL query, e.g. SELECT Id, Name, Account.Name FROM Contact",
      },
    },
    required: ["query"],
  },
};

export const exportDataCsvArgs = z.object({
  query: nonEmptyString,
});

export type ExportDataCsvArgs = z.infer<typeof exportDataCsvArgs>;

export async function handleExportDataCsv(client: SalesforceClient, args: ExportDataCsvArgs): Promise<string> {
  const columns = extractSelectFields(args.query);
  if (columns.length === 0) {
    throw new ValidationError("query must be a SELECT ... FROM ... statement with at least one field");
  }

  const result = await client.query(args.query);
  return toCsv(columns, result.records);
}
