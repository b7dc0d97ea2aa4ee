import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";

export const LIST_SOBJECTS: Tool = {
  name: "list_sobjects",
  description: "Lists the objects available in the org. Optionally filters by a substring of the API name or label, or to custom objects only.",
  inputSchema: {
    type: "object",
    properties: {
      search: {
        type: "string",
        description: "Case-insensitive substring matched against object name and label",
      },
      custom_only: {
        type: "boolean",
        description: "Only return custom objects",
      },
    },
    required: [],
  },
};

export const listSObjectsArgs = z.object({
  search: z.string().trim().optional(),
  custom_only: z.boolean().default(false),
});

export type ListSObjectsArgs = z.infer<typeof listSObjectsArgs>;

export async function handleListSObjects(client: SalesforceClient, args: ListSObjectsArgs): Promise<string> {
  const { sobjects } = await client.describeGlobal();
  const needle = args.search?.toLowerCase();

  const matches = sobjects
    .filter((sobject) => !args.custom_only || sobject.custom)
    .filter((sobject) =>
      !needle ||
      sobject.name.toLowerCase().includes(needle) ||
      sobject.label.toLowerCase().includes(needle)
    )
    .map((sobject) => ({
      name: sobject.name,
      label: sobject.label,
      custom: sobject.custom,
      queryable: sobject.queryable,
      createable: sobject.createable,
      updateable: sobject.updateable,
      deletable: sobject.deletable,
      keyPrefix: sobject.keyPrefix ?? null,
    }));

  return formatJson(`SObjects (${matches.length})`, matches);
}
