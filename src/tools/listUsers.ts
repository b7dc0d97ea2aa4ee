import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { formatJson } from "../utils/format.js";

export const LIST_USERS: Tool = {
  name: "list_users",
  description: "Lists users with their profile and role.",
  inputSchema: {
    type: "object",
    properties: {
      active_only: {
        type: "boolean",
        description: "Only return active users (default true)",
      },
      limit: {
        type: "number",
        description: "Maximum number of users to return (default 100, max 2000)",
      },
    },
    required: [],
  },
};

export const listUsersArgs = z.object({
  active_only: z.boolean().default(true),
  limit: z.number().int().positive().max(2000).default(100),
});

export type ListUsersArgs = z.infer<typeof listUsersArgs>;

export async function handleListUsers(client: SalesforceClient, args: ListUsersArgs): Promise<string> {
  const where = args.active_only ? " WHERE IsActive = true" : "";
  const result = await client.query(
    `SELECT Id, Username, Name, Email, IsActive, Profile.Name, UserRole.Name, LastLoginDate FROM User${where} ` +
      `ORDER BY Name LIMIT ${args.limit}`
  );
  return formatJson(`Users (${result.records.length})`, result.records);
}
