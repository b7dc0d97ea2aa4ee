import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient } from "../types/salesforce.js";
import { ValidationError } from "../utils/errorHandler.js";
import { formatJson, soqlString } from "../utils/format.js";
import { getBoolean, getString } from "../utils/records.js";
import { recordIdSchema } from "./schemas.js";

export const GET_USER_PERMISSIONS: Tool = {
  name: "get_user_permissions",
  description: "Shows the profile and permission sets assigned to a user. Defaults to the user the server is connected as.",
  inputSchema: {
    type: "object",
    properties: {
      user_id: {
        type: "string",
        description: "Salesforce ID of the user (005...). Omit for the connected user.",
      },
    },
    required: [],
  },
};

export const getUserPermissionsArgs = z.object({
  user_id: recordIdSchema.optional(),
});

export type GetUserPermissionsArgs = z.infer<typeof getUserPermissionsArgs>;

export async function handleGetUserPermissions(
  client: SalesforceClient,
  args: GetUserPermissionsArgs
): Promise<string> {
  const userId = args.user_id ?? (await client.identity()).user_id;

  const users = await client.query(
    `SELECT Id, Username, Name, IsActive, Profile.Name, UserRole.Name FROM User WHERE Id = ${soqlString(userId)}`
  );
  const user = users.records[0];
  if (!user) {
    throw new ValidationError(`User ${userId} was not found`);
  }

  const assignments = await client.query(
    "SELECT PermissionSet.Id, PermissionSet.Name, PermissionSet.Label, PermissionSet.IsOwnedByProfile " +
      `FROM PermissionSetAssignment WHERE AssigneeId = ${soqlString(userId)} ORDER BY PermissionSet.Label`
  );

  const permissionSets = assignments.records
    .filter((assignment) => !getBoolean(assignment, "PermissionSet.IsOwnedByProfile"))
    .map((assignment) => ({
      id: getString(assignment, "PermissionSet.Id"),
      name: getString(assignment, "PermissionSet.Name"),
      label: getString(assignment, "PermissionSet.Label"),
    }));

  return formatJson("User Permissions (JSON)", {
    userId: getString(user, "Id") ?? userId,
    username: getString(user, "Username"),
    name: getString(user, "Name"),
    isActive: getBoolean(user, "IsActive"),
    profile: getString(user, "Profile.Name"),
    role: getString(user, "UserRole.Name"),
    permissionSets,
  });
}
