import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SalesforceClient, SaveResult, SObjectRecord } from "../types/salesforce.js";
import { formatRemoteError, formatSaveError } from "../utils/errorHandler.js";
import { formatJson, soqlString, soqlStringList } from "../utils/format.js";
import { getBoolean, getString } from "../utils/records.js";
import { fieldNameSchema, nonEmptyString, objectNameSchema } from "./schemas.js";

type ParentKind = "profile" | "permissionSet";

interface PermissionParent {
  id: string;
  kind: ParentKind;
  name: string;
}

export interface FieldPermissionOutcome {
  parent: string;
  kind: ParentKind;
  action: "created" | "updated";
  success: boolean;
  error?: string;
}

export const SET_FIELD_PERMISSIONS: Tool = {
  name: "set_field_permissions",
  description: "Grants or changes read/edit access to a field for profiles and permission sets. Existing field permissions are updated, missing ones are created. Edit access implies read access.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: { type: "string", description: "API name of the object, e.g. Account" },
      field_name: { type: "string", description: "API name of the field, e.g. Score__c" },
      profile_names: {
        type: "array",
        items: { type: "string" },
        description: 'Profile names, e.g. ["System Administrator"]',
      },
      permission_set_names: {
        type: "array",
        items: { type: "string" },
        description: "Permission set API names",
      },
      read: { type: "boolean", description: "Grant read access (default true)" },
      edit: { type: "boolean", description: "Grant edit access (default false)" },
    },
    required: ["object_name", "field_name"],
  },
};

export const GET_FIELD_PERMISSIONS: Tool = {
  name: "get_field_permissions",
  description: "Lists which profiles and permission sets can read or edit a field.",
  inputSchema: {
    type: "object",
    properties: {
      object_name: { type: "string", description: "API name of the object, e.g. Account" },
      field_name: { type: "string", description: "API name of the field, e.g. Score__c" },
    },
    required: ["object_name", "field_name"],
  },
};

export const setFieldPermissionsArgs = z
  .object({
    object_name: objectNameSchema,
    field_name: fieldNameSchema,
    profile_names: z.array(nonEmptyString).default([]),
    permission_set_names: z.array(nonEmptyString).default([]),
    read: z.boolean().default(true),
    edit: z.boolean().default(false),
  })
  .refine(
    (args) => args.profile_names.length + args.permission_set_names.length > 0,
    "profile_names or permission_set_names must name at least one profile or permission set"
  );

export type SetFieldPermissionsArgs = z.infer<typeof setFieldPermissionsArgs>;

export const getFieldPermissionsArgs = z.object({
  object_name: objectNameSchema,
  field_name: fieldNameSchema,
});

export type GetFieldPermissionsArgs = z.infer<typeof getFieldPermissionsArgs>;

async function findParents(
  client: SalesforceClient,
  profileNames: string[],
  permissionSetNames: string[]
): Promise<PermissionParent[]> {
  const parents: PermissionParent[] = [];

  if (profileNames.length > 0) {
    const profiles = await client.query(
      "SELECT Id, Profile.Name FROM PermissionSet " +
        `WHERE IsOwnedByProfile = true AND Profile.Name IN (${soqlStringList(profileNames)})`
    );
    for (const record of profiles.records) {
      const id = getString(record, "Id");
      const name = getString(record, "Profile.Name");
      if (id && name) {
        parents.push({ id, kind: "profile", name });
      }
    }
  }

  if (permissionSetNames.length > 0) {
    const permissionSets = await client.query(
      "SELECT Id, Name FROM PermissionSet " +
        `WHERE IsOwnedByProfile = false AND Name IN (${soqlStringList(permissionSetNames)})`
    );
    for (const record of permissionSets.records) {
      const id = getString(record, "Id");
      const name = getString(record, "Name");
      if (id && name) {
        parents.push({ id, kind: "permissionSet", name });
      }
    }
  }

  return parents;
}

function missingNames(requested: string[], found: PermissionParent[], kind: ParentKind): string[] {
  const foundNames = new Set(
    found.filter((parent) => parent.kind === kind).map((parent) => parent.name.toLowerCase())
  );
  return requested.filter((name) => !foundNames.has(name.toLowerCase()));
}

async function saveOutcome(
  parent: PermissionParent,
  action: FieldPermissionOutcome["action"],
  save: () => Promise<SaveResult>
): Promise<FieldPermissionOutcome> {
  const outcome = { parent: parent.name, kind: parent.kind, action };
  try {
    const result = await save();
    return result.success
      ? { ...outcome, success: true }
      : { ...outcome, success: false, error: formatSaveError(result, `${action === "created" ? "create" : "update"} field permission`) };
  } catch (error) {
    return { ...outcome, success: false, error: formatRemoteError(error) };
  }
}

export async function handleSetFieldPermissions(
  client: SalesforceClient,
  args: SetFieldPermissionsArgs
): Promise<string> {
  const field = `${args.object_name}.${args.field_name}`;
  const permissionsEdit = args.edit;
  const permissionsRead = args.read || args.edit;

  const parents = await findParents(client, args.profile_names, args.permission_set_names);
  const notFound = [
    ...missingNames(args.profile_names, parents, "profile"),
    ...missingNames(args.permission_set_names, parents, "permissionSet"),
  ];

  const existingByParent = new Map<string, string>();
  if (parents.length > 0) {
    const existing = await client.query(
      "SELECT Id, ParentId FROM FieldPermissions " +
        `WHERE SobjectType = ${soqlString(args.object_name)} AND Field = ${soqlString(field)} ` +
        `AND ParentId IN (${soqlStringList(parents.map((parent) => parent.id))})`
    );
    for (const record of existing.records) {
      const id = getString(record, "Id");
      const parentId = getString(record, "ParentId");
      if (id && parentId) {
        existingByParent.set(parentId, id);
      }
    }
  }

  const results: FieldPermissionOutcome[] = [];
  for (const parent of parents) {
    const existingId = existingByParent.get(parent.id);
    if (existingId) {
      results.push(
        await saveOutcome(parent, "updated", () =>
          client.update("FieldPermissions", {
            Id: existingId,
            PermissionsRead: permissionsRead,
            PermissionsEdit: permissionsEdit,
          })
        )
      );
    } else {
      const record: SObjectRecord = {
        ParentId: parent.id,
        SobjectType: args.object_name,
        Field: field,
        PermissionsRead: permissionsRead,
        PermissionsEdit: permissionsEdit,
      };
      results.push(await saveOutcome(parent, "created", () => client.create("FieldPermissions", record)));
    }
  }

  return formatJson("Field Permissions Update (JSON)", {
    field,
    read: permissionsRead,
    edit: permissionsEdit,
    results,
    notFound,
  });
}

export async function handleGetFieldPermissions(
  client: SalesforceClient,
  args: GetFieldPermissionsArgs
): Promise<string> {
  const field = `${args.object_name}.${args.field_name}`;
  const result = await client.query(
    "SELECT Id, ParentId, Parent.Name, Parent.IsOwnedByProfile, Parent.Profile.Name, " +
      "PermissionsRead, PermissionsEdit FROM FieldPermissions " +
      `WHERE SobjectType = ${soqlString(args.object_name)} AND Field = ${soqlString(field)}`
  );

  const permissions = result.records.map((record) => {
    const isProfile = getBoolean(record, "Parent.IsOwnedByProfile");
    return {
      parentId: getString(record, "ParentId"),
      kind: isProfile ? "profile" : "permissionSet",
      name: isProfile ? getString(record, "Parent.Profile.Name") : getString(record, "Parent.Name"),
      read: getBoolean(record, "PermissionsRead"),
      edit: getBoolean(record, "PermissionsEdit"),
    };
  });

  return formatJson(`${field} Field Permissions (JSON)`, permissions);
}
