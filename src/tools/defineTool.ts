import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import type { RegisteredTool, ToolHandler } from "../types/tools.js";
import { formatValidationError, ValidationError } from "../utils/errorHandler.js";

/**
 * Bind a tool definition to its argument schema and handler. Arguments are
 * validated before the connection is touched, so a malformed call never
 * reaches Salesforce.
 */
export function defineTool<S extends z.ZodTypeAny>(
  definition: Tool,
  schema: S,
  handler: ToolHandler<z.output<S>>
): RegisteredTool {
  return {
    definition,
    async invoke(context, rawArgs) {
      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new ValidationError(formatValidationError(definition.name, parsed.error));
      }
      const client = context.connection.getClient();
      return await handler(client, parsed.data, context);
    },
  };
}
