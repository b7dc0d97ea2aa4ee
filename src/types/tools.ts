import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SalesforceClient } from './salesforce.js';
import type { ConnectionManager } from '../utils/connectionManager.js';
import type { FieldMetadataCache } from '../utils/fieldCache.js';

export type ToolErrorKind =
  | 'configuration'
  | 'connection'
  | 'invalid_arguments'
  | 'unknown_tool'
  | 'remote';

export interface ToolFailure {
  kind: ToolErrorKind;
  message: string;
}

export type ToolResult =
  | { ok: true; text: string }
  | { ok: false; error: ToolFailure };

/**
 * Process-wide state handed to every dispatch call
 */
export interface ToolContext {
  connection: ConnectionManager;
  fieldCache: FieldMetadataCache;
}

export type ToolHandler<A> = (
  client: SalesforceClient,
  args: A,
  context: ToolContext
) => Promise<string>;

/**
 * A tool with its arguments already bound to a schema. `invoke` validates
 * raw arguments and throws on any failure; the dispatcher turns that into a
 * ToolResult.
 */
export interface RegisteredTool {
  definition: Tool;
  invoke(context: ToolContext, rawArgs: unknown): Promise<string>;
}
