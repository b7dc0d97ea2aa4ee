import type { ToolContext, ToolResult } from './types/tools.js';
import { TOOL_REGISTRY, isToolName } from './tools/index.js';
import { UnknownToolError, toToolFailure } from './utils/errorHandler.js';

/**
 * Run one tool call. Every failure, whatever its origin, comes back as an
 * error result; nothing is thrown to the caller.
 */
export async function dispatchTool(
  context: ToolContext,
  name: string,
  args: unknown
): Promise<ToolResult> {
  try {
    if (!isToolName(name)) {
      throw new UnknownToolError(name);
    }
    const text = await TOOL_REGISTRY[name].invoke(context, args);
    return { ok: true, text };
  } catch (error) {
    const failure = toToolFailure(error);
    console.error(`Tool ${name} failed (${failure.kind}): ${failure.message}`);
    return { ok: false, error: failure };
  }
}

/**
 * Render a failure the way it is returned to the MCP client
 */
export function formatToolFailure(result: Extract<ToolResult, { ok: false }>): string {
  return JSON.stringify({ error: result.error.message, kind: result.error.kind }, null, 2);
}
