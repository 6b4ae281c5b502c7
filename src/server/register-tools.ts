/**
 * Tool Registration
 *
 * Registers every MCP tool on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { ingestionTools } from '../tools/ingestion.js';
import { queryTools } from '../tools/query.js';
import { documentTools } from '../tools/documents.js';
import { conversationTools } from '../tools/conversations.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
export const allToolModules: Record<string, ToolDefinition>[] = [
  ingestionTools,
  queryTools,
  documentTools,
  conversationTools,
  configTools,
];

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 * @throws Error if two modules declare the same tool name
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return registeredToolNames.size;
}
