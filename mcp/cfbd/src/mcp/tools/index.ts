/**
 * MCP Tool Registration
 *
 * Registers one tool per catalogue entry. Each call is validated, sent
 * through the cache-aside client exactly once, and answered with the
 * upstream JSON body as text.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../../lib/logger.js';
import { createValidationError, formatErrorForMcp } from '../../lib/errors.js';
import type { CfbdClient, QueryParams } from '../../services/cfbd/index.js';
import {
  TOOL_CATALOGUE,
  buildInputSchema,
  buildInputShape,
  checkArguments,
  describeTool,
  type ToolDefinition,
} from './catalogue.js';
import { handleToolError } from './error-handler.js';

export { TOOL_CATALOGUE, findTool, type ToolDefinition, type ToolParameter } from './catalogue.js';

/**
 * Keeps the scalar arguments that can go on the query string.
 */
function toQueryParams(args: Record<string, unknown>): QueryParams {
  const params: QueryParams = {};
  for (const [name, value] of Object.entries(args)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      params[name] = value;
    }
  }
  return params;
}

function registerTool(server: McpServer, client: CfbdClient, tool: ToolDefinition): void {
  const registered = server.tool(tool.name, describeTool(tool), buildInputShape(tool), async (args: Record<string, unknown>) => {
    logger.debug(`${tool.name} tool called`, { args });

    const problem = checkArguments(tool, args);
    if (problem) {
      return formatErrorForMcp(createValidationError(problem));
    }

    try {
      const data = await client.fetch('GET', tool.path, toQueryParams(args));
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(data),
          },
        ],
      };
    } catch (error) {
      return handleToolError(error, tool.name);
    }
  });

  // The shape alone would strip misspelled filters before the handler sees them
  registered.inputSchema = buildInputSchema(tool);
}

/**
 * Registers every College Football Data tool with the server.
 *
 * @param server - The MCP server instance
 * @param client - The cache-aside CFBD client shared by all sessions
 */
export function registerCfbdTools(server: McpServer, client: CfbdClient): void {
  for (const tool of TOOL_CATALOGUE) {
    registerTool(server, client, tool);
  }
  logger.debug('Registered CFBD tools', { count: TOOL_CATALOGUE.length });
}
