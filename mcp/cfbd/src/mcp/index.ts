/**
 * Creates and configures the McpServer instance for one MCP session.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../lib/logger.js';
import type { CfbdClient } from '../services/cfbd/index.js';
import { registerCfbdTools } from './tools/index.js';
import { registerSchemaResources } from './resources.js';
import { registerPrompts } from './prompts.js';

export const SERVER_NAME = 'cfbd-mcp';
export const SERVER_VERSION = '0.5.0';

/**
 * Shown to the client during initialization.
 */
const SERVER_INSTRUCTIONS = `College Football Data API access for games, team records, play-by-play, drives, play statistics, rankings, pregame win probabilities and advanced box scores.

Always tell the user the data comes from the College Football Data API.
Read the schema:// resources for the parameters each endpoint accepts.
Seasons start in 2001; weeks run 1-15; season_type is regular or postseason; classification is fbs, fcs, ii or iii.`;

/**
 * @param client - Cache-aside CFBD client shared by every session
 */
export function createMcpServer(client: CfbdClient): McpServer {
  logger.debug('Creating MCP server instance');

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerCfbdTools(server, client);
  registerSchemaResources(server);
  registerPrompts(server);

  return server;
}
