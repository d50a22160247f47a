/**
 * schema:// resources describing each upstream endpoint in plain text.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  DIVISIONS,
  FIRST_SEASON,
  SEASON_TYPES,
  TOOL_CATALOGUE,
  WEEK_RANGE,
  type ToolDefinition,
} from './tools/catalogue.js';

export function schemaUriFor(tool: ToolDefinition): string {
  return `schema:/${tool.path}`;
}

/**
 * Renders the endpoint description served for `schema://<path>`.
 */
export function renderEndpointSchema(tool: ToolDefinition, currentYear = new Date().getFullYear()): string {
  const parameters = tool.parameters.map((param) => {
    const presence = param.required ? 'required' : 'optional';
    return `- ${param.name}: ${param.type} (${presence}) - ${param.description}`;
  });

  const lines = [
    `Endpoint: ${tool.path}`,
    `Description: ${tool.summary}`,
    '',
    'Input Parameters:',
    ...parameters,
  ];

  if (tool.requireOneOf) {
    lines.push(`At least one of: ${tool.requireOneOf.join(', ')}`);
  }

  lines.push(
    '',
    'Valid Values:',
    `- Seasons: ${FIRST_SEASON} to ${currentYear}`,
    `- Weeks: ${WEEK_RANGE.first} to ${WEEK_RANGE.last}`,
    `- Season Types: ${SEASON_TYPES.join(', ')}`,
    `- Divisions: ${DIVISIONS.join(', ')}`
  );

  return lines.join('\n');
}

export function registerSchemaResources(server: McpServer): void {
  for (const tool of TOOL_CATALOGUE) {
    const uri = schemaUriFor(tool);

    server.resource(
      `${tool.path} endpoint schema`,
      uri,
      {
        description: `Parameters and valid values for the ${tool.path} endpoint (used by ${tool.name})`,
        mimeType: 'text/plain',
      },
      async () => ({
        contents: [
          {
            uri,
            mimeType: 'text/plain',
            text: renderEndpointSchema(tool),
          },
        ],
      })
    );
  }
}
