/**
 * MCP Tool Registration
 *
 * Creates and configures the McpServer instance with the Homebox tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from '../../lib/logger.js';
import { createHomeboxClient } from '../../services/homebox/index.js';
import { registerItemTools } from './items.js';
import { registerLocationTools } from './locations.js';

export const SERVER_VERSION = '1.0.0';

/**
 * Brief server description shown during initialization.
 */
const SERVER_DESCRIPTION =
  'Homebox home inventory integration (read-only). Search items, read full item records, list storage locations and browse the items in a location. Read the homebox://instructions resource for usage guide.';

/**
 * Detailed instructions for LLMs, served as a resource.
 */
const INSTRUCTIONS_RESOURCE = `# Homebox MCP Server Instructions

This server gives read-only access to a Homebox home inventory.

## Available Tools

- **search_items**: Free-text search. Returns name, description, location, asset ID, quantity, manufacturer and model per item.
- **get_item_details**: Full record of one item, including purchase, warranty, custom fields and notes.
- **list_locations**: All storage locations with their IDs.
- **search_items_by_location**: Items stored in one location.

## Workflow

1. Use \`list_locations\` to find a location ID, then \`search_items_by_location(location_id=...)\`.
2. Use \`search_items(query=...)\` to find an item, then \`get_item_details(item_id=...)\` for everything about it.

## Pagination

\`search_items\` and \`search_items_by_location\` take \`page\` (default 1) and \`page_size\` (default 20, max 100).
Results end with "Page X of Y"; when more pages remain, a hint gives the next \`page\` value.

## Notes

- Fields that are not filled in for an item are omitted from the output.
- The location name in \`search_items_by_location\` results is taken from the first item returned.
- Every result is plain text. Failures start with "Error" or "Unexpected error".
`;

/**
 * Creates and returns a configured McpServer instance.
 *
 * The server is configured with:
 * - Instructions resource with the usage guide
 * - Ping tool for connectivity testing
 * - Item tools (search_items, get_item_details, search_items_by_location)
 * - Location tools (list_locations)
 */
export function createMcpServer(): McpServer {
  logger.info('Creating MCP server instance');

  const server = new McpServer(
    {
      name: 'homebox-mcp',
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_DESCRIPTION,
    }
  );

  const client = createHomeboxClient();

  server.resource(
    'instructions',
    'homebox://instructions',
    {
      description: 'Usage guide for the Homebox MCP server. Read this to understand the available tools and pagination.',
      mimeType: 'text/markdown',
    },
    async () => ({
      contents: [
        {
          uri: 'homebox://instructions',
          mimeType: 'text/markdown',
          text: INSTRUCTIONS_RESOURCE,
        },
      ],
    })
  );

  server.tool(
    'homebox_ping',
    'Test tool to verify the MCP server is working. Returns "pong" to confirm connectivity.',
    {},
    async () => {
      logger.debug('Ping tool called');
      return {
        content: [
          {
            type: 'text',
            text: 'pong',
          },
        ],
      };
    }
  );

  registerItemTools(server, client);
  registerLocationTools(server, client);

  logger.info('MCP server created with all tools registered');
  return server;
}
