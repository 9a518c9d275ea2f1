/**
 * MCP Tool: list_locations
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HomeboxClient } from '../../services/homebox/index.js';
import { logger } from '../../lib/logger.js';
import { handleMissingConfiguration, handleToolError } from './error-handler.js';
import { formatLocationList, textResult, type ToolResult } from './format.js';

export async function listLocations(client: HomeboxClient): Promise<ToolResult> {
  if (!client.isConfigured()) {
    return handleMissingConfiguration('list_locations');
  }

  try {
    const locations = await client.getLocations();
    return textResult(formatLocationList(locations));
  } catch (error) {
    return handleToolError(error, 'list_locations', 'listing locations');
  }
}

/**
 * Registers location MCP tools with the server.
 */
export function registerLocationTools(server: McpServer, client: HomeboxClient): void {
  server.tool(
    'list_locations',
    'List every storage location with its ID and description. Use the IDs with search_items_by_location.',
    {},
    async () => {
      logger.debug('list_locations tool called');
      return listLocations(client);
    }
  );

  logger.info('Location tools registered');
}
