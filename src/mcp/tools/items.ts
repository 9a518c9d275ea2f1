/**
 * MCP Tools: Items
 *
 * search_items, get_item_details and search_items_by_location.
 * Each handler issues exactly one Homebox request and returns text.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HomeboxClient } from '../../services/homebox/index.js';
import { logger } from '../../lib/logger.js';
import { handleMissingConfiguration, handleToolError } from './error-handler.js';
import {
  formatItemDetails,
  formatItemSearch,
  formatLocationItems,
  textResult,
  type ToolResult,
} from './format.js';

const pageSchema = z
  .number()
  .int()
  .positive()
  .default(1)
  .describe('Page number (1-indexed)');

const pageSizeSchema = z
  .number()
  .int()
  .min(1)
  .max(100)
  .default(20)
  .describe('Items per page (max 100)');

export interface SearchItemsArgs {
  query: string;
  page: number;
  page_size: number;
}

export interface LocationItemsArgs {
  location_id: string;
  page: number;
  page_size: number;
}

/**
 * Full-text search over the inventory.
 */
export async function searchItems(
  client: HomeboxClient,
  args: SearchItemsArgs
): Promise<ToolResult> {
  if (!client.isConfigured()) {
    return handleMissingConfiguration('search_items');
  }

  try {
    const result = await client.searchItems({
      query: args.query,
      page: args.page,
      pageSize: args.page_size,
    });

    logger.debug('search_items results', { total: result.total, returned: result.data.length });

    return textResult(formatItemSearch(args.query, args.page, args.page_size, result));
  } catch (error) {
    return handleToolError(error, 'search_items', 'searching items');
  }
}

/**
 * Full record of one item.
 */
export async function getItemDetails(
  client: HomeboxClient,
  args: { item_id: string }
): Promise<ToolResult> {
  if (!client.isConfigured()) {
    return handleMissingConfiguration('get_item_details');
  }

  try {
    const item = await client.getItem(args.item_id);
    return textResult(formatItemDetails(item));
  } catch (error) {
    return handleToolError(error, 'get_item_details', 'retrieving item details');
  }
}

/**
 * Items stored in one location.
 */
export async function searchItemsByLocation(
  client: HomeboxClient,
  args: LocationItemsArgs
): Promise<ToolResult> {
  if (!client.isConfigured()) {
    return handleMissingConfiguration('search_items_by_location');
  }

  try {
    const result = await client.searchItemsByLocation({
      locationId: args.location_id,
      page: args.page,
      pageSize: args.page_size,
    });

    return textResult(formatLocationItems(args.page, args.page_size, result));
  } catch (error) {
    return handleToolError(error, 'search_items_by_location', 'searching items by location');
  }
}

/**
 * Registers item MCP tools with the server.
 *
 * @param server - The MCP server instance
 * @param client - The Homebox API client
 */
export function registerItemTools(server: McpServer, client: HomeboxClient): void {
  server.tool(
    'search_items',
    'Search the Homebox inventory by name, description or other text. Returns name, location, asset ID, quantity, manufacturer and model for each match, with pagination.',
    {
      query: z.string().describe('Search text'),
      page: pageSchema,
      page_size: pageSizeSchema,
    },
    async (params) => {
      logger.debug('search_items tool called', { params });
      return searchItems(client, params);
    }
  );

  server.tool(
    'get_item_details',
    'Get the full record of one item: identifiers, quantity, location, purchase and warranty information, custom fields and notes. Use an ID from search_items.',
    {
      item_id: z.string().min(1).describe('Homebox item ID'),
    },
    async (params) => {
      logger.debug('get_item_details tool called', { params });
      return getItemDetails(client, params);
    }
  );

  server.tool(
    'search_items_by_location',
    'List the items stored in a location. Use an ID from list_locations.',
    {
      location_id: z.string().min(1).describe('Homebox location ID'),
      page: pageSchema,
      page_size: pageSizeSchema,
    },
    async (params) => {
      logger.debug('search_items_by_location tool called', { params });
      return searchItemsByLocation(client, params);
    }
  );

  logger.info('Item tools registered');
}
