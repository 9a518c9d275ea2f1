/**
 * Text formatters for tool results.
 *
 * Each formatter turns a validated payload into the multi-line report the
 * assistant host displays. Optional attributes are rendered only when
 * defined; see services/homebox/types.ts for what counts as absent.
 */

import type { Item, ItemPage, Location } from '../../services/homebox/index.js';

/**
 * Result shape shared by every tool: a single text block.
 */
export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: true;
}

export function textResult(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

/**
 * Pagination footer: "Page X of Y" on its own line, plus an unterminated
 * hint while more pages remain.
 */
export function formatPaginationFooter(page: number, pageSize: number, total: number): string {
  const totalPages = Math.ceil(total / pageSize);
  let footer = `Page ${page} of ${totalPages}\n`;

  if (page < totalPages) {
    footer += `Use 'page=${page + 1}' to see more results.`;
  }

  return footer;
}

/**
 * Result of search_items.
 */
export function formatItemSearch(
  query: string,
  page: number,
  pageSize: number,
  result: ItemPage
): string {
  if (result.data.length === 0) {
    return `No items found matching '${query}'.`;
  }

  const lines: string[] = [`Found ${result.total} items matching '${query}':`, ''];

  result.data.forEach((item, index) => {
    lines.push(`${index + 1}. ${item.name}`);

    if (item.description !== undefined) {
      lines.push(`   Description: ${item.description}`);
    }
    if (item.location !== undefined) {
      lines.push(`   Location: ${item.location.name}`);
    }
    if (item.assetId !== undefined) {
      lines.push(`   Asset ID: ${item.assetId}`);
    }
    if (item.quantity !== undefined) {
      lines.push(`   Quantity: ${item.quantity}`);
    }
    if (item.manufacturer !== undefined) {
      lines.push(`   Manufacturer: ${item.manufacturer}`);
    }
    if (item.modelNumber !== undefined) {
      lines.push(`   Model: ${item.modelNumber}`);
    }

    lines.push('');
  });

  return `${lines.join('\n')}\n${formatPaginationFooter(page, pageSize, result.total)}`;
}

/**
 * Result of search_items_by_location.
 *
 * The header names the location embedded in the first result, not the
 * queried id; items without a location show "Unknown Location".
 */
export function formatLocationItems(page: number, pageSize: number, result: ItemPage): string {
  const [first] = result.data;
  if (first === undefined) {
    return 'No items found in the specified location.';
  }

  const locationName = first.location?.name ?? 'Unknown Location';
  const lines: string[] = [`Found ${result.total} items in location '${locationName}':`, ''];

  result.data.forEach((item, index) => {
    lines.push(`${index + 1}. ${item.name}`);

    if (item.description !== undefined) {
      lines.push(`   Description: ${item.description}`);
    }
    if (item.assetId !== undefined) {
      lines.push(`   Asset ID: ${item.assetId}`);
    }
    if (item.quantity !== undefined) {
      lines.push(`   Quantity: ${item.quantity}`);
    }

    lines.push('');
  });

  return `${lines.join('\n')}\n${formatPaginationFooter(page, pageSize, result.total)}`;
}

/**
 * Result of get_item_details. Blocks appear in a fixed order and empty
 * blocks are left out entirely. Every line, the last included, ends in a
 * newline.
 */
export function formatItemDetails(item: Item): string {
  const lines: string[] = [`Item Details: ${item.name}`, ''];

  if (item.description !== undefined) {
    lines.push(`Description: ${item.description}`, '');
  }

  lines.push('Basic Information:');
  if (item.assetId !== undefined) {
    lines.push(`- Asset ID: ${item.assetId}`);
  }
  if (item.quantity !== undefined) {
    lines.push(`- Quantity: ${item.quantity}`);
  }
  if (item.manufacturer !== undefined) {
    lines.push(`- Manufacturer: ${item.manufacturer}`);
  }
  if (item.modelNumber !== undefined) {
    lines.push(`- Model Number: ${item.modelNumber}`);
  }
  if (item.serialNumber !== undefined) {
    lines.push(`- Serial Number: ${item.serialNumber}`);
  }

  if (item.location !== undefined) {
    lines.push('', `Location: ${item.location.name}`);
  }

  const purchase: string[] = [];
  if (item.purchaseFrom !== undefined) {
    purchase.push(`- Purchased From: ${item.purchaseFrom}`);
  }
  if (item.purchasePrice !== undefined) {
    purchase.push(`- Purchase Price: ${item.purchasePrice}`);
  }
  if (item.purchaseTime !== undefined) {
    purchase.push(`- Purchase Date: ${item.purchaseTime}`);
  }
  if (purchase.length > 0) {
    lines.push('', 'Purchase Information:', ...purchase);
  }

  const warranty: string[] = [];
  if (item.lifetimeWarranty) {
    warranty.push('- Lifetime Warranty: Yes');
  }
  if (item.warrantyDetails !== undefined) {
    warranty.push(`- Warranty Details: ${item.warrantyDetails}`);
  }
  if (item.warrantyExpires !== undefined) {
    warranty.push(`- Warranty Expires: ${item.warrantyExpires}`);
  }
  if (warranty.length > 0) {
    lines.push('', 'Warranty Information:', ...warranty);
  }

  if (item.fields !== undefined) {
    lines.push('', 'Custom Fields:');
    for (const field of item.fields) {
      lines.push(`- ${field.name}: ${field.value}`);
    }
  }

  if (item.notes !== undefined) {
    lines.push('', 'Notes:', item.notes);
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Result of list_locations.
 */
export function formatLocationList(locations: Location[]): string {
  if (locations.length === 0) {
    return 'No locations found.';
  }

  const lines: string[] = [`Found ${locations.length} locations:`, ''];

  locations.forEach((location, index) => {
    lines.push(`${index + 1}. ${location.name}`);
    if (location.description !== undefined) {
      lines.push(`   Description: ${location.description}`);
    }
    lines.push(`   ID: ${location.id}`, '');
  });

  return `${lines.join('\n')}\n`;
}
