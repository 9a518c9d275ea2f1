/**
 * Homebox API payload schemas and types.
 *
 * Responses are parsed with zod so that every optional attribute comes out
 * as an explicit `T | undefined`. Homebox fills unset attributes with empty
 * strings, zero prices, `false` flags and the Go zero timestamp; all of
 * those normalize to `undefined` here, and formatters only ever ask
 * "is this defined".
 */

import { z } from 'zod';

// ============================================================================
// Presence helpers
// ============================================================================

/** Timestamp Homebox emits for dates that were never set. */
const ZERO_TIME_PREFIX = '0001-01-01';

const identifier = z.union([z.string(), z.number()]).transform(String);

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

const optionalDate = optionalText.transform((value) =>
  value !== undefined && value.startsWith(ZERO_TIME_PREFIX) ? undefined : value
);

/** Text or number shown as-is; '' and 0 count as absent. */
const optionalScalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) =>
    value === null || value === undefined || value === '' || value === 0
      ? undefined
      : String(value)
  );

const optionalQuantity = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

// ============================================================================
// Location
// ============================================================================

/**
 * Location reference embedded in an item.
 *
 * Only the name is rendered, so a reference without one (including `{}`)
 * parses to undefined instead of failing the whole item.
 */
export const locationRefSchema = z
  .object({
    id: identifier.optional(),
    name: z.string().nullish(),
  })
  .nullish()
  .transform((ref) => (ref?.name ? { id: ref.id, name: ref.name } : undefined));

/**
 * Location as returned by GET /v1/locations.
 */
export const locationSchema = z.object({
  id: identifier,
  name: z.string(),
  description: optionalText,
});

/**
 * GET /v1/locations answers with a bare array on current Homebox releases
 * and with `{ data: [...] }` on older ones.
 */
export const locationListSchema = z
  .union([
    z.array(locationSchema),
    z.object({ data: z.array(locationSchema).nullish() }),
  ])
  .transform((payload) => (Array.isArray(payload) ? payload : payload.data ?? []));

export type LocationRef = NonNullable<z.output<typeof locationRefSchema>>;
export type Location = z.output<typeof locationSchema>;

// ============================================================================
// Custom fields
// ============================================================================

const rawCustomFieldSchema = z.object({
  name: z.string(),
  type: z.string().nullish(),
  value: z.union([z.string(), z.number(), z.boolean()]).nullish(),
  textValue: z.string().nullish(),
  numberValue: z.number().nullish(),
  booleanValue: z.boolean().nullish(),
});

type RawCustomField = z.output<typeof rawCustomFieldSchema>;

/**
 * Resolves the display value of a custom field.
 *
 * A non-empty `value` wins; otherwise the typed slot matching `type` is
 * used (Homebox stores text, number and boolean fields in separate slots).
 */
export function resolveCustomFieldValue(field: RawCustomField): string {
  if (field.value !== null && field.value !== undefined && field.value !== '') {
    return String(field.value);
  }

  let typed: string | number | boolean | null | undefined;
  switch (field.type) {
    case 'number':
      typed = field.numberValue;
      break;
    case 'boolean':
      typed = field.booleanValue;
      break;
    default:
      typed = field.textValue;
  }

  return typed === null || typed === undefined ? '' : String(typed);
}

export const customFieldSchema = rawCustomFieldSchema.transform((field) => ({
  name: field.name,
  value: resolveCustomFieldValue(field),
}));

export type CustomField = z.output<typeof customFieldSchema>;

// ============================================================================
// Item
// ============================================================================

/**
 * Item as returned by the search and detail endpoints.
 *
 * Search results carry a subset of these attributes; the rest simply
 * parse to undefined.
 */
export const itemSchema = z.object({
  id: identifier,
  name: z.string(),
  description: optionalText,
  location: locationRefSchema,
  assetId: optionalScalar,
  quantity: optionalQuantity,
  manufacturer: optionalText,
  modelNumber: optionalText,
  serialNumber: optionalText,

  purchaseFrom: optionalText,
  purchasePrice: optionalScalar,
  purchaseTime: optionalDate,

  lifetimeWarranty: z
    .boolean()
    .nullish()
    .transform((value) => (value === true ? true : undefined)),
  warrantyDetails: optionalText,
  warrantyExpires: optionalDate,

  fields: z
    .array(customFieldSchema)
    .nullish()
    .transform((value) => (value && value.length > 0 ? value : undefined)),
  notes: optionalText,
});

export type Item = z.output<typeof itemSchema>;

// ============================================================================
// Search result page
// ============================================================================

/**
 * Page of items from GET /v1/items.
 *
 * A missing `data` key is an empty page; a missing `total` falls back to
 * the number of rows returned.
 */
export const itemPageSchema = z
  .object({
    total: z.number().int().nonnegative().nullish(),
    data: z.array(itemSchema).nullish(),
  })
  .transform((payload) => {
    const data = payload.data ?? [];
    return {
      total: payload.total ?? data.length,
      data,
    };
  });

export type ItemPage = z.output<typeof itemPageSchema>;

// ============================================================================
// Request parameters
// ============================================================================

/**
 * Pagination parameters for item searches (1-indexed page).
 */
export interface PaginationParams {
  page: number;
  pageSize: number;
}

export interface ItemSearchParams extends PaginationParams {
  query: string;
}

export interface LocationItemsParams extends PaginationParams {
  locationId: string;
}

/**
 * Error body Homebox sends with non-2xx responses.
 */
export const apiErrorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
});
