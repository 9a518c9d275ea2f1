/**
 * Homebox REST API client.
 *
 * Uses native fetch with JSON headers and, when configured, the Cloudflare
 * Access service-token headers. Every call is a single GET: no queue, no
 * retry. A per-request timeout aborts hung connections.
 *
 * Failures come out in two shapes:
 * - HomeboxApiError: non-2xx status, network failure or timeout
 * - HomeboxResponseError: a 2xx answer whose body is not the expected JSON
 */

import type { z } from 'zod';
import { logger } from '../../lib/logger.js';
import {
  apiErrorBodySchema,
  itemPageSchema,
  itemSchema,
  locationListSchema,
  type Item,
  type ItemPage,
  type ItemSearchParams,
  type Location,
  type LocationItemsParams,
} from './types.js';

/**
 * Query parameter values. Arrays are sent as a repeated key.
 */
type QueryValue = string | number | (string | number)[];
type QueryParams = Record<string, QueryValue | undefined>;

/**
 * Homebox API client configuration.
 */
export interface HomeboxClientConfig {
  /** Homebox URL, with or without the trailing /api segment */
  baseUrl: string;
  /** Cloudflare Access client ID (optional) */
  accessClientId?: string;
  /** Cloudflare Access client secret (optional) */
  accessClientSecret?: string;
  /** Request timeout in milliseconds (optional, defaults to 30000) */
  timeoutMs?: number;
}

/**
 * Error thrown for HTTP-layer failures.
 *
 * `status` is 0 when no response was received.
 */
export class HomeboxApiError extends Error {
  public readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'HomeboxApiError';
    this.status = status;
  }
}

/**
 * Error thrown when a successful response cannot be read.
 */
export class HomeboxResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HomeboxResponseError';
  }
}

/**
 * Normalizes a configured Homebox URL to the API root.
 *
 * Strips one trailing slash, then appends /api unless already present.
 * Normalizing an already-normalized URL returns it unchanged.
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.endsWith('/') ? url.slice(0, -1) : url;
  return trimmed.endsWith('/api') ? trimmed : `${trimmed}/api`;
}

/**
 * Builds request headers.
 *
 * The two access headers are all-or-nothing: with only one of id and
 * secret configured, neither is sent.
 */
export function buildHeaders(
  accessClientId: string,
  accessClientSecret: string
): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  if (accessClientId && accessClientSecret) {
    headers['CF-Access-Client-Id'] = accessClientId;
    headers['CF-Access-Client-Secret'] = accessClientSecret;
  }

  return headers;
}

/**
 * Builds the message for a non-2xx response, e.g.
 * "HTTP 404: Not Found - item not found".
 */
function describeHttpFailure(status: number, statusText: string, rawBody: string): string {
  let message = statusText ? `HTTP ${status}: ${statusText}` : `HTTP ${status}`;

  let parsed: unknown;
  try {
    parsed = rawBody ? JSON.parse(rawBody) : undefined;
  } catch {
    parsed = undefined;
  }

  const body = apiErrorBodySchema.safeParse(parsed);
  const detail = body.success ? (body.data.error ?? body.data.message) : undefined;
  if (detail) {
    message += ` - ${detail}`;
  }

  return message;
}

/**
 * Formats the first schema issue as "path: message".
 */
function describeSchemaFailure(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'Invalid response from Homebox API';
  }
  const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return `Invalid response from Homebox API: ${path}${issue.message}`;
}

/**
 * Homebox REST API client.
 *
 * Read-only: items, item details, and locations.
 */
export class HomeboxClient {
  private readonly baseUrl: string;
  private readonly accessClientId: string;
  private readonly accessClientSecret: string;
  private readonly timeoutMs: number;

  constructor(config: HomeboxClientConfig) {
    this.baseUrl = config.baseUrl;
    this.accessClientId = config.accessClientId ?? '';
    this.accessClientSecret = config.accessClientSecret ?? '';
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  /**
   * Whether a Homebox URL has been supplied. Tools check this before
   * every call.
   */
  isConfigured(): boolean {
    return this.baseUrl !== '';
  }

  /**
   * Issues one GET request and validates the JSON body against `schema`.
   *
   * @param endpoint - Path below the API root, e.g. /v1/items
   * @param schema - zod schema for the response body
   * @param params - Query parameters; undefined values are skipped
   * @throws HomeboxApiError on non-2xx responses, network errors and timeouts
   * @throws HomeboxResponseError on malformed or unexpected bodies
   */
  private async request<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    params?: QueryParams
  ): Promise<z.output<S>> {
    const url = new URL(`${normalizeBaseUrl(this.baseUrl)}${endpoint}`);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
          for (const entry of value) {
            url.searchParams.append(key, String(entry));
          }
        } else {
          url.searchParams.set(key, String(value));
        }
      }
    }

    logger.debug('Homebox API request', { endpoint, params: params ?? {} });

    const startTime = Date.now();
    let response: Response;
    let rawBody: string;

    try {
      response = await fetch(url.toString(), {
        method: 'GET',
        headers: buildHeaders(this.accessClientId, this.accessClientSecret),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      rawBody = await response.text();
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'TimeoutError'
          ? `Request timed out after ${this.timeoutMs}ms`
          : `Request failed: ${error instanceof Error ? error.message : String(error)}`;

      logger.error('Homebox API request failed', { endpoint, error: message });
      throw new HomeboxApiError(message, 0);
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      const message = describeHttpFailure(response.status, response.statusText, rawBody);
      logger.error('Homebox API error', {
        endpoint,
        status: response.status,
        message,
        duration,
        responseBody: rawBody.slice(0, 2000),
      });
      throw new HomeboxApiError(message, response.status);
    }

    let body: unknown;
    try {
      body = rawBody ? JSON.parse(rawBody) : {};
    } catch (error) {
      logger.warn('Homebox API response is not JSON', {
        endpoint,
        status: response.status,
        rawBody: rawBody.slice(0, 500),
      });
      throw new HomeboxResponseError(
        `Invalid JSON in Homebox API response: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const message = describeSchemaFailure(parsed.error);
      logger.warn('Homebox API response failed validation', { endpoint, message });
      throw new HomeboxResponseError(message);
    }

    logger.debug('Homebox API response', { endpoint, status: response.status, duration });

    return parsed.data;
  }

  // ===========================================================================
  // Items
  // ===========================================================================

  /**
   * Full-text item search.
   */
  async searchItems(params: ItemSearchParams): Promise<ItemPage> {
    return this.request('/v1/items', itemPageSchema, {
      q: params.query,
      page: params.page,
      pageSize: params.pageSize,
    });
  }

  /**
   * Items stored in one location.
   */
  async searchItemsByLocation(params: LocationItemsParams): Promise<ItemPage> {
    return this.request('/v1/items', itemPageSchema, {
      locations: [params.locationId],
      page: params.page,
      pageSize: params.pageSize,
    });
  }

  /**
   * A single item with purchase, warranty and custom-field details.
   */
  async getItem(id: string): Promise<Item> {
    return this.request(`/v1/items/${encodeURIComponent(id)}`, itemSchema);
  }

  // ===========================================================================
  // Locations
  // ===========================================================================

  async getLocations(): Promise<Location[]> {
    return this.request('/v1/locations', locationListSchema);
  }
}
