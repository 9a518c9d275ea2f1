/**
 * Homebox API client module.
 *
 * Provides a client instance configured from the environment.
 *
 * Usage:
 *   import { createHomeboxClient } from './services/homebox/index.js';
 *   const client = createHomeboxClient();
 *   const page = await client.searchItems({ query: 'drill', page: 1, pageSize: 20 });
 */

import { getEnv } from '../../lib/env.js';
import { HomeboxClient } from './client.js';

export * from './types.js';

export {
  HomeboxClient,
  HomeboxApiError,
  HomeboxResponseError,
  normalizeBaseUrl,
  buildHeaders,
} from './client.js';
export type { HomeboxClientConfig } from './client.js';

let clientInstance: HomeboxClient | null = null;

/**
 * Creates or returns the memoized Homebox client.
 *
 * An empty HOMEBOX_URL still yields a client; its tools answer with the
 * configuration message until the URL is set.
 */
export function createHomeboxClient(): HomeboxClient {
  if (!clientInstance) {
    const env = getEnv();

    clientInstance = new HomeboxClient({
      baseUrl: env.HOMEBOX_URL,
      accessClientId: env.CF_ACCESS_CLIENT_ID,
      accessClientSecret: env.CF_ACCESS_CLIENT_SECRET,
      timeoutMs: env.HOMEBOX_TIMEOUT_MS,
    });
  }

  return clientInstance;
}

/**
 * Resets the memoized client instance.
 * Primarily used for testing purposes.
 */
export function resetHomeboxClient(): void {
  clientInstance = null;
}
