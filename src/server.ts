/**
 * Homebox MCP Server
 *
 * Entry point that validates environment and starts the HTTP server.
 * The Express app is defined in app.ts for testability.
 */

import { logger } from './lib/logger.js';
import { validateEnv, getEnv } from './lib/env.js';
import { app } from './app.js';

try {
  validateEnv();
} catch (error) {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}

const env = getEnv();

if (env.HOMEBOX_URL === '') {
  logger.warn('HOMEBOX_URL is not set; tools will answer with a configuration error');
}

app.listen(env.PORT, () => {
  logger.info('Homebox MCP server started', {
    port: env.PORT,
    env: env.NODE_ENV,
  });
});
