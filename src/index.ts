/**
 * Contacts API Entry Point
 *
 * Loads and validates configuration, opens the database and starts the
 * HTTP server.
 */

import './env.js';
import { ConfigError, loadConfig } from './config.js';
import { logger } from './utils/logger.js';
import { createAppContext } from './context.js';
import { startServer } from './api/server.js';

async function main() {
  const config = loadConfig();

  logger.info({ config: { port: config.api.port, host: config.api.host } }, 'Starting Contacts API');

  const context = createAppContext(config);
  await startServer(context);

  if (!config.avatars.bucket) {
    logger.warn('AVATAR_BUCKET not configured - avatar uploads disabled');
  }

  logger.info('Contacts API started successfully');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, 'Invalid configuration');
  } else {
    logger.fatal({ error }, 'Failed to start Contacts API');
  }
  process.exit(1);
});
