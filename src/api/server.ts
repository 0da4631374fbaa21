import express, { type Application } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'http';
import { logger } from '../utils/logger.js';
import { closeDatabase } from '../db/connection.js';
import type { AppContext } from '../context.js';
import { createAuthRouter } from './routes/auth.routes.js';
import { createContactsRouter } from './routes/contacts.routes.js';
import { createHealthRouter } from './routes/health.routes.js';
import {
  createCorsMiddleware,
  createRequireAuth,
  createUserRateLimiter,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware.js';

/**
 * HTTP server instance
 */
let server: ReturnType<Application['listen']> | null = null;

/**
 * Context owned by the running server, released on stop
 */
let serverContext: AppContext | null = null;

/**
 * Create and configure the Express application
 */
export function createApp(context: AppContext): Application {
  const expressApp = express();
  const { config } = context;

  // Trust proxy for X-Forwarded-For headers and req.protocol behind nginx
  expressApp.set('trust proxy', 1);

  // Request ID middleware
  expressApp.use(requestIdMiddleware);

  // Request logging via pino-http
  const httpLogger = pinoHttp({
    logger,
    // Don't log health checks to reduce noise
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/api/healthchecker',
    },
    serializers: {
      req: (req: IncomingMessage) => ({
        method: req.method,
        url: req.url,
      }),
      res: (res: ServerResponse) => ({
        statusCode: res.statusCode,
      }),
    },
  });

  expressApp.use(httpLogger);

  expressApp.use(createCorsMiddleware(config.api.corsOrigins));

  // JSON bodies, plus the OAuth2 password form on /login
  expressApp.use(express.json({ limit: '10kb' }));
  expressApp.use(express.urlencoded({ extended: false, limit: '10kb' }));

  const requireAuth = createRequireAuth(context.authService);

  expressApp.use(createHealthRouter(context.db));

  expressApp.use(
    '/api/auth',
    createAuthRouter({
      authService: context.authService,
      userService: context.userService,
      requireAuth,
    })
  );

  expressApp.use(
    '/api/contacts',
    createContactsRouter({
      contactService: context.contactService,
      requireAuth,
      rateLimiter: createUserRateLimiter(config.api.contactsRateLimit),
    })
  );

  // 404 handler
  expressApp.use(notFoundHandler);

  // Global error handler
  expressApp.use(errorHandler);

  return expressApp;
}

/**
 * Start the Express server
 */
export async function startServer(context: AppContext): Promise<void> {
  const app = createApp(context);
  const { port, host } = context.config.api;

  await new Promise<void>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve();
    });

    listening.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ error }, 'Failed to start server');
      }
      reject(error);
    });

    server = listening;
  });

  serverContext = context;

  // Set up graceful shutdown
  setupGracefulShutdown();
}

/**
 * Stop the Express server, drain background work and close the database
 */
export async function stopServer(): Promise<void> {
  const running = server;
  const context = serverContext;
  if (!running || !context) {
    return;
  }

  logger.info('Stopping API server...');

  await new Promise<void>((resolve) => {
    // Force close after timeout
    const forceTimer = setTimeout(() => {
      logger.warn('Forcing server shutdown after timeout');
      resolve();
    }, 10000);

    running.close(() => {
      clearTimeout(forceTimer);
      logger.info('API server stopped');
      resolve();
    });
  });

  await context.close();
  closeDatabase(context.db);

  server = null;
  serverContext = null;
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal');

    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  // Handle termination signals
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle unhandled rejections
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });
}
