import express, { type Application } from 'express';
import { pinoHttp } from 'pino-http';
import helmet from 'helmet';
import type { IncomingMessage, Server, ServerResponse } from 'http';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import type { UserRegistry } from '../services/users/index.js';
import { createPublicRouter, createUsersRouter } from './routes/index.js';
import { errorHandler, notFoundHandler, requestIdMiddleware } from './middleware.js';

/**
 * Everything the application needs, constructed by the caller
 */
export interface AppDependencies {
  config: Config;
  registry: UserRegistry;
}

export interface RunningServer {
  app: Application;
  server: Server;
  stop(): Promise<void>;
}

/**
 * Create and configure the Express application
 */
export function createApp({ config, registry }: AppDependencies): Application {
  const expressApp = express();

  // Request ID middleware
  expressApp.use(requestIdMiddleware);

  // Security headers. CSP is irrelevant for a JSON-only API.
  expressApp.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: false,
    })
  );

  // Request logging via pino-http
  const httpLogger = pinoHttp({
    logger,
    // Don't log health checks to reduce noise
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/health',
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

  expressApp.use(express.json({ limit: config.api.bodyLimit }));

  expressApp.use(
    '/',
    createPublicRouter({ serviceName: config.service.name, version: config.service.version })
  );
  expressApp.use('/users', createUsersRouter(registry));

  expressApp.use(notFoundHandler);
  expressApp.use(errorHandler);

  return expressApp;
}

/**
 * Start the Express server
 */
export async function startServer(deps: AppDependencies): Promise<RunningServer> {
  const app = createApp(deps);
  const { port, host, shutdownTimeoutMs } = deps.config.api;

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve(listening);
    });

    listening.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ error }, 'Failed to start server');
      }
      reject(error);
    });
  });

  return {
    app,
    server,
    stop: () => stopServer(server, shutdownTimeoutMs),
  };
}

/**
 * Stop the Express server
 */
async function stopServer(server: Server, timeoutMs: number): Promise<void> {
  logger.info('Stopping API server...');

  await new Promise<void>((resolve) => {
    // Force close after timeout
    const timer = setTimeout(() => {
      logger.warn('Forcing server shutdown after timeout');
      server.closeAllConnections();
      resolve();
    }, timeoutMs);

    server.close((error) => {
      clearTimeout(timer);
      if (error) {
        logger.warn({ error }, 'API server was not running');
      } else {
        logger.info('API server stopped');
      }
      resolve();
    });
  });
}
