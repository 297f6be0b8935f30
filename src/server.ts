import { randomUUID } from 'node:crypto';

import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import fastify from 'fastify';

import type { Config } from './config/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import type { RouterServer } from './router/router-server.js';
import { healthRoutesPlugin } from './routes/health.js';
import { servicesRoutesPlugin } from './routes/services.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  router: RouterServer;
  logger: FastifyBaseLogger;
}

/** Admin HTTP API over a running router: health and service status. */
export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config, router, logger } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    loggerInstance: logger.child({ component: 'admin' }),
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    disableRequestLogging: !isDev,
  });

  server.decorate('config', config);
  server.decorate('routingServer', router);

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(healthRoutesPlugin);
  await server.register(servicesRoutesPlugin);

  return server;
}
