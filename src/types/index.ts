// csimux admin API type definitions

import type { Config } from '../config/index.js';
import type { RouterServer } from '../router/router-server.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    routingServer: RouterServer;
  }
}
