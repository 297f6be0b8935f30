// Daemon assembly: registry → services → router (→ admin API).

import type { FastifyBaseLogger, FastifyInstance } from 'fastify';

import type { Config } from './config/index.js';
import { serviceProviders as mockProviders } from './providers/mock/index.js';
import type { ServiceProviderTable } from './providers/types.js';
import { ProviderRegistry } from './registry/index.js';
import type { ModuleImporter } from './registry/index.js';
import { RouterServer } from './router/index.js';
import type { ShutdownMode } from './router/index.js';
import { createServer } from './server.js';
import { createService } from './service/index.js';

export interface StartDaemonOptions {
  logger: FastifyBaseLogger;
  /** Built-in providers (default: the mock provider) */
  builtins?: ServiceProviderTable;
  importModule?: ModuleImporter;
}

export interface Daemon {
  registry: ProviderRegistry;
  router: RouterServer;
  admin: FastifyInstance | undefined;
  /** Bound router address */
  address: string;
  shutdown(mode: ShutdownMode): Promise<void>;
}

export async function startDaemon(config: Config, options: StartDaemonOptions): Promise<Daemon> {
  const { logger } = options;

  const registry = new ProviderRegistry({
    logger,
    builtins: options.builtins ?? mockProviders,
    importModule: options.importModule,
  });
  await registry.load(...config.providerModules);

  const services = config.services.map((spec) => createService(registry, spec, { logger }));
  const router = new RouterServer({ address: config.endpoint, services, logger });
  const address = await router.serve();

  let admin: FastifyInstance | undefined;
  if (config.admin.enabled) {
    try {
      admin = await createServer({ config, router, logger });
      const adminAddress = await admin.listen({ host: config.admin.host, port: config.admin.port });
      logger.info({ address: adminAddress }, 'Admin API listening');
    } catch (error) {
      await router.stop();
      throw error;
    }
  }

  return {
    registry,
    router,
    admin,
    address,
    async shutdown(mode) {
      await router.shutdown(mode);
      await admin?.close();
    },
  };
}
