import { readFileSync } from 'node:fs';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { ServiceState } from '../service/service.js';

// Read version once at startup (not on every request)
const PackageJsonSchema = z.object({ version: z.string() });
const APP_VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
).version;

interface ServiceHealth {
  status: 'up' | 'down';
  state: ServiceState;
}

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  listening: boolean;
  services: Record<string, ServiceHealth>;
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const services: Record<string, ServiceHealth> = {};
    for (const service of fastify.routingServer.services) {
      const { state } = service.status();
      services[service.name] = { status: state === 'running' ? 'up' : 'down', state };
    }

    const checks = Object.values(services);
    const allUp = checks.length > 0 && checks.every((s) => s.status === 'up');
    const allDown = checks.every((s) => s.status === 'down');

    let status: HealthResponse['status'];
    if (allUp) {
      status = 'healthy';
    } else if (allDown) {
      status = 'unhealthy';
    } else {
      status = 'degraded';
    }

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      listening: fastify.routingServer.listening,
      services,
    };

    // Any service down means some routed calls will fail
    return reply.status(status === 'healthy' ? 200 : 503).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
