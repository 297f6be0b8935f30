import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { Config } from '@/config/index.js';
import { RouterServer } from '@/router/router-server.js';
import { createServer } from '@/server.js';
import { Service } from '@/service/service.js';

import { ScriptedProvider, silentLogger } from '../helpers/index.js';

const logger = silentLogger();

const config: Config = {
  endpoint: 'tcp://127.0.0.1:0',
  services: [{ type: 'scripted', name: 'A' }, { type: 'scripted', name: 'B' }],
  providerModules: [],
  logging: { level: 'silent', pretty: false },
  admin: { enabled: true, host: '127.0.0.1', port: 0 },
  env: 'test',
};

describe('Admin API', () => {
  let router: RouterServer;
  let services: Service[];
  let server: FastifyInstance;

  beforeEach(async () => {
    services = ['A', 'B'].map(
      (name) => new Service({ name, type: 'scripted', provider: new ScriptedProvider({}, name), logger })
    );
    router = new RouterServer({ address: config.endpoint, services, logger });
    await router.serve();
    server = await createServer({ config, router, logger });
  });

  afterEach(async () => {
    await server.close();
    await router.stop();
  });

  describe('GET /health', () => {
    it('should report healthy while every service runs', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toMatchObject({
        status: 'healthy',
        version: '0.1.0',
        listening: true,
        services: {
          A: { status: 'up', state: 'running' },
          B: { status: 'up', state: 'running' },
        },
      });
      expect(typeof body.uptime).toBe('number');
    });

    it('should report degraded when one service has stopped', async () => {
      services[1]?.stop();

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        status: 'degraded',
        services: { B: { status: 'down', state: 'stopped' } },
      });
    });

    it('should report unhealthy once the router has stopped', async () => {
      await router.stop();

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unhealthy', listening: false });
    });
  });

  describe('GET /services', () => {
    it('should list services in routing order', async () => {
      const response = await server.inject({ method: 'GET', url: '/services' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        services: [
          { name: 'A', type: 'scripted', state: 'running', supportedVersions: null, inflight: 0, default: true },
          { name: 'B', type: 'scripted', state: 'running', supportedVersions: null, inflight: 0, default: false },
        ],
      });
    });

    it('should show cached versions once a call has asked for them', async () => {
      await services[1]?.call('GetSupportedVersions', {});

      const response = await server.inject({ method: 'GET', url: '/services/b' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ name: 'B', supportedVersions: ['0.1.0'], default: false });
    });

    it('should return 404 for an unknown service', async () => {
      const response = await server.inject({ method: 'GET', url: '/services/nfs' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: { code: 'ROUTER_UNKNOWN_SERVICE', message: 'No service named nfs', statusCode: 404 },
      });
    });
  });

  it('should return the error envelope for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: { code: 'NOT_FOUND', message: 'Route GET:/nope not found', statusCode: 404 },
    });
  });
});
