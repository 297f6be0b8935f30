import { describe, expect, it } from 'vitest';

import { ProtocolClient, replyError } from '@/client/protocol-client.js';
import type { Config } from '@/config/index.js';
import { startDaemon } from '@/daemon.js';

import { SUPPORTED_VERSION, silentLogger } from '../helpers/index.js';

const logger = silentLogger();

function daemonConfig(overrides: Partial<Config> = {}): Config {
  return {
    endpoint: 'tcp://127.0.0.1:0',
    services: [{ type: 'mock', name: 'fast' }, { type: 'MOCK' }],
    providerModules: [],
    logging: { level: 'silent', pretty: false },
    admin: { enabled: false, host: '127.0.0.1', port: 0 },
    env: 'test',
    ...overrides,
  };
}

describe('startDaemon', () => {
  it('serves each configured service from its own provider instance', async () => {
    const daemon = await startDaemon(daemonConfig(), { logger });
    const client = new ProtocolClient({ endpoint: daemon.address, timeout: 5_000 });

    try {
      expect(daemon.router.services.map((service) => service.name)).toEqual(['fast', 'mock']);

      const created = await client.call(
        'CreateVolume',
        { version: SUPPORTED_VERSION, name: 'scratch' },
        { service: 'mock' }
      );
      expect(replyError(created)).toBeUndefined();

      const onMock = await client.call('ListVolumes', { version: SUPPORTED_VERSION }, { service: 'mock' });
      const onFast = await client.call('ListVolumes', { version: SUPPORTED_VERSION });
      expect(onMock).toHaveProperty('result.entries.length', 4);
      expect(onFast).toHaveProperty('result.entries.length', 3);
    } finally {
      client.close();
      await daemon.shutdown('graceful');
    }

    expect(daemon.router.listening).toBe(false);
  });

  it('exposes the admin API when enabled', async () => {
    const daemon = await startDaemon(
      daemonConfig({ admin: { enabled: true, host: '127.0.0.1', port: 0 } }),
      { logger }
    );

    try {
      const response = await daemon.admin?.inject({ method: 'GET', url: '/health' });
      expect(response?.statusCode).toBe(200);
      expect(response?.json()).toMatchObject({ status: 'healthy', listening: true });
    } finally {
      await daemon.shutdown('forced');
    }
  });

  it('fails for a provider type nobody registered', async () => {
    await expect(
      startDaemon(daemonConfig({ services: [{ type: 'nfs' }] }), { logger })
    ).rejects.toMatchObject({ code: 'REGISTRY_PROVIDER_NOT_FOUND' });
  });

  it('fails without services', async () => {
    await expect(startDaemon(daemonConfig({ services: [] }), { logger })).rejects.toMatchObject({
      code: 'ROUTER_EMPTY_SERVICES',
    });
  });

  it('loads provider modules before creating services', async () => {
    const daemon = await startDaemon(
      daemonConfig({ providerModules: ['./extra.js'], services: [{ type: 'mock', name: 'loaded' }] }),
      {
        logger,
        builtins: {},
        importModule: async () => ({
          serviceProviders: (await import('@/providers/mock/index.js')).serviceProviders,
        }),
      }
    );

    try {
      expect(daemon.registry.get('mock').source).toBe('./extra.js');
      expect(daemon.router.services.map((service) => service.name)).toEqual(['loaded']);
    } finally {
      await daemon.shutdown('forced');
    }
  });
});
