import { describe, expect, it, vi } from 'vitest';

import {
  controllerPublishVolumeErrorReply,
  createVolumeErrorReply,
  deleteVolumeErrorReply,
  generalErrorReply,
  resultReply,
} from '@/protocol/replies.js';
import { TOTAL_CAPACITY_BYTES } from '@/providers/mock/catalogue.js';
import { Service } from '@/service/service.js';

import { SUPPORTED_VERSION, ScriptedProvider, gatedHandler, silentLogger } from '../../helpers/index.js';

const UNSUPPORTED_VERSION = { major: 0, minor: 2, patch: 0 };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function startService(provider: ScriptedProvider, name = 'svc') {
  const service = new Service({ name, type: 'scripted', provider, logger: silentLogger() });
  const serving = service.serve();
  return { service, serving };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Service', () => {
  describe('supported versions', () => {
    it('asks the provider once, even under concurrent first calls', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      const replies = await Promise.all(
        Array.from({ length: 8 }, () => service.call('GetCapacity', { version: SUPPORTED_VERSION }))
      );

      for (const reply of replies) {
        expect(reply).toMatchObject({ result: { totalCapacity: TOTAL_CAPACITY_BYTES } });
      }
      expect(provider.count('GetSupportedVersions')).toBe(1);
      expect(provider.count('GetCapacity')).toBe(8);
      expect(service.status().supportedVersions).toEqual([SUPPORTED_VERSION]);

      service.stop();
      await serving;
    });

    it('answers GetSupportedVersions from the cache', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      const expected = resultReply({ supportedVersions: [SUPPORTED_VERSION] });
      await expect(service.call('GetSupportedVersions', {})).resolves.toEqual(expected);
      await expect(service.call('GetSupportedVersions', {})).resolves.toEqual(expected);
      expect(provider.count('GetSupportedVersions')).toBe(1);

      service.stop();
      await serving;
    });

    it('does not cache a failed query', async () => {
      const versions = vi
        .fn()
        .mockResolvedValueOnce(generalErrorReply('UNKNOWN', 'not ready'))
        .mockResolvedValue(resultReply({ supportedVersions: [SUPPORTED_VERSION] }));
      const provider = new ScriptedProvider({ GetSupportedVersions: versions });
      const { service, serving } = startService(provider, 'flaky');

      await expect(service.call('ProbeNode', { version: SUPPORTED_VERSION })).resolves.toEqual(
        generalErrorReply(
          'UNSUPPORTED_REQUEST_VERSION',
          'GetSupportedVersions failed for flaky: UNKNOWN: not ready'
        )
      );
      expect(service.status().supportedVersions).toBeNull();

      await expect(service.call('ProbeNode', { version: SUPPORTED_VERSION })).resolves.toEqual({
        result: {},
        reply: 'result',
      });
      expect(versions).toHaveBeenCalledTimes(2);

      service.stop();
      await serving;
    });
  });

  describe('forwarding', () => {
    it('carries uint64 values above 2^53 through both hops unchanged', async () => {
      const received: object[] = [];
      const provider = new ScriptedProvider({
        GetCapacity: async () => resultReply({ totalCapacity: '9007199254740993' }),
        CreateVolume: async (request) => {
          received.push(request);
          return resultReply({
            volumeInfo: {
              capacityBytes: '18446744073709551615',
              id: { values: { id: '1', name: 'huge' } },
              metadata: { values: {} },
            },
          });
        },
      });
      const { service, serving } = startService(provider);

      await expect(
        service.call('GetCapacity', { version: SUPPORTED_VERSION })
      ).resolves.toMatchObject({ result: { totalCapacity: '9007199254740993' } });

      const created = await service.call('CreateVolume', {
        version: SUPPORTED_VERSION,
        name: 'huge',
        capacityRange: { requiredBytes: '18446744073709551615', limitBytes: '9007199254740993' },
      });
      expect(received).toHaveLength(1);
      expect(received[0]).toMatchObject({
        capacityRange: { requiredBytes: '18446744073709551615', limitBytes: '9007199254740993' },
      });
      expect(created).toMatchObject({
        result: { volumeInfo: { capacityBytes: '18446744073709551615' } },
      });

      service.stop();
      await serving;
    });
  });

  describe('version gate', () => {
    it('never forwards a request with an unsupported version', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      await expect(
        service.call('CreateVolume', { version: UNSUPPORTED_VERSION, name: 'vol' })
      ).resolves.toEqual(
        generalErrorReply('UNSUPPORTED_REQUEST_VERSION', 'unsupported request version: 0.2.0')
      );
      expect(provider.calls).toEqual(['GetSupportedVersions']);

      service.stop();
      await serving;
    });

    it('rejects a request without a version', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      await expect(service.call('GetCapacity', { version: null })).resolves.toEqual(
        generalErrorReply('UNSUPPORTED_REQUEST_VERSION', 'request version is nil')
      );
      expect(provider.count('GetCapacity')).toBe(0);

      service.stop();
      await serving;
    });
  });

  describe('validation order', () => {
    it('checks the volume id of DeleteVolume before the version', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      await expect(
        service.call('DeleteVolume', { version: UNSUPPORTED_VERSION, volumeId: null })
      ).resolves.toEqual(deleteVolumeErrorReply('INVALID_VOLUME_ID', 'missing id obj'));
      await expect(
        service.call('DeleteVolume', { version: UNSUPPORTED_VERSION, volumeId: { values: {} } })
      ).resolves.toEqual(deleteVolumeErrorReply('INVALID_VOLUME_ID', 'missing id map'));
      // neither request needed the provider
      expect(provider.calls).toEqual([]);

      service.stop();
      await serving;
    });

    it('checks the name of CreateVolume after the version', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      await expect(
        service.call('CreateVolume', { version: UNSUPPORTED_VERSION, name: '' })
      ).resolves.toEqual(
        generalErrorReply('UNSUPPORTED_REQUEST_VERSION', 'unsupported request version: 0.2.0')
      );
      await expect(
        service.call('CreateVolume', { version: SUPPORTED_VERSION, name: '' })
      ).resolves.toEqual(createVolumeErrorReply('INVALID_VOLUME_NAME', 'missing name'));
      expect(provider.count('CreateVolume')).toBe(0);

      service.stop();
      await serving;
    });

    it('checks the node id of ControllerPublishVolume after the version', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);
      const volumeId = { values: { id: '1' } };

      await expect(
        service.call('ControllerPublishVolume', { version: UNSUPPORTED_VERSION, volumeId })
      ).resolves.toEqual(
        generalErrorReply('UNSUPPORTED_REQUEST_VERSION', 'unsupported request version: 0.2.0')
      );
      await expect(
        service.call('ControllerPublishVolume', { version: SUPPORTED_VERSION, volumeId })
      ).resolves.toEqual(controllerPublishVolumeErrorReply('INVALID_NODE_ID', 'missing node id'));
      expect(provider.count('ControllerPublishVolume')).toBe(0);

      // a present node id is the provider's to judge
      await expect(
        service.call('ControllerPublishVolume', {
          version: SUPPORTED_VERSION,
          volumeId,
          nodeId: { values: { host: 'node-a' } },
        })
      ).resolves.toMatchObject(controllerPublishVolumeErrorReply('INVALID_NODE_ID', 'node id required'));
      expect(provider.count('ControllerPublishVolume')).toBe(1);

      service.stop();
      await serving;
    });

    it('reports a missing NodePublishVolume volume id as a general error', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      await expect(
        service.call('NodePublishVolume', { version: SUPPORTED_VERSION, volumeId: { values: {} } })
      ).resolves.toEqual(generalErrorReply('MISSING_REQUIRED_FIELD', 'missing id map'));

      service.stop();
      await serving;
    });

    it('forwards valid requests and returns the provider reply', async () => {
      const provider = new ScriptedProvider();
      const { service, serving } = startService(provider);

      const reply = await service.call('ControllerPublishVolume', {
        version: SUPPORTED_VERSION,
        volumeId: { values: { id: '1' } },
        nodeId: { values: { id: 'node-a' } },
      });

      expect(reply).toMatchObject({ result: { publishVolumeInfo: { values: {} } } });
      expect(provider.count('ControllerPublishVolume')).toBe(1);

      service.stop();
      await serving;
    });
  });

  describe('lifecycle', () => {
    it('refuses calls before serve and after stop', async () => {
      const provider = new ScriptedProvider();
      const service = new Service({ name: 'idle', type: 'scripted', provider, logger: silentLogger() });

      await expect(service.call('ProbeNode', { version: SUPPORTED_VERSION })).rejects.toMatchObject({
        code: 'SERVICE_NOT_RUNNING',
      });

      const serving = service.serve();
      service.stop();
      await serving;

      expect(service.status().state).toBe('stopped');
      await expect(service.call('ProbeNode', { version: SUPPORTED_VERSION })).rejects.toMatchObject({
        code: 'SERVICE_NOT_RUNNING',
      });
    });

    it('refuses to serve twice', async () => {
      const { service, serving } = startService(new ScriptedProvider());

      await expect(service.serve()).rejects.toMatchObject({ code: 'SERVICE_ALREADY_STARTED' });

      service.stop();
      await serving;
    });

    it('drains in-flight calls on graceful stop', async () => {
      const gate = gatedHandler();
      const provider = new ScriptedProvider({ ProbeNode: gate.handler });
      const { service, serving } = startService(provider);

      const pending = service.call('ProbeNode', { version: SUPPORTED_VERSION });
      await vi.waitFor(() => expect(provider.calls).toContain('ProbeNode'));
      expect(service.status().inflight).toBe(1);

      const stopping = service.gracefulStop();
      expect(service.status().state).toBe('stopping');
      await expect(service.call('GetCapacity', { version: SUPPORTED_VERSION })).rejects.toMatchObject({
        code: 'SERVICE_NOT_RUNNING',
      });

      gate.release();
      await expect(pending).resolves.toEqual({ result: {}, reply: 'result' });
      await stopping;
      await serving;
      expect(service.status()).toMatchObject({ state: 'stopped', inflight: 0 });
    });

    it('aborts in-flight calls on stop', async () => {
      const gate = gatedHandler();
      const provider = new ScriptedProvider({ ProbeNode: gate.handler });
      const { service, serving } = startService(provider);

      const pending = service.call('ProbeNode', { version: SUPPORTED_VERSION });
      await vi.waitFor(() => expect(provider.calls).toContain('ProbeNode'));

      service.stop();
      await expect(pending).rejects.toMatchObject({ code: 'TRANSPORT_CALL_CANCELLED' });
      await serving;
    });

    it('stops the caller waiting when its signal fires', async () => {
      const gate = gatedHandler();
      const provider = new ScriptedProvider({ ProbeNode: gate.handler });
      const { service, serving } = startService(provider);

      const controller = new AbortController();
      const pending = service.call('ProbeNode', { version: SUPPORTED_VERSION }, controller.signal);
      await vi.waitFor(() => expect(provider.calls).toContain('ProbeNode'));
      controller.abort();

      await expect(pending).rejects.toMatchObject({ code: 'TRANSPORT_CALL_CANCELLED' });
      expect(service.running).toBe(true);

      service.stop();
      await serving;
    });
  });
});
