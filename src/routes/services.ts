import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { formatVersion } from '../protocol/messages.js';
import { UnknownServiceError } from '../router/errors.js';
import type { Service, ServiceState } from '../service/service.js';

interface ServiceView {
  name: string;
  type: string;
  state: ServiceState;
  /** Null until the first routed call has asked the provider */
  supportedVersions: string[] | null;
  inflight: number;
  /** Whether untagged calls land on this service */
  default: boolean;
}

function view(service: Service, isDefault: boolean): ServiceView {
  const status = service.status();
  return {
    name: status.name,
    type: status.type,
    state: status.state,
    supportedVersions: status.supportedVersions?.map(formatVersion) ?? null,
    inflight: status.inflight,
    default: isDefault,
  };
}

const servicesRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: { services: ServiceView[] } }>('/services', async () => ({
    services: fastify.routingServer.services.map((service, index) => view(service, index === 0)),
  }));

  fastify.get<{ Params: { name: string }; Reply: ServiceView }>(
    '/services/:name',
    async (request) => {
      const wanted = request.params.name.toLowerCase();
      const index = fastify.routingServer.services.findIndex((s) => s.name.toLowerCase() === wanted);
      const service = fastify.routingServer.services[index];
      if (!service) {
        throw new UnknownServiceError(request.params.name);
      }
      return view(service, index === 0);
    }
  );

  done();
};

export const servicesRoutesPlugin = fp(servicesRoutes, {
  name: 'services-routes',
  fastify: '5.x',
});
