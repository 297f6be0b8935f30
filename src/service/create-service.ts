import type { FastifyBaseLogger } from 'fastify';

import type { ProtocolDefinition } from '../protocol/definition.js';
import type { ProviderRegistry } from '../registry/provider-registry.js';
import { Service } from './service.js';

export interface ServiceSpec {
  /** Registered provider name (case-insensitive) */
  type: string;
  /** Routing name; defaults to the provider's registered name */
  name?: string;
}

export interface CreateServiceOptions {
  logger: FastifyBaseLogger;
  protocol?: ProtocolDefinition;
}

/**
 * Build a service around a fresh provider instance. This is the only place
 * provider constructors run.
 */
export function createService(
  registry: ProviderRegistry,
  spec: ServiceSpec,
  options: CreateServiceOptions
): Service {
  const entry = registry.get(spec.type);
  const provider = entry.create();
  const name = spec.name || entry.name;

  options.logger.debug({ service: name, type: entry.name, source: entry.source }, 'Creating service');

  return new Service({
    name,
    type: entry.name,
    provider,
    logger: options.logger,
    protocol: options.protocol,
  });
}
