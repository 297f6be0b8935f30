// Capability interface every storage provider implements.
//
// The registry stores factories of this interface; the service wrapper
// drives the lifecycle and reaches the protocol handlers over a pipe.

import type { FastifyBaseLogger } from 'fastify';

import { PROTOCOL_METHOD_NAMES } from '../protocol/methods.js';
import type { ProtocolHandlers } from '../protocol/methods.js';
import type { PipeListener } from '../transport/pipe-channel.js';

export interface ServeOptions {
  /** Logger the provider should log through; providers may ignore it */
  logger?: FastifyBaseLogger;
}

export interface StorageProvider extends ProtocolHandlers {
  /** Serve protocol calls arriving on the listener until stopped. */
  serve(listener: PipeListener, options?: ServeOptions): Promise<void>;
  /** Stop at once, aborting in-flight calls. */
  stop(): void;
  /** Stop accepting calls and resolve once in-flight calls have finished. */
  gracefulStop(): Promise<void>;
}

/** Zero-argument constructor of a provider instance. */
export type ProviderFactory = () => StorageProvider;

/** Export table a provider module publishes as `serviceProviders`. */
export type ServiceProviderTable = Readonly<Record<string, ProviderFactory>>;

const LIFECYCLE_METHODS = ['serve', 'stop', 'gracefulStop'] as const;

export function isStorageProvider(value: unknown): value is StorageProvider {
  if (typeof value !== 'object' || value === null) return false;
  const required: readonly string[] = [...LIFECYCLE_METHODS, ...PROTOCOL_METHOD_NAMES];
  return required.every((method) => typeof Reflect.get(value, method) === 'function');
}
