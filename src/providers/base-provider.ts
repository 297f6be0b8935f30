// Lifecycle half of a provider: hosts the provider's own handlers on a
// ProviderServer so concrete providers only implement protocol methods.

import type { FastifyBaseLogger } from 'fastify';

import { createLogger } from '../logger.js';
import type { CallContext } from '../protocol/methods.js';
import { ProviderServer } from '../transport/index.js';
import type { PipeListener } from '../transport/index.js';
import { ServerStartedError, ServerStoppedError } from '../errors/index.js';
import type { ServeOptions, StorageProvider } from './types.js';

export abstract class BaseProvider implements StorageProvider {
  readonly name: string;
  protected logger: FastifyBaseLogger;
  private server: ProviderServer | undefined;
  private closed = false;

  protected constructor(name: string) {
    this.name = name;
    this.logger = createLogger({ level: 'silent', pretty: false });
  }

  async serve(listener: PipeListener, options: ServeOptions = {}): Promise<void> {
    if (this.closed) throw new ServerStoppedError(this.name);
    if (this.server) throw new ServerStartedError(this.name);

    if (options.logger) {
      this.logger = options.logger.child({ provider: this.name });
    }
    this.server = new ProviderServer({ name: this.name, handlers: this, logger: this.logger });
    this.logger.info({ channel: listener.name }, 'Provider serving');
    await this.server.serve(listener);
  }

  /** Also cuts short a graceful stop that is still draining. */
  stop(): void {
    if (!this.closed) {
      this.closed = true;
      this.logger.info('Provider stopping');
    }
    this.server?.stop();
  }

  async gracefulStop(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.info('Provider stopping gracefully');
    await this.server?.gracefulStop();
  }

  // Identity
  abstract GetSupportedVersions(request: object, context: CallContext): Promise<object>;
  abstract GetPluginInfo(request: object, context: CallContext): Promise<object>;

  // Controller
  abstract CreateVolume(request: object, context: CallContext): Promise<object>;
  abstract DeleteVolume(request: object, context: CallContext): Promise<object>;
  abstract ControllerPublishVolume(request: object, context: CallContext): Promise<object>;
  abstract ControllerUnpublishVolume(request: object, context: CallContext): Promise<object>;
  abstract ValidateVolumeCapabilities(request: object, context: CallContext): Promise<object>;
  abstract ListVolumes(request: object, context: CallContext): Promise<object>;
  abstract GetCapacity(request: object, context: CallContext): Promise<object>;
  abstract ControllerGetCapabilities(request: object, context: CallContext): Promise<object>;

  // Node
  abstract NodePublishVolume(request: object, context: CallContext): Promise<object>;
  abstract NodeUnpublishVolume(request: object, context: CallContext): Promise<object>;
  abstract GetNodeID(request: object, context: CallContext): Promise<object>;
  abstract ProbeNode(request: object, context: CallContext): Promise<object>;
  abstract NodeGetCapabilities(request: object, context: CallContext): Promise<object>;
}
