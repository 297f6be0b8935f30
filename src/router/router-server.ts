// Routing server: one gRPC listener in front of N services.
//
// Every protocol method is registered once; each call is routed by the
// `csi.service` metadata value to the matching service (case-insensitive),
// falling back to the first configured service.

import { rm } from 'node:fs/promises';
import type { Server as NetServer, Socket } from 'node:net';

import * as grpc from '@grpc/grpc-js';
import type { FastifyBaseLogger } from 'fastify';

import { errorCode } from '../errors/index.js';
import { Sentry } from '../instrument.js';
import { grpcTarget, isLocalSocket, parseListenAddress } from '../protocol/address.js';
import type { ListenAddress } from '../protocol/address.js';
import { loadProtocol } from '../protocol/definition.js';
import type { ProtocolDefinition } from '../protocol/definition.js';
import { PROTOCOL_METHODS, PROTOCOL_METHOD_NAMES } from '../protocol/methods.js';
import type { ProtocolMethodName, ProtocolServiceName } from '../protocol/methods.js';
import type { Service } from '../service/service.js';
import { RemoteCallError } from '../transport/errors.js';
import { deferred } from '../utils/deferred.js';
import {
  BindError,
  EmptyServicesError,
  ServerAlreadyServingError,
} from './errors.js';
import type { ShutdownMode } from './shutdown.js';

/** Call-metadata key carrying the target service name. */
export const ROUTING_METADATA_KEY = 'csi.service';

export type CleanupAction = () => void | Promise<void>;

export type ServiceOutcome =
  | { service: string; status: 'fulfilled' }
  | { service: string; status: 'rejected'; reason: unknown };

export interface RouterServerOptions {
  /** `scheme://address`, used when serve() is not handed a listener */
  address: string;
  services: Service[];
  logger: FastifyBaseLogger;
  protocol?: ProtocolDefinition;
}

const UNAVAILABLE_CODES = new Set([
  'TRANSPORT_CHANNEL_CLOSED',
  'TRANSPORT_PROVIDER_UNAVAILABLE',
  'SERVICE_NOT_RUNNING',
]);

export class RouterServer {
  readonly services: readonly Service[];
  /** Settles once every service's serve() has settled */
  readonly completion: Promise<ServiceOutcome[]>;
  private readonly configuredAddress: string;
  private readonly protocol: ProtocolDefinition;
  private readonly logger: FastifyBaseLogger;
  private readonly cleanupActions: CleanupAction[] = [];
  private readonly completed = deferred<ServiceOutcome[]>();
  private server: grpc.Server | undefined;
  private listener: NetServer | undefined;
  private boundAddress: string | undefined;
  private cleanedUp = false;

  constructor(options: RouterServerOptions) {
    this.configuredAddress = options.address;
    this.services = [...options.services];
    this.protocol = options.protocol ?? loadProtocol();
    this.logger = options.logger.child({ component: 'router' });
    this.completion = this.completed.promise;
  }

  /** `scheme://address` actually bound, once serving */
  get address(): string | undefined {
    return this.boundAddress;
  }

  get listening(): boolean {
    return this.boundAddress !== undefined;
  }

  /** Register an action to run exactly once when the server stops. */
  onCleanup(action: CleanupAction): void {
    this.cleanupActions.push(action);
  }

  /**
   * Bind the listener (or adopt `listener`), start every service and begin
   * routing calls. Resolves with the bound address once the listener is up.
   */
  async serve(listener?: NetServer): Promise<string> {
    if (this.services.length === 0) {
      throw new EmptyServicesError();
    }
    if (this.server) {
      throw new ServerAlreadyServingError();
    }

    const server = new grpc.Server();
    this.server = server;
    this.registerServices(server);

    try {
      this.boundAddress = listener
        ? this.adopt(server, listener)
        : await this.bind(server, parseListenAddress(this.configuredAddress));
    } catch (error) {
      this.server = undefined;
      server.forceShutdown();
      throw error;
    }

    this.startServices();
    this.logger.info(
      { address: this.boundAddress, services: this.services.map((s) => s.name) },
      'Router listening'
    );
    return this.boundAddress;
  }

  stop(): Promise<void> {
    return this.shutdown('forced');
  }

  gracefulStop(): Promise<void> {
    return this.shutdown('graceful');
  }

  /**
   * Stop every service, then the listener, then run cleanup actions.
   * `forced` aborts in-flight work; `graceful` waits for it.
   */
  async shutdown(mode: ShutdownMode): Promise<void> {
    this.logger.info({ mode }, 'Router shutting down');

    if (mode === 'forced') {
      for (const service of this.services) service.stop();
      this.server?.forceShutdown();
      this.closeListener();
    } else {
      const results = await Promise.allSettled(this.services.map((s) => s.gracefulStop()));
      for (const result of results) {
        if (result.status === 'rejected') {
          this.logger.error({ err: messageOf(result.reason) }, 'Service failed to stop gracefully');
        }
      }
      await this.drainServer();
      this.closeListener();
    }

    if (!this.server) {
      // never served: nothing will settle the completion barrier
      this.completed.resolve([]);
    }
    await this.runCleanup();
  }

  private registerServices(server: grpc.Server): void {
    const byService = new Map<ProtocolServiceName, grpc.UntypedServiceImplementation>();
    for (const method of PROTOCOL_METHOD_NAMES) {
      const serviceName = PROTOCOL_METHODS[method];
      const implementation = byService.get(serviceName) ?? {};
      implementation[method] = this.handlerFor(method);
      byService.set(serviceName, implementation);
    }
    for (const [serviceName, implementation] of byService) {
      server.addService(this.protocol.services[serviceName], implementation);
    }
  }

  private bind(server: grpc.Server, listen: ListenAddress): Promise<string> {
    const target = grpcTarget(listen);

    return new Promise<string>((resolve, reject) => {
      server.bindAsync(target, grpc.ServerCredentials.createInsecure(), (error, port) => {
        if (error) {
          reject(new BindError(target, error.message));
          return;
        }
        if (isLocalSocket(listen)) {
          // only a socket this server created is ours to remove
          const socketPath = listen.address;
          this.onCleanup(() => rm(socketPath, { force: true }));
          resolve(`${listen.network}://${socketPath}`);
          return;
        }
        resolve(`${listen.network}://${withPort(listen.address, port)}`);
      });
    });
  }

  /** Serve on connections from a listener the caller already owns. */
  private adopt(server: grpc.Server, listener: NetServer): string {
    const injector = server.createConnectionInjector(grpc.ServerCredentials.createInsecure());
    listener.on('connection', (socket: Socket) => injector.injectConnection(socket));
    this.listener = listener;

    const bound = listener.address();
    if (typeof bound === 'string') {
      this.onCleanup(() => rm(bound, { force: true }));
      return `unix://${bound}`;
    }
    return bound ? `tcp://${bound.address}:${bound.port}` : 'tcp://<unbound>';
  }

  private startServices(): void {
    const runs = this.services.map((service) =>
      service.serve().then(
        (): ServiceOutcome => {
          this.logger.info({ service: service.name }, 'Service finished');
          return { service: service.name, status: 'fulfilled' };
        },
        (reason: unknown): ServiceOutcome => {
          this.logger.error({ service: service.name, err: messageOf(reason) }, 'Service failed');
          return { service: service.name, status: 'rejected', reason };
        }
      )
    );
    // the outcomes above never reject, so this settles exactly when all services have
    Promise.all(runs).then(this.completed.resolve, (error: unknown) => {
      this.logger.error({ err: messageOf(error) }, 'Service completion tracking failed');
    });
  }

  private handlerFor(method: ProtocolMethodName): grpc.handleUnaryCall<object, object> {
    return (call, callback) => {
      this.dispatch(method, call, callback).catch((error: unknown) => {
        this.logger.error({ method, err: messageOf(error) }, 'Failed to answer call');
      });
    };
  }

  private async dispatch(
    method: ProtocolMethodName,
    call: grpc.ServerUnaryCall<object, object>,
    callback: grpc.sendUnaryData<object>
  ): Promise<void> {
    const service = this.route(call.metadata);
    const controller = new AbortController();
    const onCancelled = (): void => controller.abort();
    call.on('cancelled', onCancelled);

    this.logger.debug({ method, service: service.name }, 'Routing call');

    let reply: object;
    try {
      reply = await service.call(method, call.request, controller.signal);
    } catch (error) {
      callback(this.toStatus(error, method, service.name));
      return;
    } finally {
      call.removeListener('cancelled', onCancelled);
    }
    callback(null, reply);
  }

  /** Service named by the routing tag, or the first configured service. */
  private route(metadata: grpc.Metadata): Service {
    const fallback = this.services[0];
    if (!fallback) {
      throw new EmptyServicesError();
    }

    const tag = metadata.get(ROUTING_METADATA_KEY)[0];
    if (typeof tag !== 'string') return fallback;

    const wanted = tag.toLowerCase();
    return this.services.find((service) => service.name.toLowerCase() === wanted) ?? fallback;
  }

  private toStatus(error: unknown, method: string, service: string): grpc.ServerErrorResponse {
    const details = messageOf(error);
    const response = (code: grpc.status, message: string): grpc.ServerErrorResponse =>
      Object.assign(new Error(message), { code, details: message });

    if (error instanceof RemoteCallError) {
      return response(error.status, error.details);
    }

    const code = errorCode(error);
    if (code === 'TRANSPORT_CALL_CANCELLED') {
      return response(grpc.status.CANCELLED, details);
    }
    if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
      return response(grpc.status.UNAVAILABLE, details);
    }

    this.logger.error({ method, service, err: details }, 'Internal error while routing call');
    Sentry.captureException(error, { extra: { method, service } });
    return response(grpc.status.INTERNAL, details);
  }

  private drainServer(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    return new Promise<void>((resolve) => {
      server.tryShutdown((error) => {
        if (error) {
          this.logger.warn({ err: error.message }, 'Graceful listener shutdown failed, forcing');
          server.forceShutdown();
        }
        resolve();
      });
    });
  }

  private closeListener(): void {
    const listener = this.listener;
    if (!listener) return;
    this.listener = undefined;
    listener.close((error) => {
      if (error) {
        this.logger.debug({ err: error.message }, 'Adopted listener was already closed');
      }
    });
  }

  private async runCleanup(): Promise<void> {
    if (this.cleanedUp) return;
    this.cleanedUp = true;
    this.boundAddress = undefined;

    for (const action of this.cleanupActions) {
      try {
        await action();
      } catch (error) {
        this.logger.error({ err: messageOf(error) }, 'Cleanup action failed');
      }
    }
  }
}

function withPort(address: string, port: number): string {
  return /:\d+$/.test(address) ? address.replace(/:\d+$/, `:${port}`) : `${address}:${port}`;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
