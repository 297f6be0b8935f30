// Provider-side dispatch host for pipe connections.
//
// Accepts connections from a PipeListener, decodes call frames with the
// protocol codecs and runs the matching handler. Providers own one of these
// the way a network service owns its RPC server.

import type { Duplex } from 'node:stream';

import { status } from '@grpc/grpc-js';
import type { FastifyBaseLogger } from 'fastify';

import { loadProtocol } from '../protocol/definition.js';
import type { ProtocolDefinition } from '../protocol/definition.js';
import type { ProtocolHandlers } from '../protocol/methods.js';
import { deferred } from '../utils/deferred.js';
import type { Deferred } from '../utils/deferred.js';
import {
  RemoteCallError,
  ServerStartedError,
  ServerStoppedError,
  UnknownMethodError,
} from './errors.js';
import { FrameDecoder, MAX_FRAME_BYTES, encodeFault, encodeFrame } from './frames.js';
import type { Frame } from './frames.js';
import type { PipeListener } from './pipe-channel.js';
import { errorCode } from '../errors/index.js';

export interface ProviderServerOptions {
  name: string;
  handlers: ProtocolHandlers;
  logger: FastifyBaseLogger;
  protocol?: ProtocolDefinition;
}

type ServerState = 'idle' | 'serving' | 'draining' | 'stopped';

export class ProviderServer {
  private readonly name: string;
  private readonly handlers: ProtocolHandlers;
  private readonly protocol: ProtocolDefinition;
  private readonly logger: FastifyBaseLogger;
  private readonly connections = new Map<Duplex, Map<number, AbortController>>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly stopped: Deferred<void> = deferred();
  private listener: PipeListener | undefined;
  private state: ServerState = 'idle';

  constructor(options: ProviderServerOptions) {
    this.name = options.name;
    this.handlers = options.handlers;
    this.protocol = options.protocol ?? loadProtocol();
    this.logger = options.logger.child({ component: 'provider-server', provider: options.name });
  }

  get serving(): boolean {
    return this.state === 'serving';
  }

  /**
   * Accept connections until stopped. Resolves once the server has fully
   * stopped, including the drain of a graceful stop.
   */
  async serve(listener: PipeListener): Promise<void> {
    if (this.state === 'stopped') throw new ServerStoppedError(this.name);
    if (this.state !== 'idle') throw new ServerStartedError(this.name);

    this.state = 'serving';
    this.listener = listener;
    this.logger.debug({ channel: listener.name }, 'Provider server accepting');

    await this.acceptLoop(listener);
    await this.stopped.promise;
  }

  /** Abort in-flight calls, drop every connection and stop accepting. */
  stop(): void {
    if (this.state === 'stopped') return;
    this.state = 'stopped';
    this.listener?.close();

    for (const [socket, calls] of this.connections) {
      for (const controller of calls.values()) controller.abort();
      socket.destroy();
    }
    this.connections.clear();
    this.stopped.resolve();
    this.logger.debug('Provider server stopped');
  }

  /** Stop accepting, let in-flight calls finish, then drop connections. */
  async gracefulStop(): Promise<void> {
    if (this.state === 'stopped') return;
    if (this.state === 'draining') return this.stopped.promise;

    this.state = 'draining';
    this.listener?.close();

    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }

    this.stop();
  }

  private async acceptLoop(listener: PipeListener): Promise<void> {
    while (this.state === 'serving') {
      let socket: Duplex;
      try {
        socket = await listener.accept();
      } catch (error) {
        // the listener was closed under us: nothing left to accept
        if (this.state === 'serving' && listener.closed) {
          this.stop();
        }
        if (this.state !== 'serving') return;
        throw error;
      }

      if (this.state !== 'serving') {
        socket.destroy();
        return;
      }
      this.attach(socket);
    }
  }

  private attach(socket: Duplex): void {
    const decoder = new FrameDecoder();
    const calls = new Map<number, AbortController>();
    this.connections.set(socket, calls);

    socket.on('data', (chunk: Buffer) => {
      let frames: Frame[];
      try {
        frames = decoder.push(chunk);
      } catch (error) {
        this.logger.error(
          { err: error instanceof Error ? error.message : 'Unknown error' },
          'Dropping pipe connection after undecodable frame'
        );
        socket.destroy();
        return;
      }

      for (const frame of frames) {
        if (frame.kind === 'call') {
          this.dispatch(socket, calls, frame);
        } else if (frame.kind === 'cancel') {
          calls.get(frame.id)?.abort();
        }
      }
    });

    socket.on('close', () => {
      for (const controller of calls.values()) controller.abort();
      calls.clear();
      this.connections.delete(socket);
    });

    socket.on('error', (err: Error) => {
      this.logger.debug({ err: err.message }, 'Provider connection error');
    });
  }

  private dispatch(socket: Duplex, calls: Map<number, AbortController>, frame: Frame): void {
    if (this.state !== 'serving') {
      this.write(socket, {
        kind: 'fault',
        id: frame.id,
        method: frame.method,
        payload: encodeFault({ status: status.UNAVAILABLE, details: `${this.name} is shutting down` }),
      });
      return;
    }

    const controller = new AbortController();
    calls.set(frame.id, controller);

    const task: Promise<void> = this.handle(frame, controller.signal)
      .then(
        (payload) => {
          try {
            this.write(socket, { kind: 'reply', id: frame.id, method: frame.method, payload });
          } catch (error) {
            if (errorCode(error) !== 'TRANSPORT_FRAME_TOO_LARGE') throw error;
            this.logger.error(
              { method: frame.method, bytes: payload.length },
              'Provider reply exceeds the frame limit'
            );
            this.write(socket, {
              kind: 'fault',
              id: frame.id,
              method: frame.method,
              payload: encodeFault({
                status: status.RESOURCE_EXHAUSTED,
                details: `${frame.method} reply exceeds ${MAX_FRAME_BYTES} bytes`,
              }),
            });
          }
        },
        (error: unknown) => {
          const fault = toFault(error);
          if (fault.status === status.UNKNOWN) {
            this.logger.error({ err: fault.details, method: frame.method }, 'Provider handler failed');
          }
          this.write(socket, {
            kind: 'fault',
            id: frame.id,
            method: frame.method,
            payload: encodeFault(fault),
          });
        }
      )
      .catch((error: unknown) => {
        this.logger.error(
          { err: error instanceof Error ? error.message : String(error), method: frame.method },
          'Failed to answer provider call'
        );
      })
      .finally(() => {
        calls.delete(frame.id);
        this.inflight.delete(task);
      });

    this.inflight.add(task);
  }

  private async handle(frame: Frame, signal: AbortSignal): Promise<Buffer> {
    const codec = this.protocol.resolve(frame.method);
    if (!codec) {
      throw new UnknownMethodError(frame.method);
    }
    const request = codec.decodeRequest(frame.payload);
    const response = await this.handlers[codec.name](request, { signal });
    return codec.encodeResponse(response);
  }

  private write(socket: Duplex, frame: Frame): void {
    if (socket.destroyed || !socket.writable) return;
    socket.write(encodeFrame(frame));
  }
}

function toFault(error: unknown): { status: number; details: string } {
  const details = error instanceof Error ? error.message : String(error);
  if (error instanceof RemoteCallError) {
    return { status: error.status, details: error.details };
  }
  switch (errorCode(error)) {
    case 'TRANSPORT_CALL_CANCELLED':
      return { status: status.CANCELLED, details };
    case 'TRANSPORT_UNKNOWN_METHOD':
      return { status: status.UNIMPLEMENTED, details };
    default:
      return { status: status.UNKNOWN, details };
  }
}
