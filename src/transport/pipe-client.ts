// Client side of a pipe connection: multiplexes concurrent protocol calls
// over one duplex stream and matches replies to callers by call id.

import type { Duplex } from 'node:stream';

import type { FastifyBaseLogger } from 'fastify';

import { CallCancelledError, ProviderUnavailableError, RemoteCallError } from './errors.js';
import { FrameDecoder, decodeFault, encodeFrame } from './frames.js';
import type { Frame } from './frames.js';

interface PendingCall {
  resolve: (payload: Buffer) => void;
  reject: (error: Error) => void;
}

const MAX_CALL_ID = 0xffffffff;

export class PipeClient {
  private readonly socket: Duplex;
  private readonly logger: FastifyBaseLogger;
  private readonly name: string;
  private readonly pending = new Map<number, PendingCall>();
  private readonly decoder = new FrameDecoder();
  private nextId = 1;
  private isClosed = false;

  constructor(socket: Duplex, options: { name: string; logger: FastifyBaseLogger }) {
    this.socket = socket;
    this.name = options.name;
    this.logger = options.logger;

    socket.on('data', (chunk: Buffer) => this.onData(chunk));
    socket.on('close', () => this.onClose());
    socket.on('error', (err: Error) => {
      this.logger.debug({ err: err.message, channel: this.name }, 'Pipe client socket error');
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Calls awaiting a reply. */
  get inflight(): number {
    return this.pending.size;
  }

  /**
   * Send one call and wait for its reply payload. Rejects with
   * RemoteCallError on a provider fault, CallCancelledError when the signal
   * fires, ProviderUnavailableError when the connection goes away.
   */
  call(method: string, payload: Buffer, signal?: AbortSignal): Promise<Buffer> {
    if (this.isClosed) {
      return Promise.reject(new ProviderUnavailableError(`${this.name}: connection closed`));
    }
    if (signal?.aborted) {
      return Promise.reject(new CallCancelledError(`${this.name}${method}`));
    }

    const id = this.allocateId();

    return new Promise<Buffer>((resolve, reject) => {
      const onAbort = (): void => {
        if (!this.pending.delete(id)) return;
        this.send({ kind: 'cancel', id, method, payload: Buffer.alloc(0) });
        reject(new CallCancelledError(`${this.name}${method}`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        resolve: (reply) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(reply);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      });

      try {
        this.send({ kind: 'call', id, method, payload });
      } catch (error) {
        this.pending.delete(id);
        signal?.removeEventListener('abort', onAbort);
        reject(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  /** Drop the connection; pending calls reject with ProviderUnavailableError. */
  close(): void {
    this.socket.destroy();
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId = id >= MAX_CALL_ID ? 1 : id + 1;
    return id;
  }

  private send(frame: Frame): void {
    if (this.socket.destroyed || !this.socket.writable) return;
    this.socket.write(encodeFrame(frame));
  }

  private onData(chunk: Buffer): void {
    let frames: Frame[];
    try {
      frames = this.decoder.push(chunk);
    } catch (error) {
      this.logger.error(
        { err: error instanceof Error ? error.message : 'Unknown error', channel: this.name },
        'Dropping pipe connection after undecodable frame'
      );
      this.socket.destroy();
      return;
    }

    for (const frame of frames) {
      const call = this.pending.get(frame.id);
      // replies to cancelled calls arrive after the caller has gone
      if (!call) continue;

      if (frame.kind === 'reply') {
        this.pending.delete(frame.id);
        call.resolve(frame.payload);
      } else if (frame.kind === 'fault') {
        this.pending.delete(frame.id);
        const fault = decodeFault(frame.payload);
        call.reject(new RemoteCallError(fault.status, fault.details));
      }
    }
  }

  private onClose(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const calls = [...this.pending.values()];
    this.pending.clear();
    for (const call of calls) {
      call.reject(new ProviderUnavailableError(`${this.name}: connection closed`));
    }
  }
}
