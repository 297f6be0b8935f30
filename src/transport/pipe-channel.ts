// In-process rendezvous transport.
//
// A PipeChannel stands in for a listener/connection pair: accept() waits for
// a dial(), dial() waits for an accept(), and each match yields the two ends
// of one duplex byte stream. Waiters on each side are matched in arrival
// order. Nothing touches the OS socket stack.

import type { Duplex } from 'node:stream';

import { createDuplexPair } from './duplex-pair.js';
import { CallCancelledError, ChannelClosedError } from './errors.js';

interface Waiter {
  resolve: (socket: Duplex) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/** The accepting side of a pipe channel, as handed to a provider. */
export interface PipeListener {
  readonly name: string;
  readonly closed: boolean;
  accept(signal?: AbortSignal): Promise<Duplex>;
  close(): void;
}

export class PipeChannel implements PipeListener {
  readonly name: string;
  private readonly accepts: Waiter[] = [];
  private readonly dials: Waiter[] = [];
  private isClosed = false;

  constructor(name: string) {
    this.name = name;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of accepts and dials still waiting for a counterpart. */
  get pending(): { accepts: number; dials: number } {
    return { accepts: this.accepts.length, dials: this.dials.length };
  }

  accept(signal?: AbortSignal): Promise<Duplex> {
    return this.rendezvous(this.accepts, this.dials, signal);
  }

  dial(signal?: AbortSignal): Promise<Duplex> {
    return this.rendezvous(this.dials, this.accepts, signal);
  }

  /**
   * Close the channel. Every waiting accept and dial rejects; later calls
   * reject immediately. Closing twice is a no-op.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    const waiters = [...this.accepts.splice(0), ...this.dials.splice(0)];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new ChannelClosedError(this.name));
    }
  }

  private rendezvous(own: Waiter[], counterpart: Waiter[], signal?: AbortSignal): Promise<Duplex> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError(this.name));
    }
    if (signal?.aborted) {
      return Promise.reject(new CallCancelledError(`${this.name}: rendezvous aborted`));
    }

    const match = counterpart.shift();
    if (match) {
      const [mine, theirs] = createDuplexPair();
      match.detach();
      match.resolve(theirs);
      return Promise.resolve(mine);
    }

    return new Promise<Duplex>((resolve, reject) => {
      const onAbort = (): void => {
        const index = own.indexOf(waiter);
        if (index !== -1) own.splice(index, 1);
        reject(new CallCancelledError(`${this.name}: rendezvous aborted`));
      };
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      own.push(waiter);
    });
  }
}
