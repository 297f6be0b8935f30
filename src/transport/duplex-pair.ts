// Two cross-wired Duplex streams: bytes written to one end are read from the
// other. Ending one side ends the peer's readable side; destroying one side
// destroys the peer.

import { Duplex } from 'node:stream';

class PipeEnd extends Duplex {
  peer: PipeEnd | undefined;
  /** Write callback held back while the peer's read buffer is full. */
  private blocked: (() => void) | undefined;

  override _read(): void {
    // the peer wants more: let our writer continue
    const peer = this.peer;
    const resume = peer?.blocked;
    if (peer && resume) {
      peer.blocked = undefined;
      resume();
    }
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    if (peer && !peer.destroyed && !peer.push(chunk)) {
      this.blocked = () => callback();
      return;
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) {
      this.peer.push(null);
    }
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    const peer = this.peer;
    this.peer = undefined;
    this.blocked = undefined;
    if (peer && !peer.destroyed) {
      peer.destroy();
    }
    callback(error);
  }
}

export function createDuplexPair(): [Duplex, Duplex] {
  const left = new PipeEnd();
  const right = new PipeEnd();
  left.peer = right;
  right.peer = left;
  return [left, right];
}
