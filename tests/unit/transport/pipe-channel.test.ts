import { once } from 'node:events';

import { describe, expect, it } from 'vitest';

import { PipeChannel } from '@/transport/pipe-channel.js';

describe('PipeChannel', () => {
  it('pairs dials with accepts in arrival order', async () => {
    const channel = new PipeChannel('fifo');
    const dials = [channel.dial(), channel.dial(), channel.dial()];
    expect(channel.pending).toEqual({ accepts: 0, dials: 3 });

    const accepted = [await channel.accept(), await channel.accept(), await channel.accept()];
    const dialled = await Promise.all(dials);
    expect(channel.pending).toEqual({ accepts: 0, dials: 0 });

    const received = accepted.map(async (socket) => {
      const [chunk] = await once(socket, 'data');
      return String(chunk);
    });
    dialled.forEach((socket, index) => socket.write(`dial-${index}`));

    expect(await Promise.all(received)).toEqual(['dial-0', 'dial-1', 'dial-2']);
  });

  it('carries bytes in both directions', async () => {
    const channel = new PipeChannel('duplex');
    const [server, client] = await Promise.all([channel.accept(), channel.dial()]);

    server.write('pong');
    const [fromServer] = await once(client, 'data');
    client.write('ping');
    const [fromClient] = await once(server, 'data');

    expect(String(fromServer)).toBe('pong');
    expect(String(fromClient)).toBe('ping');
  });

  it('rejects waiting accepts and dials when closed', async () => {
    const channel = new PipeChannel('closing');
    const accept = channel.accept();
    channel.close();
    await expect(accept).rejects.toMatchObject({ code: 'TRANSPORT_CHANNEL_CLOSED' });

    const other = new PipeChannel('closing-dials');
    const dials = [other.dial(), other.dial()];
    other.close();
    for (const dial of dials) {
      await expect(dial).rejects.toMatchObject({ code: 'TRANSPORT_CHANNEL_CLOSED' });
    }
    expect(other.pending).toEqual({ accepts: 0, dials: 0 });
  });

  it('rejects accept and dial once closed, and closing twice is a no-op', async () => {
    const channel = new PipeChannel('closed');
    channel.close();
    expect(() => channel.close()).not.toThrow();
    expect(channel.closed).toBe(true);

    await expect(channel.dial()).rejects.toMatchObject({ code: 'TRANSPORT_CHANNEL_CLOSED' });
    await expect(channel.accept()).rejects.toMatchObject({ code: 'TRANSPORT_CHANNEL_CLOSED' });
  });

  it('withdraws a waiter whose signal fires', async () => {
    const channel = new PipeChannel('abort');
    const controller = new AbortController();
    const dial = channel.dial(controller.signal);
    expect(channel.pending.dials).toBe(1);

    controller.abort();
    await expect(dial).rejects.toMatchObject({ code: 'TRANSPORT_CALL_CANCELLED' });
    expect(channel.pending.dials).toBe(0);

    // a later accept waits instead of pairing with the withdrawn dial
    const accept = channel.accept();
    expect(channel.pending).toEqual({ accepts: 1, dials: 0 });
    channel.close();
    await expect(accept).rejects.toMatchObject({ code: 'TRANSPORT_CHANNEL_CLOSED' });
  });

  it('rejects at once when the signal has already fired', async () => {
    const channel = new PipeChannel('aborted');
    await expect(channel.accept(AbortSignal.abort())).rejects.toMatchObject({
      code: 'TRANSPORT_CALL_CANCELLED',
    });
    expect(channel.pending.accepts).toBe(0);
  });
});
