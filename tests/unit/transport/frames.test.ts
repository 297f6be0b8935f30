import { describe, expect, it } from 'vitest';

import {
  FrameDecoder,
  MAX_FRAME_BYTES,
  decodeFault,
  encodeFault,
  encodeFrame,
} from '@/transport/frames.js';
import type { Frame } from '@/transport/frames.js';

const call: Frame = {
  kind: 'call',
  id: 7,
  method: '/csi.Controller/CreateVolume',
  payload: Buffer.from([1, 2, 3]),
};

describe('encodeFrame', () => {
  it('writes the length-prefixed header', () => {
    const bytes = encodeFrame(call);
    const methodLength = Buffer.byteLength(call.method);

    expect(bytes.readUInt32BE(0)).toBe(7 + methodLength + 3);
    expect(bytes.readUInt8(4)).toBe(1);
    expect(bytes.readUInt32BE(5)).toBe(7);
    expect(bytes.readUInt16BE(9)).toBe(methodLength);
    expect(bytes.length).toBe(4 + 7 + methodLength + 3);
  });

  it('refuses frames over the size limit', () => {
    const oversized: Frame = { ...call, payload: Buffer.alloc(MAX_FRAME_BYTES) };
    expect(() => encodeFrame(oversized)).toThrow(`Frame exceeds ${MAX_FRAME_BYTES} bytes`);
  });
});

describe('FrameDecoder', () => {
  it('reassembles frames split across chunks', () => {
    const reply: Frame = { kind: 'reply', id: 8, method: '', payload: Buffer.from('ok') };
    const bytes = Buffer.concat([encodeFrame(call), encodeFrame(reply)]);
    const decoder = new FrameDecoder();

    expect(decoder.push(bytes.subarray(0, 3))).toEqual([]);
    const first = decoder.push(bytes.subarray(3, 20));
    const rest = decoder.push(bytes.subarray(20));

    expect([...first, ...rest]).toEqual([call, reply]);
  });

  it('skips frames of an unknown kind', () => {
    const bytes = encodeFrame({ kind: 'cancel', id: 3, method: '', payload: Buffer.alloc(0) });
    bytes.writeUInt8(9, 4);

    expect(new FrameDecoder().push(bytes)).toEqual([]);
  });

  it('throws when a peer announces an oversized frame', () => {
    const header = Buffer.alloc(4);
    header.writeUInt32BE(MAX_FRAME_BYTES + 1, 0);

    expect(() => new FrameDecoder().push(header)).toThrow(`Frame exceeds ${MAX_FRAME_BYTES} bytes`);
  });
});

describe('fault payloads', () => {
  it('decodes what it encodes', () => {
    expect(decodeFault(encodeFault({ status: 14, details: 'gone' }))).toEqual({
      status: 14,
      details: 'gone',
    });
  });

  it('maps malformed payloads to UNKNOWN', () => {
    expect(decodeFault(Buffer.from('not json'))).toEqual({
      status: 2,
      details: 'malformed fault payload',
    });
    expect(decodeFault(Buffer.from('{"status":"x"}'))).toEqual({
      status: 2,
      details: 'malformed fault payload',
    });
  });
});
