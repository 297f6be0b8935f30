// Length-prefixed frames carried over a pipe connection.
//
// Layout (big-endian):
//   u32 body length | u8 kind | u32 call id | u16 method length | method | payload
//
// `call` frames carry an encoded request, `reply` an encoded response,
// `fault` a JSON status ({ status, details }) and `cancel` nothing.

import { z } from 'zod';

import { FrameTooLargeError } from './errors.js';

export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

const LENGTH_BYTES = 4;
const HEADER_BYTES = 1 + 4 + 2;

export type FrameKind = 'call' | 'reply' | 'fault' | 'cancel';

const KIND_CODES: Record<FrameKind, number> = { call: 1, reply: 2, fault: 3, cancel: 4 };

export interface Frame {
  kind: FrameKind;
  id: number;
  method: string;
  payload: Buffer;
}

export function encodeFrame(frame: Frame): Buffer {
  const method = Buffer.from(frame.method, 'utf8');
  const bodyLength = HEADER_BYTES + method.length + frame.payload.length;
  if (bodyLength > MAX_FRAME_BYTES) {
    throw new FrameTooLargeError(MAX_FRAME_BYTES);
  }

  const header = Buffer.alloc(LENGTH_BYTES + HEADER_BYTES);
  header.writeUInt32BE(bodyLength, 0);
  header.writeUInt8(KIND_CODES[frame.kind], 4);
  header.writeUInt32BE(frame.id, 5);
  header.writeUInt16BE(method.length, 9);
  return Buffer.concat([header, method, frame.payload]);
}

function kindFromCode(code: number): FrameKind | undefined {
  switch (code) {
    case 1:
      return 'call';
    case 2:
      return 'reply';
    case 3:
      return 'fault';
    case 4:
      return 'cancel';
    default:
      return undefined;
  }
}

/**
 * Incremental decoder: feed it chunks as they arrive, get back every frame
 * completed so far. Frames with an unknown kind are skipped.
 */
export class FrameDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Frame[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    const frames: Frame[] = [];

    while (this.buffered.length >= LENGTH_BYTES) {
      const bodyLength = this.buffered.readUInt32BE(0);
      if (bodyLength > MAX_FRAME_BYTES || bodyLength < HEADER_BYTES) {
        throw new FrameTooLargeError(MAX_FRAME_BYTES);
      }
      if (this.buffered.length < LENGTH_BYTES + bodyLength) break;

      const body = this.buffered.subarray(LENGTH_BYTES, LENGTH_BYTES + bodyLength);
      this.buffered = this.buffered.subarray(LENGTH_BYTES + bodyLength);

      const kind = kindFromCode(body.readUInt8(0));
      const id = body.readUInt32BE(1);
      const methodLength = body.readUInt16BE(5);
      const method = body.toString('utf8', HEADER_BYTES, HEADER_BYTES + methodLength);
      const payload = Buffer.from(body.subarray(HEADER_BYTES + methodLength));
      if (kind) {
        frames.push({ kind, id, method, payload });
      }
    }

    return frames;
  }
}

// ---------------------------------------------------------------------------
// Fault payloads
// ---------------------------------------------------------------------------

const FaultSchema = z.object({
  status: z.number().int().min(0),
  details: z.string(),
});

export type Fault = z.infer<typeof FaultSchema>;

export function encodeFault(fault: Fault): Buffer {
  return Buffer.from(JSON.stringify(fault), 'utf8');
}

/** Decode a fault payload; a malformed one becomes status 2 (UNKNOWN). */
export function decodeFault(payload: Buffer): Fault {
  let raw: unknown;
  try {
    raw = JSON.parse(payload.toString('utf8'));
  } catch {
    return { status: 2, details: 'malformed fault payload' };
  }
  const parsed = FaultSchema.safeParse(raw);
  return parsed.success ? parsed.data : { status: 2, details: 'malformed fault payload' };
}
