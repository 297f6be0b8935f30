// ProtocolClient -- unary gRPC client for a csimux endpoint.
//
// Sets the routing tag on every call so the router hands it to the named
// service. Replies are returned as decoded objects; domain errors are part
// of the reply, so check them with replyError().

import * as grpc from '@grpc/grpc-js';
import { z } from 'zod';

import { grpcTarget, parseListenAddress } from '../protocol/address.js';
import { loadProtocol } from '../protocol/definition.js';
import type { ProtocolDefinition } from '../protocol/definition.js';
import { describeProtocolError } from '../protocol/messages.js';
import type { ProtocolMethodName } from '../protocol/methods.js';
import { ROUTING_METADATA_KEY } from '../router/router-server.js';

export interface ProtocolClientOptions {
  /** Endpoint as `scheme://address` (e.g. "tcp://127.0.0.1:10000") */
  endpoint: string;
  /** Service to route to unless a call names another one */
  service?: string;
  /** Per-call deadline in milliseconds (default: 30000) */
  timeout?: number;
  protocol?: ProtocolDefinition;
}

export interface CallOptions {
  service?: string;
  signal?: AbortSignal;
}

const ErrorReplySchema = z.object({ error: z.record(z.string(), z.unknown()) });

/** "CODE: description" when the reply carries a domain error. */
export function replyError(reply: object): string | undefined {
  const parsed = ErrorReplySchema.safeParse(reply);
  return parsed.success ? describeProtocolError(parsed.data.error) : undefined;
}

export class ProtocolClient {
  private readonly client: grpc.Client;
  private readonly protocol: ProtocolDefinition;
  private readonly service: string | undefined;
  private readonly timeout: number;

  constructor(options: ProtocolClientOptions) {
    const target = grpcTarget(parseListenAddress(options.endpoint));
    this.client = new grpc.Client(target, grpc.credentials.createInsecure());
    this.protocol = options.protocol ?? loadProtocol();
    this.service = options.service;
    this.timeout = options.timeout ?? 30_000;
  }

  call(method: ProtocolMethodName, request: object, options: CallOptions = {}): Promise<object> {
    const codec = this.protocol.method(method);
    const metadata = new grpc.Metadata();
    const service = options.service ?? this.service;
    if (service) {
      metadata.set(ROUTING_METADATA_KEY, service);
    }

    return new Promise<object>((resolve, reject) => {
      const call = this.client.makeUnaryRequest<object, object>(
        codec.path,
        (value) => codec.encodeRequest(value),
        (bytes) => codec.decodeResponse(bytes),
        request,
        metadata,
        { deadline: Date.now() + this.timeout },
        (error, response) => {
          options.signal?.removeEventListener('abort', onAbort);
          if (error) {
            reject(error);
          } else if (!response) {
            reject(new Error(`${method}: empty response`));
          } else {
            resolve(response);
          }
        }
      );
      const onAbort = (): void => call.cancel();
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  close(): void {
    this.client.close();
  }
}
