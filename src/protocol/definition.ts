// Protocol definition loaded from proto/csi.proto at run time.
//
// The same codecs serve both hops: the public gRPC listener and the
// in-process pipe between a service wrapper and its provider.

import { fileURLToPath } from 'node:url';

import * as protoLoader from '@grpc/proto-loader';

import { ProtocolDefinitionError } from '../errors/index.js';
import {
  PROTOCOL_METHODS,
  PROTOCOL_METHOD_NAMES,
  isProtocolMethod,
  methodPath,
} from './methods.js';
import type { ProtocolMethodName, ProtocolServiceName } from './methods.js';

export const DEFAULT_PROTO_PATH = fileURLToPath(new URL('../../proto/csi.proto', import.meta.url));

/**
 * Decoding options shared by every codec. `defaults` makes absent messages
 * decode as `null` and absent maps as `{}`, which the request schemas rely on.
 * 64-bit integers decode as decimal strings so they re-encode without loss.
 */
export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

export interface MethodCodec {
  name: ProtocolMethodName;
  service: ProtocolServiceName;
  path: string;
  encodeRequest(request: object): Buffer;
  decodeRequest(bytes: Buffer): object;
  encodeResponse(response: object): Buffer;
  decodeResponse(bytes: Buffer): object;
}

export interface ProtocolDefinition {
  /** gRPC service definitions, ready for `Server.addService` */
  readonly services: Readonly<Record<ProtocolServiceName, protoLoader.ServiceDefinition>>;
  /** Codec for a method by bare name */
  method(name: ProtocolMethodName): MethodCodec;
  /** Codec for a bare name or a `/csi.Service/Method` path, if known */
  resolve(nameOrPath: string): MethodCodec | undefined;
}

const definitions = new Map<string, ProtocolDefinition>();

/**
 * Load (once per path) the protocol definition.
 */
export function loadProtocol(protoPath: string = DEFAULT_PROTO_PATH): ProtocolDefinition {
  const cached = definitions.get(protoPath);
  if (cached) return cached;

  let packageDefinition: protoLoader.PackageDefinition;
  try {
    packageDefinition = protoLoader.loadSync(protoPath, PROTO_LOADER_OPTIONS);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ProtocolDefinitionError(`${protoPath}: ${message}`);
  }

  const services = {
    Identity: serviceDefinition(packageDefinition, 'Identity'),
    Controller: serviceDefinition(packageDefinition, 'Controller'),
    Node: serviceDefinition(packageDefinition, 'Node'),
  } satisfies Record<ProtocolServiceName, protoLoader.ServiceDefinition>;

  const codecs = new Map<ProtocolMethodName, MethodCodec>();
  for (const name of PROTOCOL_METHOD_NAMES) {
    const service = PROTOCOL_METHODS[name];
    const method = services[service][name];
    if (!method) {
      throw new ProtocolDefinitionError(`csi.${service} has no method ${name}`);
    }
    codecs.set(name, {
      name,
      service,
      path: methodPath(name),
      encodeRequest: (request) => method.requestSerialize(request),
      decodeRequest: (bytes) => method.requestDeserialize(bytes),
      encodeResponse: (response) => method.responseSerialize(response),
      decodeResponse: (bytes) => method.responseDeserialize(bytes),
    });
  }

  const codecFor = (name: ProtocolMethodName): MethodCodec => {
    const codec = codecs.get(name);
    if (!codec) {
      throw new ProtocolDefinitionError(`no codec for ${name}`);
    }
    return codec;
  };

  const definition: ProtocolDefinition = {
    services,
    method: codecFor,
    resolve(nameOrPath) {
      const name = nameOrPath.startsWith('/')
        ? (nameOrPath.split('/').pop() ?? '')
        : nameOrPath;
      if (!isProtocolMethod(name)) return undefined;
      const codec = codecFor(name);
      return nameOrPath.startsWith('/') && codec.path !== nameOrPath ? undefined : codec;
    },
  };

  definitions.set(protoPath, definition);
  return definition;
}

function serviceDefinition(
  packageDefinition: protoLoader.PackageDefinition,
  service: ProtocolServiceName
): protoLoader.ServiceDefinition {
  const definition = packageDefinition[`csi.${service}`];
  if (!isServiceDefinition(definition)) {
    throw new ProtocolDefinitionError(`missing service csi.${service}`);
  }
  return definition;
}

function isServiceDefinition(
  definition: protoLoader.AnyDefinition | undefined
): definition is protoLoader.ServiceDefinition {
  // message and enum definitions carry a `format` tag; services do not
  return definition !== undefined && !('format' in definition);
}
