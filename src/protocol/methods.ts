// Method table for the storage protocol.
//
// The three services share a flat method namespace, so a provider (and the
// service wrapper in front of it) is addressed by bare method name.

export const PROTOCOL_SERVICES = ['Identity', 'Controller', 'Node'] as const;

export type ProtocolServiceName = (typeof PROTOCOL_SERVICES)[number];

export const PROTOCOL_METHODS = {
  GetSupportedVersions: 'Identity',
  GetPluginInfo: 'Identity',
  CreateVolume: 'Controller',
  DeleteVolume: 'Controller',
  ControllerPublishVolume: 'Controller',
  ControllerUnpublishVolume: 'Controller',
  ValidateVolumeCapabilities: 'Controller',
  ListVolumes: 'Controller',
  GetCapacity: 'Controller',
  ControllerGetCapabilities: 'Controller',
  NodePublishVolume: 'Node',
  NodeUnpublishVolume: 'Node',
  GetNodeID: 'Node',
  ProbeNode: 'Node',
  NodeGetCapabilities: 'Node',
} as const satisfies Record<string, ProtocolServiceName>;

export type ProtocolMethodName = keyof typeof PROTOCOL_METHODS;

export const PROTOCOL_METHOD_NAMES = Object.keys(PROTOCOL_METHODS).filter(isProtocolMethod);

export function isProtocolMethod(name: string): name is ProtocolMethodName {
  return Object.hasOwn(PROTOCOL_METHODS, name);
}

/** Fully qualified gRPC path, e.g. `/csi.Controller/CreateVolume`. */
export function methodPath(method: ProtocolMethodName): string {
  return `/csi.${PROTOCOL_METHODS[method]}/${method}`;
}

/** Per-call context handed to every protocol handler. */
export interface CallContext {
  /** Aborted when the caller cancels or the serving side shuts down */
  signal: AbortSignal;
}

/**
 * A protocol handler. Messages stay plain decoded objects; each side reads
 * only the fields it needs through the schemas in messages.ts.
 */
export type ProtocolHandler = (request: object, context: CallContext) => Promise<object>;

export type ProtocolHandlers = Record<ProtocolMethodName, ProtocolHandler>;
