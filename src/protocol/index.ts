export { grpcTarget, isListenAddress, isLocalSocket, parseListenAddress } from './address.js';
export type { ListenAddress } from './address.js';
export { DEFAULT_PROTO_PATH, PROTO_LOADER_OPTIONS, loadProtocol } from './definition.js';
export type { MethodCodec, ProtocolDefinition } from './definition.js';
export {
  VersionSchema,
  describeProtocolError,
  formatVersion,
  inspectNodeId,
  inspectVolumeId,
  readName,
  readVersion,
  versionsEqual,
} from './messages.js';
export type { IdentifierPresence, Version } from './messages.js';
export {
  PROTOCOL_METHODS,
  PROTOCOL_METHOD_NAMES,
  PROTOCOL_SERVICES,
  isProtocolMethod,
  methodPath,
} from './methods.js';
export type {
  CallContext,
  ProtocolHandler,
  ProtocolHandlers,
  ProtocolMethodName,
  ProtocolServiceName,
} from './methods.js';
export * from './replies.js';
