export { ProtocolClient, replyError } from './protocol-client.js';
export type { CallOptions, ProtocolClientOptions } from './protocol-client.js';
