export { createDuplexPair } from './duplex-pair.js';
export { PipeChannel } from './pipe-channel.js';
export type { PipeListener } from './pipe-channel.js';
export { PipeClient } from './pipe-client.js';
export { ProviderServer } from './provider-server.js';
export type { ProviderServerOptions } from './provider-server.js';
export { FrameDecoder, MAX_FRAME_BYTES, decodeFault, encodeFault, encodeFrame } from './frames.js';
export type { Fault, Frame, FrameKind } from './frames.js';
