export { ROUTING_METADATA_KEY, RouterServer } from './router-server.js';
export type { CleanupAction, RouterServerOptions, ServiceOutcome } from './router-server.js';
export { EXIT_SIGNALS, exitCodeFor, modeForSignal } from './shutdown.js';
export type { ExitSignal, ShutdownMode } from './shutdown.js';
