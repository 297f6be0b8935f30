import createError from '@fastify/error';

// Transport errors (TRANSPORT_*)

/** Accept or dial on a closed pipe channel (503) */
export const ChannelClosedError = createError<[string]>(
  'TRANSPORT_CHANNEL_CLOSED',
  'Transport channel closed: %s',
  503
);

/** The caller's signal fired before the call completed (499) */
export const CallCancelledError = createError<[string]>(
  'TRANSPORT_CALL_CANCELLED',
  'Call cancelled: %s',
  499
);

/** The provider connection went away while calls were pending (503) */
export const ProviderUnavailableError = createError<[string]>(
  'TRANSPORT_PROVIDER_UNAVAILABLE',
  'Provider unreachable: %s',
  503
);

/** A peer announced a frame larger than the transport accepts (500) */
export const FrameTooLargeError = createError<[number]>(
  'TRANSPORT_FRAME_TOO_LARGE',
  'Frame exceeds %d bytes',
  500
);

/**
 * A provider answered a call with a fault. Carries the gRPC status the
 * provider chose so the router can hand it back unmodified.
 */
export class RemoteCallError extends Error {
  readonly code = 'TRANSPORT_REMOTE_FAULT';

  constructor(
    readonly status: number,
    readonly details: string
  ) {
    super(`Provider call failed: ${details}`);
    this.name = 'RemoteCallError';
  }
}

/** A call frame named a method the protocol does not define (501) */
export const UnknownMethodError = createError<[string]>(
  'TRANSPORT_UNKNOWN_METHOD',
  'Unknown protocol method: %s',
  501
);

/** Serve called on a provider server that is already serving (409) */
export const ServerStartedError = createError<[string]>(
  'TRANSPORT_SERVER_STARTED',
  'Provider server %s has already been started',
  409
);

/** Serve called on a provider server that has been stopped (503) */
export const ServerStoppedError = createError<[string]>(
  'TRANSPORT_SERVER_STOPPED',
  'Provider server %s has been stopped',
  503
);
