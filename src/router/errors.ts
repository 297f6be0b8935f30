import createError from '@fastify/error';

// Routing server errors (ROUTER_*)

/** Serve was called without any service to route to (500) */
export const EmptyServicesError = createError(
  'ROUTER_EMPTY_SERVICES',
  'No services configured',
  500
);

/** Listen address is not "scheme://address" (500) */
export const InvalidAddressError = createError<[string]>(
  'ROUTER_INVALID_ADDRESS',
  'Invalid listen address: %s',
  500
);

/** Listen address parses but gRPC cannot serve on that network (500) */
export const UnsupportedNetworkError = createError<[string]>(
  'ROUTER_UNSUPPORTED_NETWORK',
  'Unsupported network for gRPC: %s',
  500
);

export const BindError = createError<[string, string]>(
  'ROUTER_BIND_FAILED',
  'Failed to bind %s: %s',
  500
);

export const ServerAlreadyServingError = createError(
  'ROUTER_ALREADY_SERVING',
  'Server has already been started',
  409
);

/** Admin lookup of a service name the router does not host (404) */
export const UnknownServiceError = createError<[string]>(
  'ROUTER_UNKNOWN_SERVICE',
  'No service named %s',
  404
);
