import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Protocol definition errors (PROTOCOL_*)
export const ProtocolDefinitionError = createError<[string]>(
  'PROTOCOL_DEFINITION_INVALID',
  'Invalid protocol definition: %s',
  500
);

// Generic internal error
export const InternalError = createError<[string]>('INTERNAL_ERROR', 'Internal error: %s', 500);

// Transport errors (TRANSPORT_*) - re-exported from transport domain
export {
  ChannelClosedError,
  CallCancelledError,
  ProviderUnavailableError,
  FrameTooLargeError,
  RemoteCallError,
  UnknownMethodError,
  ServerStartedError,
  ServerStoppedError,
} from '../transport/errors.js';

// Registry errors (REGISTRY_*)
export {
  ProviderNotFoundError,
  DuplicateProviderError,
  ModuleLoadError,
  InvalidModuleError,
  InvalidProviderError,
} from '../registry/errors.js';

// Service errors (SERVICE_*)
export {
  ServiceNotRunningError,
  ServiceAlreadyStartedError,
  VersionQueryError,
} from '../service/errors.js';

// Router errors (ROUTER_*)
export {
  EmptyServicesError,
  InvalidAddressError,
  UnsupportedNetworkError,
  BindError,
  ServerAlreadyServingError,
  UnknownServiceError,
} from '../router/errors.js';

/** Stable error code of any error raised in this codebase, if it has one. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
