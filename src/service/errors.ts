import createError from '@fastify/error';

// Service wrapper errors (SERVICE_*)

export const ServiceNotRunningError = createError<[string]>(
  'SERVICE_NOT_RUNNING',
  'Service %s is not running',
  503
);

export const ServiceAlreadyStartedError = createError<[string]>(
  'SERVICE_ALREADY_STARTED',
  'Service %s has already been started',
  409
);

/** The provider could not report its supported versions (502) */
export const VersionQueryError = createError<[string, string]>(
  'SERVICE_VERSION_QUERY_FAILED',
  'GetSupportedVersions failed for %s: %s',
  502
);
