import createError from '@fastify/error';

// Provider registry errors (REGISTRY_*)

/** No provider registered under the requested name (404) */
export const ProviderNotFoundError = createError<[string]>(
  'REGISTRY_PROVIDER_NOT_FOUND',
  'Unknown provider: %s',
  404
);

/** A module tried to register a name that is already taken (409) */
export const DuplicateProviderError = createError<[string, string]>(
  'REGISTRY_DUPLICATE_PROVIDER',
  'Provider %s already registered (while loading %s)',
  409
);

/** The module could not be imported at all (500) */
export const ModuleLoadError = createError<[string, string]>(
  'REGISTRY_MODULE_LOAD_FAILED',
  'Failed to load provider module %s: %s',
  500
);

/** The module imported but its export table is malformed (500) */
export const InvalidModuleError = createError<[string, string]>(
  'REGISTRY_INVALID_MODULE',
  'Invalid provider module %s: %s',
  500
);

/** A constructor produced something that is not a provider (500) */
export const InvalidProviderError = createError<[string]>(
  'REGISTRY_INVALID_PROVIDER',
  'Provider %s does not implement the provider interface',
  500
);
