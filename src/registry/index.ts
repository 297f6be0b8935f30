export { BUILTIN_SOURCE, PROVIDER_TABLE_EXPORT, ProviderRegistry } from './provider-registry.js';
export type {
  ModuleImporter,
  ProviderRegistryOptions,
  RegisteredProvider,
} from './provider-registry.js';
