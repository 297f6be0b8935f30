// Process-wide provider table, built once at startup and passed by reference.
//
// Lookups read a plain Map. Mutation (bootstrap and module loads) runs one
// task at a time through a promise chain, and each module's entries are
// validated in full before any of them is merged.

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import type { FastifyBaseLogger } from 'fastify';

import { isStorageProvider } from '../providers/types.js';
import type { ProviderFactory, ServiceProviderTable, StorageProvider } from '../providers/types.js';
import {
  DuplicateProviderError,
  InvalidModuleError,
  InvalidProviderError,
  ModuleLoadError,
  ProviderNotFoundError,
} from './errors.js';

/** Name of the export a provider module must publish. */
export const PROVIDER_TABLE_EXPORT = 'serviceProviders';

export const BUILTIN_SOURCE = '<builtin>';

export type ModuleImporter = (modulePath: string) => Promise<unknown>;

export interface ProviderRegistryOptions {
  logger: FastifyBaseLogger;
  /** Providers registered by the one-time bootstrap */
  builtins?: ServiceProviderTable;
  /** Overrides how module paths are imported */
  importModule?: ModuleImporter;
}

export interface RegisteredProvider {
  /** Name as exported by its module */
  name: string;
  /** Module path the provider came from, or `<builtin>` */
  source: string;
  create: ProviderFactory;
}

const importFromPath: ModuleImporter = (modulePath) =>
  import(pathToFileURL(resolve(modulePath)).href);

export class ProviderRegistry {
  private readonly entries = new Map<string, RegisteredProvider>();
  private readonly logger: FastifyBaseLogger;
  private readonly builtins: ServiceProviderTable;
  private readonly importModule: ModuleImporter;
  private bootstrapped: Promise<void> | undefined;
  private mutations: Promise<void> = Promise.resolve();

  constructor(options: ProviderRegistryOptions) {
    this.logger = options.logger.child({ component: 'registry' });
    this.builtins = options.builtins ?? {};
    this.importModule = options.importModule ?? importFromPath;
  }

  /**
   * Load provider modules and merge their export tables. Runs the bootstrap
   * first (once per registry). Modules are loaded in order; the first
   * failure rejects and leaves every earlier registration in place.
   */
  async load(...modulePaths: string[]): Promise<void> {
    await this.bootstrap();
    for (const modulePath of modulePaths) {
      await this.exclusive(() => this.loadModule(modulePath));
    }
  }

  /** Register the built-in providers. Safe to call any number of times. */
  bootstrap(): Promise<void> {
    this.bootstrapped ??= this.exclusive(async () => {
      this.merge(BUILTIN_SOURCE, this.stage(BUILTIN_SOURCE, Object.entries(this.builtins)));
    });
    return this.bootstrapped;
  }

  /** Case-insensitive lookup of a provider factory. */
  lookup(name: string): ProviderFactory {
    return this.get(name).create;
  }

  /** Case-insensitive lookup of the full registration. */
  get(name: string): RegisteredProvider {
    const entry = this.entries.get(name.toLowerCase());
    if (!entry) {
      throw new ProviderNotFoundError(name);
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  /** Registered providers in registration order. */
  list(): RegisteredProvider[] {
    return [...this.entries.values()];
  }

  names(): string[] {
    return this.list().map((entry) => entry.name);
  }

  private exclusive(task: () => Promise<void>): Promise<void> {
    const run = this.mutations.then(task);
    // a failed mutation must not wedge the ones queued behind it
    this.mutations = run.catch(() => undefined);
    return run;
  }

  private async loadModule(modulePath: string): Promise<void> {
    let moduleExports: unknown;
    try {
      moduleExports = await this.importModule(modulePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ module: modulePath, err: message }, 'Provider module failed to load');
      throw new ModuleLoadError(modulePath, message);
    }

    const table = readProviderTable(modulePath, moduleExports);
    if (table.length === 0) {
      this.logger.warn({ module: modulePath }, 'Provider module exports no providers');
    }
    this.merge(modulePath, this.stage(modulePath, table));
  }

  /** Validate a whole table without touching the registry. */
  private stage(source: string, table: Array<[string, unknown]>): RegisteredProvider[] {
    const staged = new Map<string, RegisteredProvider>();

    for (const [name, factory] of table) {
      if (name.trim() === '') {
        throw new InvalidModuleError(source, 'provider name must not be empty');
      }
      if (typeof factory !== 'function') {
        throw new InvalidModuleError(source, `${name} is not a constructor function`);
      }
      const key = name.toLowerCase();
      if (this.entries.has(key) || staged.has(key)) {
        throw new DuplicateProviderError(name, source);
      }
      staged.set(key, { name, source, create: checkedFactory(name, factory) });
    }

    return [...staged.values()];
  }

  private merge(source: string, providers: RegisteredProvider[]): void {
    for (const provider of providers) {
      this.entries.set(provider.name.toLowerCase(), provider);
    }
    if (providers.length > 0) {
      this.logger.info(
        { module: source, providers: providers.map((p) => p.name) },
        'Registered providers'
      );
    }
  }
}

function readProviderTable(modulePath: string, moduleExports: unknown): Array<[string, unknown]> {
  if (typeof moduleExports !== 'object' || moduleExports === null) {
    throw new InvalidModuleError(modulePath, 'module has no exports');
  }
  const table: unknown = Reflect.get(moduleExports, PROVIDER_TABLE_EXPORT);
  if (typeof table !== 'object' || table === null || Array.isArray(table)) {
    throw new InvalidModuleError(modulePath, `missing ${PROVIDER_TABLE_EXPORT} export`);
  }
  return Object.entries(table);
}

/** Wrap a raw export so every instance it makes is checked at creation. */
function checkedFactory(name: string, factory: Function): ProviderFactory {
  return (): StorageProvider => {
    const instance: unknown = Reflect.apply(factory, undefined, []);
    if (!isStorageProvider(instance)) {
      throw new InvalidProviderError(name);
    }
    return instance;
  };
}
