import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import type { z } from 'zod';

import { ConfigSchema, FileConfigSchema, type Config, type FileConfig } from './schema.js';
import type { ServiceSpecConfig } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, FileConfig, ServiceSpecConfig } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

export const CONFIG_PATH_ENV = 'CSIMUX_CONFIG';
export const ENDPOINT_ENV = 'CSI_ENDPOINT';

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  return validate(ConfigSchema, readConfigFile(configPath));
}

export interface StartupArguments {
  /** Provider module paths, in order */
  modules: string[];
  /** TYPE[:NAME] service definitions, in order */
  services: ServiceSpecConfig[];
}

/**
 * Split daemon arguments: an argument naming an existing file is a provider
 * module; anything else is `TYPE[:NAME]` (split at the first colon).
 */
export function parseArguments(
  args: readonly string[],
  isFile: (candidate: string) => boolean = fileExists
): StartupArguments {
  const modules: string[] = [];
  const services: ServiceSpecConfig[] = [];

  for (const arg of args) {
    if (isFile(arg)) {
      modules.push(arg);
      continue;
    }
    const separator = arg.indexOf(':');
    if (separator === -1) {
      services.push({ type: arg });
    } else {
      const type = arg.slice(0, separator);
      const name = arg.slice(separator + 1);
      services.push(name ? { type, name } : { type });
    }
  }

  return { modules, services };
}

export interface StartupSources {
  args: readonly string[];
  env: Readonly<Record<string, string | undefined>>;
  isFile?: (candidate: string) => boolean;
}

/**
 * Daemon configuration: the config file (CSIMUX_CONFIG, or
 * config/config.json when present), then CSI_ENDPOINT, then arguments.
 * Argument services replace the file's list; argument modules are appended.
 */
export function resolveStartupConfig(sources: StartupSources): Config {
  const explicitPath = sources.env[CONFIG_PATH_ENV];
  let fileConfig: FileConfig;
  if (explicitPath) {
    fileConfig = validate(FileConfigSchema, readConfigFile(explicitPath));
  } else if (existsSync(DEFAULT_CONFIG_PATH)) {
    fileConfig = validate(FileConfigSchema, readConfigFile(DEFAULT_CONFIG_PATH));
  } else {
    fileConfig = validate(FileConfigSchema, {});
  }

  const args = parseArguments(sources.args, sources.isFile);
  const endpoint = sources.env[ENDPOINT_ENV] || fileConfig.endpoint;
  if (!endpoint) {
    throw new ConfigInvalidError(`endpoint: missing ${ENDPOINT_ENV}`);
  }

  return validate(ConfigSchema, {
    ...fileConfig,
    endpoint,
    services: args.services.length > 0 ? args.services : fileConfig.services,
    providerModules: [...fileConfig.providerModules, ...args.modules],
  });
}

function readConfigFile(configPath: string): unknown {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    return JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }
}

function validate<S extends z.ZodType>(schema: S, rawConfig: unknown): z.output<S> {
  const result = schema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}

function fileExists(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
}
