import { z } from 'zod';

import { isListenAddress } from '../protocol/address.js';

export const EndpointSchema = z
  .string()
  .refine(isListenAddress, { message: 'expected scheme://address, e.g. tcp://127.0.0.1:10000' });

export const ServiceSpecSchema = z.object({
  /** Registered provider name (case-insensitive) */
  type: z.string().min(1),
  /** Routing name; defaults to the provider name */
  name: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  // Listen address of the routing server (CSI_ENDPOINT overrides it)
  endpoint: EndpointSchema,

  // Services in routing order; the first one takes untagged calls
  services: z.array(ServiceSpecSchema).default([]),

  // Provider modules to load at startup, in order
  providerModules: z.array(z.string().min(1)).default([]),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional admin HTTP API (health and service status)
  admin: z
    .object({
      enabled: z.boolean().default(false),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(9808),
    })
    .default(() => ({ enabled: false, host: '127.0.0.1', port: 9808 })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),
});

/** Shape of the config file, where the endpoint may come from the environment instead. */
export const FileConfigSchema = ConfigSchema.extend({
  endpoint: EndpointSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;
export type ServiceSpecConfig = z.infer<typeof ServiceSpecSchema>;
