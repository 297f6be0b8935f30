import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

export interface SentryOptions {
  dsn?: string;
  environment: string;
  tracesSampleRate?: number;
}

// Only initialize if a DSN is provided; capture calls are no-ops otherwise
export function initSentry(options: SentryOptions, logger: FastifyBaseLogger): void {
  if (!options.dsn) {
    logger.debug('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: options.tracesSampleRate ?? 0.1,
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment: options.environment }, 'Sentry initialized');
}

// Re-export Sentry for the router and the admin error handler
export { Sentry };
