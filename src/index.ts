#!/usr/bin/env node
import { resolveStartupConfig } from './config/index.js';
import { startDaemon } from './daemon.js';
import { initSentry } from './instrument.js';
import { createLogger } from './logger.js';
import { EXIT_SIGNALS, exitCodeFor, modeForSignal } from './router/shutdown.js';
import type { ExitSignal } from './router/shutdown.js';

const USAGE = 'usage: csimux [MODULE_PATH [MODULE_PATH...]] TYPE[:NAME] [TYPE[:NAME]...]';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = resolveStartupConfig({ args: process.argv.slice(2), env: process.env });
  const logger = createLogger(config.logging);

  initSentry(
    {
      dsn: config.sentry?.dsn,
      environment: config.sentry?.environment ?? config.env,
      tracesSampleRate: config.sentry?.tracesSampleRate,
    },
    logger
  );

  const daemon = await startDaemon(config, { logger });
  logger.info({ address: daemon.address }, 'csimux serving');

  // First signal drains; a second one while draining aborts
  let shuttingDown = false;
  const onSignal = (signal: ExitSignal): void => {
    const mode = modeForSignal(shuttingDown);
    shuttingDown = true;
    logger.info({ signal, mode }, 'Received signal, shutting down');

    daemon.shutdown(mode).then(
      () => {
        logger.info({ mode }, mode === 'graceful' ? 'Server stopped gracefully' : 'Server aborted');
        process.exit(exitCodeFor(mode));
      },
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  for (const signal of EXIT_SIGNALS) {
    process.on(signal, () => onSignal(signal));
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  console.error(USAGE);
  process.exit(1);
});
