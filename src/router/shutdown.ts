/**
 * How a shutdown is carried out, independent of what triggered it.
 * `graceful` drains services and in-flight calls; `forced` aborts them.
 */
export type ShutdownMode = 'graceful' | 'forced';

/** Signals that end the daemon. */
export const EXIT_SIGNALS = ['SIGTERM', 'SIGHUP', 'SIGINT', 'SIGQUIT'] as const;

export type ExitSignal = (typeof EXIT_SIGNALS)[number];

/**
 * The first exit signal asks for a graceful shutdown; any signal arriving
 * while that is still running forces it.
 */
export function modeForSignal(alreadyShuttingDown: boolean): ShutdownMode {
  return alreadyShuttingDown ? 'forced' : 'graceful';
}

/** Exit status a daemon reports after a shutdown of the given mode. */
export function exitCodeFor(mode: ShutdownMode): number {
  return mode === 'graceful' ? 0 : 1;
}
