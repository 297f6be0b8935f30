import { describe, expect, it } from 'vitest';

import { EXIT_SIGNALS, exitCodeFor, modeForSignal } from '@/router/shutdown.js';

describe('shutdown policy', () => {
  it('drains on the first signal and forces on a repeat', () => {
    expect(modeForSignal(false)).toBe('graceful');
    expect(modeForSignal(true)).toBe('forced');
  });

  it('exits non-zero only after a forced shutdown', () => {
    expect(exitCodeFor('graceful')).toBe(0);
    expect(exitCodeFor('forced')).toBe(1);
  });

  it('handles the usual termination signals', () => {
    expect([...EXIT_SIGNALS].sort()).toEqual(['SIGHUP', 'SIGINT', 'SIGQUIT', 'SIGTERM']);
  });
});
