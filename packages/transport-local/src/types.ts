import type { ProcessRunner, SudoMode } from '@hardline/core';

/**
 * Local Executor Configuration
 */
export interface LocalExecutorConfig {
  /** Elevation for privileged actions (default: none as root, otherwise sudo -n) */
  sudo?: SudoMode;
  /** Per-action timeout in ms (default: 120000) */
  commandTimeoutMs?: number;
  /** Process runner, replaceable in tests */
  runner?: ProcessRunner;
}
