/**
 * SSH Transport Configuration Types
 */

import type { ProcessRunner, SudoMode, TargetEndpoint } from '@hardline/core';

export interface SshExecutorConfig {
  endpoint: TargetEndpoint;
  /** How privileged actions are elevated (default: derived from user and credential) */
  sudo?: SudoMode;
  /** ssh ConnectTimeout in seconds (default: 10) */
  connectTimeoutSeconds?: number;
  /** Per-command timeout in milliseconds (default: 120000) */
  commandTimeoutMs?: number;
  /** Alternate known_hosts file, for both connections and host key purging */
  knownHostsFile?: string;
  /** Extra `-o key=value` options */
  options?: Record<string, string>;
  /** Process runner, replaceable in tests */
  runner?: ProcessRunner;
}

export interface SshArgsOptions {
  connectTimeoutSeconds: number;
  knownHostsFile?: string;
  options?: Record<string, string>;
}
