/**
 * Target and identity types
 */

export type Credential =
  | { type: 'password'; password: string }
  | { type: 'key'; identityFile: string }
  | { type: 'agent' };

/**
 * A machine the orchestrator talks to. Supplied at invocation, never persisted.
 */
export interface TargetEndpoint {
  host: string;
  port: number;
  user: string;
  credential: Credential;
}

/**
 * The operational account provisioned by bootstrap. Once created it is owned
 * by the target system, not by the orchestrator.
 */
export interface ManagedIdentity {
  username: string;
  password: string;
  /** Exact content written to authorized_keys */
  publicKey: string;
  shell: string;
}

export type ConnectivityStatus = 'reachable' | 'auth-failed' | 'unreachable';

/**
 * How privileged actions are elevated on the target.
 */
export type SudoMode =
  | { mode: 'none' }
  | { mode: 'nopasswd' }
  | { mode: 'password'; password: string };
