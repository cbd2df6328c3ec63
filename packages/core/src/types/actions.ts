/**
 * Remote Action Types
 *
 * Every interaction with a target is one of these named operations. Executors
 * compile them to an argv; nothing upstream ever builds command text.
 */

import type { ConnectivityStatus } from './target.js';

interface ActionBase {
  /** Run through sudo (default: true) */
  privileged?: boolean;
}

export type RemoteAction =
  | (ActionBase & { op: 'run'; argv: string[]; stdin?: string })
  | (ActionBase & { op: 'readFile'; path: string })
  | (ActionBase & { op: 'writeFile'; path: string; content: string })
  | (ActionBase & { op: 'copyFile'; from: string; to: string })
  | (ActionBase & { op: 'moveFile'; from: string; to: string })
  | (ActionBase & { op: 'removeFile'; path: string })
  | (ActionBase & { op: 'removeDir'; path: string })
  | (ActionBase & { op: 'makeDir'; path: string; mode?: string; owner?: string; group?: string })
  | (ActionBase & {
      op: 'installFile';
      from: string;
      to: string;
      mode: string;
      owner?: string;
      group?: string;
    })
  | (ActionBase & { op: 'fileExists'; path: string })
  | (ActionBase & { op: 'restartService'; service: string })
  | (ActionBase & { op: 'spawnDetached'; argv: string[]; logPath: string })
  | (ActionBase & { op: 'killProcess'; pid: number })
  | (ActionBase & { op: 'claimLock'; path: string })
  | (ActionBase & { op: 'userExists'; username: string });

export type RemoteActionOp = RemoteAction['op'];

export interface CompiledAction {
  argv: string[];
  stdin?: string;
  privileged: boolean;
}

export interface ActionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecuteOptions {
  timeoutMs?: number;
}

/**
 * Capability to run typed actions against one target as one user.
 */
export interface RemoteExecutor {
  /** Human readable target, e.g. "admin@10.0.0.5:22" */
  readonly description: string;
  execute(action: RemoteAction, options?: ExecuteOptions): Promise<ActionResult>;
  /** Single non-retrying reachability and credential check */
  probe(): Promise<ConnectivityStatusResult>;
  /** Drop cached host identity records for the target */
  forgetHostIdentity(): Promise<boolean>;
}

export interface ConnectivityStatusResult {
  status: ConnectivityStatus;
  detail?: string;
}
