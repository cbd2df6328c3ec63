/**
 * Rollback Guard Types
 */

import type { RemoteAction } from './actions.js';

/** Who won the single-winner race for a guard */
export type GuardClaim = 'cancel' | 'deadline' | 'explicit-revert';

export type GuardOutcome =
  | 'pending'
  | 'cancelled'
  | 'reverting'
  | 'reverted'
  | 'revert-failed';

export interface GuardStatus {
  outcome: GuardOutcome;
  claimedBy?: GuardClaim;
}

/**
 * Everything a guard needs to restore a resource without the orchestrator.
 */
export interface GuardSpec {
  transactionId: string;
  resource: string;
  livePath: string;
  backupPath: string;
  stagedPath: string;
  /** False when the live file did not exist before the transaction */
  snapshotExisted: boolean;
  /** Actions that make the consuming service pick up the restored file */
  activate: RemoteAction[];
  deadlineSeconds: number;
}

export interface GuardHandle {
  readonly id: string;
  readonly resource: string;
  readonly deadlineAt: string;
  /** Where the guard writes its audit log */
  readonly logPath: string;
  status(): Promise<GuardStatus>;
  /**
   * Stop the guard without reverting. Returns the winning status: `cancelled`
   * when the cancel won, otherwise whatever the deadline produced.
   */
  cancel(): Promise<GuardStatus>;
  /** Revert now instead of waiting for the deadline */
  revertNow(): Promise<GuardStatus>;
  /** Resolve once the guard reaches a terminal outcome or `timeoutMs` passes */
  awaitOutcome(timeoutMs: number): Promise<GuardStatus>;
}

export interface GuardDriver {
  readonly kind: string;
  arm(spec: GuardSpec): Promise<GuardHandle>;
}

export function isSettledOutcome(outcome: GuardOutcome): boolean {
  return outcome === 'cancelled' || outcome === 'reverted' || outcome === 'revert-failed';
}
