/**
 * Config Transaction Types
 */

import type { ErrorCode } from '../errors/index.js';
import type { GuardClaim } from './guard.js';

export type TransactionState =
  | 'idle'
  | 'snapshot-taken'
  | 'staged'
  | 'validated'
  | 'guard-armed'
  | 'applied'
  | 'confirmed'
  | 'reverted'
  | 'aborted';

export interface ConfigSnapshot {
  livePath: string;
  backupPath: string;
  existed: boolean;
  takenAt: string;
}

export type PendingChangeStatus = 'untested' | 'valid' | 'applied';

export interface PendingChange {
  stagedPath: string;
  content: string;
  status: PendingChangeStatus;
}

export interface GuardSummary {
  id: string;
  deadlineAt: string;
  logPath: string;
}

/**
 * Machine-readable outcome of one transaction.
 */
export interface TransactionResult {
  id: string;
  resource: string;
  state: TransactionState;
  reverted: boolean;
  revertedBy?: Exclude<GuardClaim, 'cancel'>;
  snapshot?: ConfigSnapshot;
  guard?: GuardSummary;
  /** ISO timestamp of entering each state */
  timestamps: Partial<Record<TransactionState, string>>;
  error?: {
    code: ErrorCode;
    message: string;
    hint?: string;
  };
}
