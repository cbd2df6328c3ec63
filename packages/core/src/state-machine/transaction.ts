import type { TransactionState } from '../types/transaction.js';

// ========== Transition Table ==========

const TRANSACTION_TRANSITIONS: Record<TransactionState, TransactionState[]> = {
  idle: ['snapshot-taken', 'aborted'],
  'snapshot-taken': ['staged', 'aborted'],
  staged: ['validated', 'aborted'],
  validated: ['guard-armed', 'aborted'],
  'guard-armed': ['applied', 'reverted'],
  applied: ['confirmed', 'reverted'],
  confirmed: [],
  reverted: [],
  aborted: [],
};

export function isTerminalTransactionState(state: TransactionState): boolean {
  return TRANSACTION_TRANSITIONS[state].length === 0;
}

export function isValidTransactionTransition(
  from: TransactionState,
  to: TransactionState,
): boolean {
  return TRANSACTION_TRANSITIONS[from].includes(to);
}

/**
 * True once the live configuration may differ from the snapshot.
 */
export function isGuardRequired(state: TransactionState): boolean {
  return state === 'guard-armed' || state === 'applied';
}

// ========== Events ==========

export type TransactionEvent =
  | { type: 'TAKE_SNAPSHOT' }
  | { type: 'STAGE' }
  | { type: 'VALIDATE' }
  | { type: 'ARM_GUARD' }
  | { type: 'APPLY' }
  | { type: 'CONFIRM' }
  | { type: 'REVERT' }
  | { type: 'ABORT' };

export interface TransactionTransitionResult {
  success: boolean;
  newState: TransactionState;
  error?: string;
}

// ========== State Machine ==========

/**
 * Strictly forward lifecycle of one configuration transaction. A guard can
 * only be armed from `validated`, so each instance arms at most one.
 */
export class TransactionStateMachine {
  private state: TransactionState = 'idle';

  constructor(initialState?: TransactionState) {
    if (initialState) {
      this.state = initialState;
    }
  }

  getState(): TransactionState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalTransactionState(this.state);
  }

  transition(event: TransactionEvent): TransactionTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidTransactionTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    this.state = targetState;
    return {
      success: true,
      newState: this.state,
    };
  }

  private getTargetState(event: TransactionEvent): TransactionState | null {
    switch (event.type) {
      case 'TAKE_SNAPSHOT':
        return this.state === 'idle' ? 'snapshot-taken' : null;

      case 'STAGE':
        return this.state === 'snapshot-taken' ? 'staged' : null;

      case 'VALIDATE':
        return this.state === 'staged' ? 'validated' : null;

      case 'ARM_GUARD':
        return this.state === 'validated' ? 'guard-armed' : null;

      case 'APPLY':
        return this.state === 'guard-armed' ? 'applied' : null;

      case 'CONFIRM':
        return this.state === 'applied' ? 'confirmed' : null;

      case 'REVERT':
        return isGuardRequired(this.state) ? 'reverted' : null;

      case 'ABORT':
        return isTerminalTransactionState(this.state) || isGuardRequired(this.state)
          ? null
          : 'aborted';

      default:
        return null;
    }
  }
}
