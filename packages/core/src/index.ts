/**
 * @hardline/core
 *
 * Hardline Core - Types, Remote Actions, State Machine, Guard Resolution and Errors
 */

// Types
export * from './types/index.js';

// Remote actions
export * from './actions/index.js';

// Utils
export * from './utils/index.js';

// State Machine - Transaction
export {
  TransactionStateMachine,
  isTerminalTransactionState,
  isValidTransactionTransition,
  isGuardRequired,
  type TransactionEvent,
  type TransactionTransitionResult,
} from './state-machine/index.js';

// Guard resolution
export * from './guard/index.js';

// Errors
export * from './errors/index.js';
