export {
  TransactionStateMachine,
  isTerminalTransactionState,
  isValidTransactionTransition,
  isGuardRequired,
  type TransactionEvent,
  type TransactionTransitionResult,
} from './transaction.js';
