// Coordinator
export { Coordinator } from './coordinator.js';
export type {
  Vote,
  Outcome,
  ParticipantTransport,
  StoredTransaction,
  TransactionStore,
  TransactionOutcome,
  TransactionResult,
  BeginOptions,
  CoordinatorOptions,
} from './types.js';

// Errors
export {
  ProtocolViolationError,
  UnknownTransactionError,
  DuplicateTransactionError,
  TransitionRejectedError,
  TransactionQuarantinedError,
} from './errors.js';

// Building blocks
export { Mailbox } from './mailbox.js';
export { MemoryTransactionStore } from './memory-store.js';
export { createLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
export type { Logger } from 'pino';
