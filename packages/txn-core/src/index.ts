// Types
export type {
  TransactionPhase,
  AwaitingPhase,
  TransactionState,
  Transaction,
  NextAction,
  TransactionOptions,
  TransitionResult,
} from './types.js';
export { TransactionError } from './types.js';

// Participant identity
export type { KeyOf } from './identity.js';
export { identity, byField } from './identity.js';

// State machine
export type { TransactionMachine } from './machine/machine.js';
export { createMachine, createIdentityMachine } from './machine/machine.js';
export {
  MIN_PARTICIPANTS,
  createTransaction,
  addParticipant,
  getParticipants,
  prepare,
  prepared,
  aborted,
  rolledBack,
  committed,
  isTerminal,
} from './machine/state-machine.js';
export { nextAction } from './machine/next-action.js';

// Snapshots
export type { SnapshotState, TransactionSnapshot } from './snapshot/snapshot.js';
export { toSnapshot, fromSnapshot } from './snapshot/snapshot.js';
export type { SnapshotSchemas, SnapshotParseResult } from './snapshot/schema.js';
export { parseSnapshot, snapshotShape } from './snapshot/schema.js';
