/** Transaction phase. ABORTED and COMMITTED are terminal. */
export type TransactionPhase =
  | 'INTERACTIVE'
  | 'VOTING'
  | 'COMMITTING'
  | 'ROLLING_BACK'
  | 'ABORTED'
  | 'COMMITTED';

/** Phases that wait on a subset of the participants. */
export type AwaitingPhase = 'VOTING' | 'COMMITTING' | 'ROLLING_BACK';

/**
 * Transaction state. `awaiting` holds the identity keys of the participants
 * the current phase still needs a reply from.
 */
export type TransactionState<K> =
  | { readonly phase: 'INTERACTIVE' }
  | { readonly phase: 'VOTING'; readonly awaiting: ReadonlySet<K> }
  | { readonly phase: 'COMMITTING'; readonly awaiting: ReadonlySet<K> }
  | { readonly phase: 'ROLLING_BACK'; readonly awaiting: ReadonlySet<K> }
  | { readonly phase: 'ABORTED' }
  | { readonly phase: 'COMMITTED' };

/**
 * A two-phase-commit transaction. Immutable: every transition returns a new
 * value, so any value can be persisted as-is.
 */
export interface Transaction<P, K, I = unknown, C = unknown> {
  readonly id: I | null;
  readonly client: C | null;
  /** Keyed by identity, in insertion order. Frozen once voting starts. */
  readonly participants: ReadonlyMap<K, P>;
  readonly state: TransactionState<K>;
}

/** What the owner of a transaction must do next to move it forward. */
export type NextAction<P> =
  | { type: 'WRITE_DATA' }
  | { type: 'VOTE'; participants: P[] }
  | { type: 'COMMIT'; participants: P[] }
  | { type: 'ROLL_BACK'; participants: P[] };

/** Optional fields for a new transaction. */
export interface TransactionOptions<I, C> {
  id?: I;
  client?: C;
}

/** Transition errors. */
export enum TransactionError {
  TOO_FEW_PARTICIPANTS = 'TOO_FEW_PARTICIPANTS',
  UNKNOWN_PARTICIPANT = 'UNKNOWN_PARTICIPANT',
  INVALID_PHASE = 'INVALID_PHASE',
  INCONSISTENT_VOTE = 'INCONSISTENT_VOTE',
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',
}

/** Outcome of a transition. The input transaction is never modified. */
export type TransitionResult<T> =
  | { ok: true; transaction: T }
  | { ok: false; error: TransactionError; detail: string };
