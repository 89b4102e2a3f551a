import type { KeyOf } from '../identity.js';
import type {
  Transaction,
  TransactionOptions,
  TransactionState,
  TransitionResult,
} from '../types.js';
import { TransactionError } from '../types.js';

/** Two-phase commit is not defined for fewer participants. */
export const MIN_PARTICIPANTS = 2;

type Result<P, K, I, C> = TransitionResult<Transaction<P, K, I, C>>;

function ok<T>(transaction: T): TransitionResult<T> {
  return { ok: true, transaction };
}

function fail<T>(error: TransactionError, detail: string): TransitionResult<T> {
  return { ok: false, error, detail };
}

function invalidPhase<T>(operation: string, state: TransactionState<unknown>): TransitionResult<T> {
  return fail(TransactionError.INVALID_PHASE, `${operation} is not allowed in phase ${state.phase}`);
}

function unknownParticipant<T>(key: unknown): TransitionResult<T> {
  return fail(TransactionError.UNKNOWN_PARTICIPANT, `participant ${String(key)} is not part of this transaction`);
}

function withState<P, K, I, C>(
  tx: Transaction<P, K, I, C>,
  state: TransactionState<K>,
): Transaction<P, K, I, C> {
  return { ...tx, state };
}

/** Every participant key, re-armed for the next phase. */
function allKeys<K>(tx: Transaction<unknown, K, unknown, unknown>): ReadonlySet<K> {
  return new Set(tx.participants.keys());
}

/** Remove `key` from an awaiting set. Absent keys are a no-op (duplicate replies). */
function without<K>(awaiting: ReadonlySet<K>, key: K): ReadonlySet<K> {
  if (!awaiting.has(key)) {
    return awaiting;
  }
  const next = new Set(awaiting);
  next.delete(key);
  return next;
}

export function createTransaction<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  participants: Iterable<P>,
  options: TransactionOptions<I, C> = {},
): Transaction<P, K, I, C> {
  const byKey = new Map<K, P>();
  for (const participant of participants) {
    byKey.set(keyOf(participant), participant);
  }
  return {
    id: options.id ?? null,
    client: options.client ?? null,
    participants: byKey,
    state: { phase: 'INTERACTIVE' },
  };
}

export function addParticipant<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  tx: Transaction<P, K, I, C>,
  participant: P,
): Result<P, K, I, C> {
  const { state } = tx;
  switch (state.phase) {
    case 'INTERACTIVE': {
      const participants = new Map(tx.participants);
      participants.set(keyOf(participant), participant);
      return ok({ ...tx, participants });
    }
    case 'VOTING':
    case 'COMMITTING':
    case 'ROLLING_BACK':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('addParticipant', state);
  }
}

export function getParticipants<P>(tx: Transaction<P, unknown, unknown, unknown>): P[] {
  return [...tx.participants.values()];
}

/** Move to VOTING with every participant awaited. */
export function prepare<P, K, I, C>(tx: Transaction<P, K, I, C>): Result<P, K, I, C> {
  const { state } = tx;
  switch (state.phase) {
    case 'INTERACTIVE':
      if (tx.participants.size < MIN_PARTICIPANTS) {
        return fail(
          TransactionError.TOO_FEW_PARTICIPANTS,
          `prepare needs at least ${MIN_PARTICIPANTS} participants, got ${tx.participants.size}`,
        );
      }
      return ok(withState(tx, { phase: 'VOTING', awaiting: allKeys(tx) }));
    case 'VOTING':
    case 'COMMITTING':
    case 'ROLLING_BACK':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('prepare', state);
  }
}

/** Record a commit vote. The last one moves the transaction to COMMITTING. */
export function prepared<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  tx: Transaction<P, K, I, C>,
  participant: P,
): Result<P, K, I, C> {
  const { state } = tx;
  const key = keyOf(participant);
  switch (state.phase) {
    case 'VOTING': {
      if (!tx.participants.has(key)) {
        return unknownParticipant(key);
      }
      const awaiting = without(state.awaiting, key);
      if (awaiting.size === 0) {
        return ok(withState(tx, { phase: 'COMMITTING', awaiting: allKeys(tx) }));
      }
      return ok(withState(tx, { phase: 'VOTING', awaiting }));
    }
    case 'ROLLING_BACK':
      // Abort is already decided: late commit votes change nothing.
      return tx.participants.has(key) ? ok(tx) : unknownParticipant(key);
    case 'INTERACTIVE':
    case 'COMMITTING':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('prepared', state);
  }
}

/**
 * Record an abort vote. One abort rolls back every participant, including
 * the ones that already voted to commit.
 */
export function aborted<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  tx: Transaction<P, K, I, C>,
  participant: P,
): Result<P, K, I, C> {
  const { state } = tx;
  const key = keyOf(participant);
  switch (state.phase) {
    case 'VOTING':
      if (!tx.participants.has(key)) {
        return unknownParticipant(key);
      }
      if (!state.awaiting.has(key)) {
        return fail(
          TransactionError.INCONSISTENT_VOTE,
          `participant ${String(key)} voted to abort after voting to commit`,
        );
      }
      return ok(withState(tx, { phase: 'ROLLING_BACK', awaiting: allKeys(tx) }));
    case 'ROLLING_BACK':
      return tx.participants.has(key) ? ok(tx) : unknownParticipant(key);
    case 'INTERACTIVE':
    case 'COMMITTING':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('aborted', state);
  }
}

/** Acknowledge a rollback. The last one moves the transaction to ABORTED. */
export function rolledBack<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  tx: Transaction<P, K, I, C>,
  participant: P,
): Result<P, K, I, C> {
  const { state } = tx;
  const key = keyOf(participant);
  switch (state.phase) {
    case 'ROLLING_BACK': {
      if (!tx.participants.has(key)) {
        return unknownParticipant(key);
      }
      const awaiting = without(state.awaiting, key);
      if (awaiting.size === 0) {
        return ok(withState(tx, { phase: 'ABORTED' }));
      }
      return ok(withState(tx, { phase: 'ROLLING_BACK', awaiting }));
    }
    case 'INTERACTIVE':
    case 'VOTING':
    case 'COMMITTING':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('rolledBack', state);
  }
}

/** Acknowledge a commit. The last one moves the transaction to COMMITTED. */
export function committed<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  tx: Transaction<P, K, I, C>,
  participant: P,
): Result<P, K, I, C> {
  const { state } = tx;
  const key = keyOf(participant);
  switch (state.phase) {
    case 'COMMITTING': {
      if (!tx.participants.has(key)) {
        return unknownParticipant(key);
      }
      const awaiting = without(state.awaiting, key);
      if (awaiting.size === 0) {
        return ok(withState(tx, { phase: 'COMMITTED' }));
      }
      return ok(withState(tx, { phase: 'COMMITTING', awaiting }));
    }
    case 'INTERACTIVE':
    case 'VOTING':
    case 'ROLLING_BACK':
    case 'ABORTED':
    case 'COMMITTED':
      return invalidPhase('committed', state);
  }
}

export function isTerminal(tx: Transaction<unknown, unknown, unknown, unknown>): boolean {
  return tx.state.phase === 'ABORTED' || tx.state.phase === 'COMMITTED';
}
