import type { KeyOf } from '../identity.js';
import { awaitingParticipants } from '../machine/next-action.js';
import type { AwaitingPhase, Transaction, TransactionState, TransitionResult } from '../types.js';
import { TransactionError } from '../types.js';

/** Snapshot state. Awaiting sets hold participant values, never keys. */
export type SnapshotState<P> =
  | { phase: 'INTERACTIVE' | 'ABORTED' | 'COMMITTED' }
  | { phase: AwaitingPhase; awaiting: P[] };

/** Plain-data form of a transaction. JSON-serializable when P, I and C are. */
export interface TransactionSnapshot<P, I = unknown, C = unknown> {
  id: I | null;
  client: C | null;
  participants: P[];
  state: SnapshotState<P>;
}

export function toSnapshot<P, K, I, C>(tx: Transaction<P, K, I, C>): TransactionSnapshot<P, I, C> {
  const { state } = tx;
  const base = {
    id: tx.id,
    client: tx.client,
    participants: [...tx.participants.values()],
  };
  switch (state.phase) {
    case 'VOTING':
    case 'COMMITTING':
    case 'ROLLING_BACK':
      return { ...base, state: { phase: state.phase, awaiting: awaitingParticipants(tx, state.awaiting) } };
    case 'INTERACTIVE':
    case 'ABORTED':
    case 'COMMITTED':
      return { ...base, state: { phase: state.phase } };
  }
}

function invalid<T>(detail: string): TransitionResult<T> {
  return { ok: false, error: TransactionError.INVALID_SNAPSHOT, detail };
}

/**
 * Rebuild a transaction from its snapshot, re-deriving keys with `keyOf`.
 * Rejects snapshots that break the transaction invariants: duplicate
 * participants, awaited participants that are not part of the transaction,
 * or an awaiting phase with nobody left to wait for.
 */
export function fromSnapshot<P, K, I, C>(
  keyOf: KeyOf<P, K>,
  snapshot: TransactionSnapshot<P, I, C>,
): TransitionResult<Transaction<P, K, I, C>> {
  const participants = new Map<K, P>();
  for (const participant of snapshot.participants) {
    const key = keyOf(participant);
    if (participants.has(key)) {
      return invalid(`duplicate participant ${String(key)}`);
    }
    participants.set(key, participant);
  }

  const snapState = snapshot.state;
  let state: TransactionState<K>;
  switch (snapState.phase) {
    case 'INTERACTIVE':
    case 'ABORTED':
    case 'COMMITTED':
      state = { phase: snapState.phase };
      break;
    case 'VOTING':
    case 'COMMITTING':
    case 'ROLLING_BACK': {
      const awaiting = new Set<K>();
      for (const participant of snapState.awaiting) {
        const key = keyOf(participant);
        if (!participants.has(key)) {
          return invalid(`awaited participant ${String(key)} is not part of this transaction`);
        }
        awaiting.add(key);
      }
      if (awaiting.size === 0) {
        return invalid(`phase ${snapState.phase} has no awaited participants`);
      }
      state = { phase: snapState.phase, awaiting };
      break;
    }
  }

  return {
    ok: true,
    transaction: { id: snapshot.id, client: snapshot.client, participants, state },
  };
}
