import type { NextAction, Transaction } from '../types.js';

/** Participants whose keys are in `awaiting`, in participant insertion order. */
export function awaitingParticipants<P, K>(
  tx: Transaction<P, K, unknown, unknown>,
  awaiting: ReadonlySet<K>,
): P[] {
  const result: P[] = [];
  for (const [key, participant] of tx.participants) {
    if (awaiting.has(key)) {
      result.push(participant);
    }
  }
  return result;
}

/**
 * What still has to happen to move the transaction forward. Depends on the
 * state alone, so a coordinator that reloads a persisted transaction after a
 * crash learns exactly which requests are outstanding without replaying
 * history. Returns null for terminal transactions.
 */
export function nextAction<P, K>(tx: Transaction<P, K, unknown, unknown>): NextAction<P> | null {
  const { state } = tx;
  switch (state.phase) {
    case 'INTERACTIVE':
      return { type: 'WRITE_DATA' };
    case 'VOTING':
      return { type: 'VOTE', participants: awaitingParticipants(tx, state.awaiting) };
    case 'ROLLING_BACK':
      return { type: 'ROLL_BACK', participants: awaitingParticipants(tx, state.awaiting) };
    case 'COMMITTING':
      return { type: 'COMMIT', participants: awaitingParticipants(tx, state.awaiting) };
    case 'ABORTED':
    case 'COMMITTED':
      return null;
  }
}
