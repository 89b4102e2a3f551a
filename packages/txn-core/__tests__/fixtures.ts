import { createIdentityMachine } from '../src/machine/machine.js';
import type { Transaction, TransitionResult } from '../src/types.js';

export type Txn = Transaction<string, string, string, string>;
export type Step = (tx: Txn, participant: string) => TransitionResult<Txn>;

export const machine = createIdentityMachine<string>();

export const PARTICIPANTS = ['A', 'B', 'C'];

/** Unwrap a successful transition, failing the test otherwise. */
export function unwrap<T>(result: TransitionResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error}: ${result.detail}`);
  }
  return result.transaction;
}

/** Apply `step` for each participant in order. */
export function applyAll(tx: Txn, participants: string[], step: Step): Txn {
  return participants.reduce((acc, participant) => unwrap(step(acc, participant)), tx);
}

/** Awaited participants in insertion order, or null for phases without an awaiting set. */
export function awaitingOf(tx: Txn): string[] | null {
  const { state } = tx;
  if (!('awaiting' in state)) {
    return null;
  }
  const { awaiting } = state;
  return [...tx.participants.keys()].filter((key) => awaiting.has(key));
}

export function interactive(participants: string[] = PARTICIPANTS): Txn {
  return machine.create(participants, { id: 'txn-1', client: 'client-1' });
}

export function voting(participants: string[] = PARTICIPANTS): Txn {
  return unwrap(machine.prepare(interactive(participants)));
}

export function committing(participants: string[] = PARTICIPANTS): Txn {
  return applyAll(voting(participants), participants, machine.prepared);
}

export function rollingBack(participants: string[] = PARTICIPANTS): Txn {
  return unwrap(machine.aborted(voting(participants), participants[0]));
}

export function abortedTxn(participants: string[] = PARTICIPANTS): Txn {
  return applyAll(rollingBack(participants), participants, machine.rolledBack);
}

export function committedTxn(participants: string[] = PARTICIPANTS): Txn {
  return applyAll(committing(participants), participants, machine.committed);
}

/** Deterministic PRNG (mulberry32) for reproducible interleavings. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
