import { identity } from '../identity.js';
import type { KeyOf } from '../identity.js';
import { fromSnapshot, toSnapshot } from '../snapshot/snapshot.js';
import type { TransactionSnapshot } from '../snapshot/snapshot.js';
import type {
  NextAction,
  Transaction,
  TransactionOptions,
  TransitionResult,
} from '../types.js';
import { nextAction } from './next-action.js';
import {
  aborted,
  addParticipant,
  committed,
  createTransaction,
  getParticipants,
  isTerminal,
  prepare,
  prepared,
  rolledBack,
} from './state-machine.js';

/** Transaction operations bound to one participant identity strategy. */
export interface TransactionMachine<P, K> {
  readonly keyOf: KeyOf<P, K>;

  /** New INTERACTIVE transaction. Duplicate participants collapse to one. */
  create<I = unknown, C = unknown>(
    participants?: Iterable<P>,
    options?: TransactionOptions<I, C>,
  ): Transaction<P, K, I, C>;
  addParticipant<I, C>(tx: Transaction<P, K, I, C>, participant: P): TransitionResult<Transaction<P, K, I, C>>;
  participants(tx: Transaction<P, K, unknown, unknown>): P[];
  nextAction(tx: Transaction<P, K, unknown, unknown>): NextAction<P> | null;
  isTerminal(tx: Transaction<P, K, unknown, unknown>): boolean;

  prepare<I, C>(tx: Transaction<P, K, I, C>): TransitionResult<Transaction<P, K, I, C>>;
  prepared<I, C>(tx: Transaction<P, K, I, C>, participant: P): TransitionResult<Transaction<P, K, I, C>>;
  aborted<I, C>(tx: Transaction<P, K, I, C>, participant: P): TransitionResult<Transaction<P, K, I, C>>;
  rolledBack<I, C>(tx: Transaction<P, K, I, C>, participant: P): TransitionResult<Transaction<P, K, I, C>>;
  committed<I, C>(tx: Transaction<P, K, I, C>, participant: P): TransitionResult<Transaction<P, K, I, C>>;

  snapshot<I, C>(tx: Transaction<P, K, I, C>): TransactionSnapshot<P, I, C>;
  restore<I, C>(snapshot: TransactionSnapshot<P, I, C>): TransitionResult<Transaction<P, K, I, C>>;
}

export function createMachine<P, K>(keyOf: KeyOf<P, K>): TransactionMachine<P, K> {
  return {
    keyOf,
    create: (participants = [], options = {}) => createTransaction(keyOf, participants, options),
    addParticipant: (tx, participant) => addParticipant(keyOf, tx, participant),
    participants: (tx) => getParticipants(tx),
    nextAction: (tx) => nextAction(tx),
    isTerminal: (tx) => isTerminal(tx),
    prepare: (tx) => prepare(tx),
    prepared: (tx, participant) => prepared(keyOf, tx, participant),
    aborted: (tx, participant) => aborted(keyOf, tx, participant),
    rolledBack: (tx, participant) => rolledBack(keyOf, tx, participant),
    committed: (tx, participant) => committed(keyOf, tx, participant),
    snapshot: (tx) => toSnapshot(tx),
    restore: (snapshot) => fromSnapshot(keyOf, snapshot),
  };
}

/** Machine for participants that are their own key (ids, object references). */
export function createIdentityMachine<P>(): TransactionMachine<P, P> {
  return createMachine<P, P>(identity);
}
