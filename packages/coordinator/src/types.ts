import type { TransactionMachine, TransactionSnapshot } from '@tpc/txn-core';
import type { Logger } from 'pino';

/** A participant's answer to a prepare request. */
export type Vote = 'COMMIT' | 'ABORT';

/**
 * Request/reply channel to participants. A resolved promise is the
 * participant's reply; a rejected one means the request did not get through.
 */
export interface ParticipantTransport<P> {
  prepare(participant: P, txnId: string): Promise<Vote>;
  commit(participant: P, txnId: string): Promise<void>;
  rollBack(participant: P, txnId: string): Promise<void>;
}

export interface StoredTransaction<P, C> {
  id: string;
  snapshot: TransactionSnapshot<P, string, C>;
}

/** Durable home of in-flight transactions. Terminal transactions are deleted. */
export interface TransactionStore<P, C> {
  save(id: string, snapshot: TransactionSnapshot<P, string, C>): Promise<void>;
  list(): Promise<StoredTransaction<P, C>[]>;
  delete(id: string): Promise<void>;
}

export type Outcome = 'COMMITTED' | 'ABORTED';

/** Final outcome, routed back to whoever requested the transaction. */
export interface TransactionOutcome<C> {
  txnId: string;
  client: C | null;
  outcome: Outcome;
}

export interface TransactionResult<R> {
  outcome: Outcome;
  result: R;
}

export interface BeginOptions<P> {
  id?: string;
  participants?: P[];
}

export interface CoordinatorOptions<P, K, C> {
  machine: TransactionMachine<P, K>;
  transport: ParticipantTransport<P>;
  /** Defaults to an in-memory store. */
  store?: TransactionStore<P, C>;
  logger?: Logger;
  onOutcome?: (outcome: TransactionOutcome<C>) => void;
}
