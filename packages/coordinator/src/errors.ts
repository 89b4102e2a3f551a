import type { TransactionError } from '@tpc/txn-core';

/**
 * A participant voted to abort after voting to commit. The vote-once
 * contract is broken, so the transaction can no longer be trusted.
 */
export class ProtocolViolationError extends Error {
  constructor(
    public readonly txnId: string,
    public readonly participant: string,
    public readonly detail: string,
  ) {
    super(`Protocol violation in transaction ${txnId} by participant ${participant}: ${detail}`);
    this.name = 'ProtocolViolationError';
  }
}

/** An event named a transaction this coordinator does not own. */
export class UnknownTransactionError extends Error {
  constructor(public readonly txnId: string) {
    super(`Unknown transaction ${txnId}`);
    this.name = 'UnknownTransactionError';
  }
}

/** A transaction with this id is already in flight. */
export class DuplicateTransactionError extends Error {
  constructor(public readonly txnId: string) {
    super(`Transaction ${txnId} already exists`);
    this.name = 'DuplicateTransactionError';
  }
}

/** The state machine refused a client request. */
export class TransitionRejectedError extends Error {
  constructor(
    public readonly txnId: string,
    public readonly error: TransactionError,
    public readonly detail: string,
  ) {
    super(`Transaction ${txnId} rejected the request (${error}): ${detail}`);
    this.name = 'TransitionRejectedError';
  }
}

/** The transaction was stopped after a protocol violation and takes no further events. */
export class TransactionQuarantinedError extends Error {
  constructor(public readonly txnId: string) {
    super(`Transaction ${txnId} is quarantined after a protocol violation`);
    this.name = 'TransactionQuarantinedError';
  }
}
