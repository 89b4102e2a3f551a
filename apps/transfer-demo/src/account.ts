import type { Logger, Vote } from "@tpc/coordinator";
import { AccountLockedError, InsufficientFundsError } from "./errors.js";

/** How an account votes when asked to prepare. */
export type Decide = (account: Account, txnId: string) => Vote;

/** Votes ABORT with probability `abortRate`. */
export function randomVote(abortRate: number): Decide {
  return () => (Math.random() < abortRate ? "ABORT" : "COMMIT");
}

export interface AccountOptions {
  decide?: Decide;
  logger?: Logger;
}

/**
 * A balance that one transaction at a time may stage changes to.
 * The first read or adjust locks the account to that transaction until it
 * commits or rolls back.
 */
export class Account {
  private value: number;
  private staged: number | null = null;
  private lockedBy: string | null = null;
  private readonly decide: Decide;
  private readonly log?: Logger;

  constructor(
    readonly id: string,
    balance: number,
    options: AccountOptions = {},
  ) {
    this.value = balance;
    this.decide = options.decide ?? (() => "COMMIT");
    this.log = options.logger?.child({ account: id });
  }

  /** Committed balance. */
  get balance(): number {
    return this.value;
  }

  get lockHolder(): string | null {
    return this.lockedBy;
  }

  /** Balance as seen by `txnId`, including its staged change. */
  read(txnId: string): number {
    this.lock(txnId);
    return this.staged ?? this.value;
  }

  adjust(txnId: string, delta: number): void {
    const current = this.read(txnId);
    if (current + delta < 0) {
      throw new InsufficientFundsError(this.id, current, delta);
    }
    this.staged = current + delta;
    this.log?.info({ txnId, delta }, "Staged adjustment");
  }

  prepare(txnId: string): Vote {
    if (this.lockedBy !== null && this.lockedBy !== txnId) {
      return "ABORT";
    }
    const vote = this.decide(this, txnId);
    this.log?.info({ txnId, vote }, "Voted");
    return vote;
  }

  commit(txnId: string): void {
    if (this.lockedBy !== txnId) {
      return;
    }
    if (this.staged !== null) {
      this.value = this.staged;
    }
    this.release();
    this.log?.info({ txnId, balance: this.value }, "Committed");
  }

  rollBack(txnId: string): void {
    if (this.lockedBy !== txnId) {
      return;
    }
    this.release();
    this.log?.info({ txnId }, "Rolled back");
  }

  private lock(txnId: string): void {
    if (this.lockedBy !== null && this.lockedBy !== txnId) {
      throw new AccountLockedError(this.id, txnId, this.lockedBy);
    }
    this.lockedBy = txnId;
  }

  private release(): void {
    this.staged = null;
    this.lockedBy = null;
  }
}
