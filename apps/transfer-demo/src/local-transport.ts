import type { ParticipantTransport, Vote } from "@tpc/coordinator";
import type { Account } from "./account.js";
import { UnknownAccountError } from "./errors.js";

/** Delivers coordinator requests to accounts living in this process, keyed by account id. */
export class LocalTransport implements ParticipantTransport<string> {
  constructor(private readonly accounts: ReadonlyMap<string, Account>) {}

  async prepare(participant: string, txnId: string): Promise<Vote> {
    return this.account(participant).prepare(txnId);
  }

  async commit(participant: string, txnId: string): Promise<void> {
    this.account(participant).commit(txnId);
  }

  async rollBack(participant: string, txnId: string): Promise<void> {
    this.account(participant).rollBack(txnId);
  }

  private account(id: string): Account {
    const account = this.accounts.get(id);
    if (!account) {
      throw new UnknownAccountError(id);
    }
    return account;
  }
}
