import type { Coordinator, TransactionResult } from "@tpc/coordinator";
import type { Account } from "./account.js";
import { UnknownAccountError } from "./errors.js";

export interface Bank {
  coordinator: Coordinator<string, string, string>;
  accounts: ReadonlyMap<string, Account>;
}

function account(bank: Bank, id: string): Account {
  const found = bank.accounts.get(id);
  if (!found) {
    throw new UnknownAccountError(id);
  }
  return found;
}

/**
 * Move half of `from`'s balance (rounded) to `to` in one transaction.
 * Resolves with the outcome and the amount that was staged.
 */
export async function transferHalf(bank: Bank, from: string, to: string): Promise<TransactionResult<number>> {
  if (from === to) {
    throw new Error(`Cannot transfer from ${from} to itself`);
  }
  const source = account(bank, from);
  const target = account(bank, to);

  return bank.coordinator.transaction(`transfer:${from}->${to}`, async (txnId) => {
    try {
      const amount = Math.round(source.read(txnId) / 2);
      source.adjust(txnId, -amount);
      await bank.coordinator.addParticipant(txnId, source.id);
      target.adjust(txnId, amount);
      await bank.coordinator.addParticipant(txnId, target.id);
      return amount;
    } catch (err) {
      // Nobody was asked to vote yet, so release the locks here.
      source.rollBack(txnId);
      target.rollBack(txnId);
      throw err;
    }
  });
}
