import type { TransactionSnapshot } from '@tpc/txn-core';
import type { StoredTransaction, TransactionStore } from './types.js';

/** Process-local store. Survives a coordinator restart, not a process restart. */
export class MemoryTransactionStore<P, C> implements TransactionStore<P, C> {
  private readonly rows = new Map<string, TransactionSnapshot<P, string, C>>();

  async save(id: string, snapshot: TransactionSnapshot<P, string, C>): Promise<void> {
    this.rows.set(id, snapshot);
  }

  async list(): Promise<StoredTransaction<P, C>[]> {
    return [...this.rows].map(([id, snapshot]) => ({ id, snapshot }));
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }

  get(id: string): TransactionSnapshot<P, string, C> | null {
    return this.rows.get(id) ?? null;
  }

  get size(): number {
    return this.rows.size;
  }
}
