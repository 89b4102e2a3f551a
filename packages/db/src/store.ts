import { eq, notInArray } from "drizzle-orm";
import { parseSnapshot } from "@tpc/txn-core";
import type { SnapshotSchemas, TransactionSnapshot } from "@tpc/txn-core";
import { createLogger } from "@tpc/coordinator";
import type { Logger, StoredTransaction, TransactionStore } from "@tpc/coordinator";
import type { Database } from "./client.js";
import { twoPhaseTransactions } from "./schema/index.js";
import type { NewTransactionRow, TransactionRow } from "./schema/index.js";

export type RowParseResult<P, C> =
  | { ok: true; stored: StoredTransaction<P, C> }
  | { ok: false; id: string; detail: string };

export interface DrizzleStoreOptions<P, C> {
  schemas: SnapshotSchemas<P, string, C>;
  logger?: Logger;
}

export function toRow<P, C>(
  id: string,
  snapshot: TransactionSnapshot<P, string, C>,
  now: Date = new Date(),
): NewTransactionRow {
  return { id, phase: snapshot.state.phase, snapshot, updatedAt: now };
}

export function fromRow<P, C>(
  row: Pick<TransactionRow, "id" | "snapshot">,
  schemas: SnapshotSchemas<P, string, C>,
): RowParseResult<P, C> {
  const parsed = parseSnapshot(row.snapshot, schemas);
  if (!parsed.ok) {
    return { ok: false, id: row.id, detail: parsed.detail };
  }
  return { ok: true, stored: { id: row.id, snapshot: parsed.snapshot } };
}

/** TransactionStore on the two_phase_transactions table. Finished transactions are never listed. */
export function createDrizzleStore<P, C>(db: Database, options: DrizzleStoreOptions<P, C>): TransactionStore<P, C> {
  const logger = options.logger ?? createLogger({ name: "db" });

  return {
    async save(id, snapshot) {
      const row = toRow(id, snapshot);
      await db
        .insert(twoPhaseTransactions)
        .values(row)
        .onConflictDoUpdate({
          target: twoPhaseTransactions.id,
          set: { phase: row.phase, snapshot: row.snapshot, updatedAt: row.updatedAt },
        });
    },

    async list() {
      const rows = await db
        .select({ id: twoPhaseTransactions.id, snapshot: twoPhaseTransactions.snapshot })
        .from(twoPhaseTransactions)
        .where(notInArray(twoPhaseTransactions.phase, ["ABORTED", "COMMITTED"]));

      const stored: StoredTransaction<P, C>[] = [];
      for (const row of rows) {
        const result = fromRow(row, options.schemas);
        if (result.ok) {
          stored.push(result.stored);
        } else {
          logger.error({ txnId: result.id, detail: result.detail }, "Skipping unreadable transaction row");
        }
      }
      return stored;
    },

    async delete(id) {
      await db.delete(twoPhaseTransactions).where(eq(twoPhaseTransactions.id, id));
    },
  };
}
