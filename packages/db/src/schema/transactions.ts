import { pgTable, text, timestamp, jsonb } from "drizzle-orm/pg-core";

export const TRANSACTION_PHASES = [
  "INTERACTIVE",
  "VOTING",
  "COMMITTING",
  "ROLLING_BACK",
  "ABORTED",
  "COMMITTED",
] as const;

export const twoPhaseTransactions = pgTable("two_phase_transactions", {
  id: text("id").primaryKey(),
  phase: text("phase", { enum: TRANSACTION_PHASES }).notNull(),
  // Validated on the way out, see fromRow
  snapshot: jsonb("snapshot").$type<unknown>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type TransactionRow = typeof twoPhaseTransactions.$inferSelect;
export type NewTransactionRow = typeof twoPhaseTransactions.$inferInsert;
