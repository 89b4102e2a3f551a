import { z } from "zod";
import { createIdentityMachine } from "@tpc/txn-core";
import { Coordinator, MemoryTransactionStore, createLogger } from "@tpc/coordinator";
import type { Logger, Outcome, TransactionStore } from "@tpc/coordinator";
import { createDb, createDrizzleStore } from "@tpc/db";
import { Account, randomVote } from "./account.js";
import type { Decide } from "./account.js";
import type { Config } from "./config.js";
import { LocalTransport } from "./local-transport.js";
import { transferHalf } from "./transfer.js";

export const ACCOUNT_IDS = ["alice", "bob"] as const;

export interface DemoResult {
  outcome: Outcome;
  amount: number;
  balances: Record<string, number>;
}

export interface MainOptions {
  /** Overrides the random voting driven by ABORT_RATE. */
  decide?: Decide;
}

interface OpenStore {
  store: TransactionStore<string, string>;
  close(): Promise<void>;
}

function openStore(config: Config, logger: Logger): OpenStore {
  if (!config.DATABASE_URL) {
    return { store: new MemoryTransactionStore<string, string>(), close: async () => undefined };
  }
  const db = createDb(config.DATABASE_URL);
  const store = createDrizzleStore(db, {
    schemas: { participant: z.string(), id: z.string(), client: z.string() },
    logger,
  });
  return { store, close: () => db.$client.end() };
}

export async function main(config: Config, options: MainOptions = {}): Promise<DemoResult> {
  const logger = createLogger({ name: "transfer-demo", level: config.LOG_LEVEL });
  const decide = options.decide ?? randomVote(config.ABORT_RATE);
  const accounts = new Map(
    ACCOUNT_IDS.map((id): [string, Account] => [id, new Account(id, config.INITIAL_BALANCE, { decide, logger })]),
  );
  const { store, close } = openStore(config, logger);

  try {
    const coordinator = new Coordinator<string, string, string>({
      machine: createIdentityMachine<string>(),
      transport: new LocalTransport(accounts),
      store,
      logger,
    });
    const resumed = await coordinator.recover();
    if (resumed > 0) {
      logger.info({ resumed }, "Resumed stored transactions");
    }

    const { outcome, result: amount } = await transferHalf({ coordinator, accounts }, "alice", "bob");
    await coordinator.idle();

    const balances = Object.fromEntries([...accounts].map(([id, account]) => [id, account.balance]));
    logger.info({ outcome, amount, balances }, "Transfer finished");
    return { outcome, amount, balances };
  } finally {
    await close();
  }
}
