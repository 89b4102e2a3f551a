import { randomUUID } from 'node:crypto';
import { TransactionError } from '@tpc/txn-core';
import type { Transaction, TransactionMachine, TransitionResult } from '@tpc/txn-core';
import type { Logger } from 'pino';
import {
  DuplicateTransactionError,
  ProtocolViolationError,
  TransactionQuarantinedError,
  TransitionRejectedError,
  UnknownTransactionError,
} from './errors.js';
import { createLogger } from './logger.js';
import { Mailbox } from './mailbox.js';
import { MemoryTransactionStore } from './memory-store.js';
import type {
  BeginOptions,
  CoordinatorOptions,
  Outcome,
  ParticipantTransport,
  TransactionOutcome,
  TransactionResult,
  TransactionStore,
  Vote,
} from './types.js';

type Request = 'VOTE' | 'COMMIT' | 'ROLL_BACK';

interface Entry<P, K, C> {
  readonly id: string;
  tx: Transaction<P, K, string, C>;
  readonly mailbox: Mailbox;
  readonly log: Logger;
  /** Set after a protocol violation; nothing more is sent or accepted. */
  quarantined: boolean;
}

interface Waiter {
  resolve(outcome: Outcome): void;
  reject(error: Error): void;
}

/**
 * Drives two-phase-commit transactions over a participant transport.
 *
 * Every transaction is owned by one mailbox, so its transitions run one at a
 * time. Each new state is saved before the requests it calls for are sent,
 * which lets `recover` resume from the store alone: it reloads the
 * snapshots and resends whatever `nextAction` says is outstanding.
 *
 * Requests are sent once per phase change. A prepare request that fails
 * counts as a vote to abort; other failed requests are only logged, and
 * `recover` resends everything pending.
 *
 * A participant that votes to abort after voting to commit quarantines the
 * transaction: its state is kept as it was, in memory and in the store, and
 * no outcome is reported for it.
 */
export class Coordinator<P, K, C = unknown> {
  private readonly machine: TransactionMachine<P, K>;
  private readonly transport: ParticipantTransport<P>;
  private readonly store: TransactionStore<P, C>;
  private readonly logger: Logger;
  private readonly onOutcome?: (outcome: TransactionOutcome<C>) => void;

  private readonly entries = new Map<string, Entry<P, K, C>>();
  private readonly waiters = new Map<string, Waiter>();
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: CoordinatorOptions<P, K, C>) {
    this.machine = options.machine;
    this.transport = options.transport;
    this.store = options.store ?? new MemoryTransactionStore<P, C>();
    this.logger = options.logger ?? createLogger();
    this.onOutcome = options.onOutcome;
  }

  /** Number of transactions in flight. */
  get size(): number {
    return this.entries.size;
  }

  get(txnId: string): Transaction<P, K, string, C> | undefined {
    return this.entries.get(txnId)?.tx;
  }

  isQuarantined(txnId: string): boolean {
    return this.entries.get(txnId)?.quarantined ?? false;
  }

  /** Start an INTERACTIVE transaction and persist it. */
  async begin(client: C, options: BeginOptions<P> = {}): Promise<string> {
    const id = options.id ?? randomUUID();
    if (this.entries.has(id)) {
      throw new DuplicateTransactionError(id);
    }
    const tx = this.machine.create(options.participants ?? [], { id, client });
    await this.store.save(id, this.machine.snapshot(tx));

    const entry: Entry<P, K, C> = {
      id,
      tx,
      mailbox: new Mailbox(),
      log: this.logger.child({ txnId: id }),
      quarantined: false,
    };
    this.entries.set(id, entry);
    entry.log.info({ participants: tx.participants.size }, 'Transaction started');
    return id;
  }

  async addParticipant(txnId: string, participant: P): Promise<void> {
    await this.request(txnId, (tx) => this.machine.addParticipant(tx, participant));
  }

  /** Close the transaction to new participants and ask every participant to vote. */
  async prepare(txnId: string): Promise<void> {
    await this.request(txnId, (tx) => this.machine.prepare(tx));
  }

  /**
   * Run `work` inside a new transaction, then drive it to an outcome.
   * If `work` fails (or leaves fewer than two participants) the transaction
   * is discarded before any participant is asked to vote.
   */
  async transaction<R>(client: C, work: (txnId: string) => Promise<R>): Promise<TransactionResult<R>> {
    const txnId = await this.begin(client);

    let result: R;
    try {
      result = await work(txnId);
    } catch (err) {
      await this.discard(txnId);
      throw err;
    }

    const outcome = new Promise<Outcome>((resolve, reject) => {
      this.waiters.set(txnId, { resolve, reject });
    });
    try {
      await this.prepare(txnId);
    } catch (err) {
      this.waiters.delete(txnId);
      await this.discard(txnId);
      throw err;
    }
    return { outcome: await outcome, result };
  }

  // ─── Participant replies ───────────────────────────────────
  // Each returns the refusal reason, or null when the reply was accepted.

  prepared(txnId: string, participant: P): Promise<TransactionError | null> {
    return this.reply(txnId, 'prepared', participant, (tx) => this.machine.prepared(tx, participant));
  }

  aborted(txnId: string, participant: P): Promise<TransactionError | null> {
    return this.reply(txnId, 'aborted', participant, (tx) => this.machine.aborted(tx, participant));
  }

  rolledBack(txnId: string, participant: P): Promise<TransactionError | null> {
    return this.reply(txnId, 'rolledBack', participant, (tx) => this.machine.rolledBack(tx, participant));
  }

  committed(txnId: string, participant: P): Promise<TransactionError | null> {
    return this.reply(txnId, 'committed', participant, (tx) => this.machine.committed(tx, participant));
  }

  /**
   * Reload every stored transaction and resend what is outstanding.
   * Transactions still INTERACTIVE are left in the store: the client that was
   * writing to them is gone. Returns the number of transactions resumed.
   */
  async recover(): Promise<number> {
    const stored = await this.store.list();
    let resumed = 0;

    for (const { id, snapshot } of stored) {
      if (this.entries.has(id)) {
        continue;
      }
      const restored = this.machine.restore(snapshot);
      if (!restored.ok) {
        this.logger.error({ txnId: id, error: restored.error, detail: restored.detail }, 'Stored transaction is invalid');
        continue;
      }
      const tx = restored.transaction;
      if (tx.state.phase === 'INTERACTIVE') {
        this.logger.warn({ txnId: id }, 'Stored transaction was still interactive, leaving it');
        continue;
      }
      if (this.machine.isTerminal(tx)) {
        await this.store.delete(id);
        continue;
      }

      const entry: Entry<P, K, C> = {
        id,
        tx,
        mailbox: new Mailbox(),
        log: this.logger.child({ txnId: id }),
        quarantined: false,
      };
      this.entries.set(id, entry);
      entry.log.info({ phase: tx.state.phase }, 'Transaction recovered');
      this.dispatch(entry);
      resumed++;
    }

    return resumed;
  }

  /** Resolves once no request or reply is in flight. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  private entry(txnId: string): Entry<P, K, C> {
    const entry = this.entries.get(txnId);
    if (!entry) {
      throw new UnknownTransactionError(txnId);
    }
    return entry;
  }

  private describe(participant: P): string {
    return String(this.machine.keyOf(participant));
  }

  /** Client request: a refusal is thrown. */
  private async request(
    txnId: string,
    step: (tx: Transaction<P, K, string, C>) => TransitionResult<Transaction<P, K, string, C>>,
  ): Promise<void> {
    const entry = this.entry(txnId);
    await entry.mailbox.post(async () => {
      if (entry.quarantined) {
        throw new TransactionQuarantinedError(txnId);
      }
      const result = step(entry.tx);
      if (!result.ok) {
        throw new TransitionRejectedError(txnId, result.error, result.detail);
      }
      await this.apply(entry, result.transaction);
    });
  }

  /** Participant reply: recoverable refusals are logged and returned, a broken vote is thrown. */
  private async reply(
    txnId: string,
    event: string,
    participant: P,
    step: (tx: Transaction<P, K, string, C>) => TransitionResult<Transaction<P, K, string, C>>,
  ): Promise<TransactionError | null> {
    const entry = this.entry(txnId);
    return entry.mailbox.post(async () => {
      if (entry.quarantined) {
        throw new TransactionQuarantinedError(txnId);
      }
      const result = step(entry.tx);
      if (result.ok) {
        await this.apply(entry, result.transaction);
        return null;
      }

      const name = this.describe(participant);
      if (result.error === TransactionError.INCONSISTENT_VOTE) {
        const violation = new ProtocolViolationError(txnId, name, result.detail);
        entry.quarantined = true;
        entry.log.fatal({ err: violation, event, participant: name }, 'Participant voted twice with different outcomes');
        this.waiters.get(txnId)?.reject(violation);
        this.waiters.delete(txnId);
        throw violation;
      }
      entry.log.warn({ event, participant: name, error: result.error, detail: result.detail }, 'Reply refused');
      return result.error;
    });
  }

  /** Persist `next`, then send whatever its phase calls for. */
  private async apply(entry: Entry<P, K, C>, next: Transaction<P, K, string, C>): Promise<void> {
    const previous = entry.tx;
    if (next === previous) {
      return;
    }

    if (this.machine.isTerminal(next)) {
      await this.store.delete(entry.id);
      entry.tx = next;
      this.entries.delete(entry.id);
      this.finish(entry, next.state.phase === 'COMMITTED' ? 'COMMITTED' : 'ABORTED');
      return;
    }

    await this.store.save(entry.id, this.machine.snapshot(next));
    entry.tx = next;
    if (next.state.phase !== previous.state.phase) {
      entry.log.info({ from: previous.state.phase, to: next.state.phase }, 'Phase changed');
      this.dispatch(entry);
    }
  }

  private dispatch(entry: Entry<P, K, C>): void {
    const action = this.machine.nextAction(entry.tx);
    if (!action || action.type === 'WRITE_DATA') {
      return;
    }
    const request: Request = action.type;
    for (const participant of action.participants) {
      this.track(() => this.send(entry, request, participant));
    }
  }

  private track(task: () => Promise<void>): void {
    const running: Promise<void> = task().finally(() => {
      this.inflight.delete(running);
    });
    this.inflight.add(running);
  }

  /** Send one request and feed the reply back in. Never rejects. */
  private async send(entry: Entry<P, K, C>, request: Request, participant: P): Promise<void> {
    const txnId = entry.id;
    try {
      switch (request) {
        case 'VOTE': {
          const vote = await this.requestVote(entry, participant);
          await (vote === 'COMMIT' ? this.prepared(txnId, participant) : this.aborted(txnId, participant));
          return;
        }
        case 'COMMIT':
          await this.transport.commit(participant, txnId);
          await this.committed(txnId, participant);
          return;
        case 'ROLL_BACK':
          await this.transport.rollBack(participant, txnId);
          await this.rolledBack(txnId, participant);
          return;
      }
    } catch (err) {
      if (err instanceof ProtocolViolationError || err instanceof TransactionQuarantinedError) {
        // Already logged and handed to the waiting client.
        return;
      }
      entry.log.error({ err, request, participant: this.describe(participant) }, 'Request to participant failed');
    }
  }

  /** A prepare request that does not get through is a vote to abort. */
  private async requestVote(entry: Entry<P, K, C>, participant: P): Promise<Vote> {
    try {
      return await this.transport.prepare(participant, entry.id);
    } catch (err) {
      entry.log.warn({ err, participant: this.describe(participant) }, 'Prepare request failed, voting to abort on its behalf');
      return 'ABORT';
    }
  }

  private finish(entry: Entry<P, K, C>, outcome: Outcome): void {
    entry.log.info({ outcome }, 'Transaction finished');
    this.waiters.get(entry.id)?.resolve(outcome);
    this.waiters.delete(entry.id);
    this.onOutcome?.({ txnId: entry.id, client: entry.tx.client, outcome });
  }

  private async discard(txnId: string): Promise<void> {
    const entry = this.entries.get(txnId);
    this.entries.delete(txnId);
    await this.store.delete(txnId);
    entry?.log.info('Transaction discarded before voting');
  }
}
