import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseSnapshot } from '../src/snapshot/schema.js';
import type { TransactionSnapshot } from '../src/snapshot/snapshot.js';
import { TransactionError } from '../src/types.js';
import {
  abortedTxn,
  awaitingOf,
  committing,
  interactive,
  machine,
  rollingBack,
  unwrap,
  voting,
} from './fixtures.js';
import type { Txn } from './fixtures.js';

const schemas = { participant: z.string(), id: z.string(), client: z.string() };

describe('snapshot', () => {
  it('stores awaiting participants as values', () => {
    const tx = unwrap(machine.prepared(voting(), 'B'));
    expect(machine.snapshot(tx)).toEqual({
      id: 'txn-1',
      client: 'client-1',
      participants: ['A', 'B', 'C'],
      state: { phase: 'VOTING', awaiting: ['A', 'C'] },
    });
  });

  it('omits awaiting for phases without one', () => {
    expect(machine.snapshot(abortedTxn()).state).toEqual({ phase: 'ABORTED' });
  });

  it('survives a JSON round trip', () => {
    const tx = unwrap(machine.committed(committing(), 'C'));
    const json: unknown = JSON.parse(JSON.stringify(machine.snapshot(tx)));

    const parsed = parseSnapshot(json, schemas);
    if (!parsed.ok) throw new Error(parsed.detail);
    const restored = unwrap(machine.restore(parsed.snapshot));

    expect(restored.state.phase).toBe('COMMITTING');
    expect(awaitingOf(restored)).toEqual(['A', 'B']);
    expect(machine.nextAction(restored)).toEqual(machine.nextAction(tx));
    expect(machine.participants(restored)).toEqual(['A', 'B', 'C']);
    expect(restored.id).toBe('txn-1');
    expect(restored.client).toBe('client-1');
  });

  it.each<[string, () => Txn]>([
    ['INTERACTIVE', () => interactive()],
    ['ROLLING_BACK', () => rollingBack()],
    ['ABORTED', () => abortedTxn()],
  ])('restores %s with the same next action', (_phase, build) => {
    const tx = build();
    const restored = unwrap(machine.restore(machine.snapshot(tx)));
    expect(restored.state.phase).toBe(tx.state.phase);
    expect(machine.nextAction(restored)).toEqual(machine.nextAction(tx));
  });

  it('lets a restored transaction carry on', () => {
    const restored = unwrap(machine.restore(machine.snapshot(voting(['A', 'B']))));
    const tx = unwrap(machine.prepared(unwrap(machine.prepared(restored, 'A')), 'B'));
    expect(tx.state.phase).toBe('COMMITTING');
  });
});

describe('restore', () => {
  const base: TransactionSnapshot<string, string, string> = {
    id: 'txn-1',
    client: null,
    participants: ['A', 'B'],
    state: { phase: 'VOTING', awaiting: ['A'] },
  };

  it('rejects awaited participants that are not part of the transaction', () => {
    const result = machine.restore({ ...base, state: { phase: 'VOTING', awaiting: ['A', 'X'] } });
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'awaited participant X is not part of this transaction',
    });
  });

  it('rejects duplicate participants', () => {
    const result = machine.restore({ ...base, participants: ['A', 'B', 'A'] });
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'duplicate participant A',
    });
  });

  it('rejects an awaiting phase with nobody left to wait for', () => {
    const result = machine.restore({ ...base, state: { phase: 'COMMITTING', awaiting: [] } });
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'phase COMMITTING has no awaited participants',
    });
  });
});

describe('parseSnapshot', () => {
  it('accepts a valid snapshot and defaults missing id and client to null', () => {
    const result = parseSnapshot(
      { participants: ['A', 'B'], state: { phase: 'INTERACTIVE' } },
      schemas,
    );
    expect(result).toEqual({
      ok: true,
      snapshot: { id: null, client: null, participants: ['A', 'B'], state: { phase: 'INTERACTIVE' } },
    });
  });

  it('rejects an unknown phase', () => {
    const result = parseSnapshot({ participants: [], state: { phase: 'PAUSED' } }, schemas);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(TransactionError.INVALID_SNAPSHOT);
      expect(result.detail.startsWith('state.phase: ')).toBe(true);
    }
  });

  it('checks participants against the caller schema', () => {
    const result = parseSnapshot({ participants: ['A', 7], state: { phase: 'INTERACTIVE' } }, schemas);
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'participants.1: Expected string, received number',
    });
  });

  it('checks awaited participants against the caller schema', () => {
    const result = parseSnapshot(
      { participants: ['A'], state: { phase: 'VOTING', awaiting: [false] } },
      schemas,
    );
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'state.awaiting.0: Expected string, received boolean',
    });
  });

  it('checks the client against the caller schema', () => {
    const result = parseSnapshot(
      { client: 42, participants: [], state: { phase: 'COMMITTED' } },
      schemas,
    );
    expect(result).toEqual({
      ok: false,
      error: TransactionError.INVALID_SNAPSHOT,
      detail: 'client: Expected string, received number',
    });
  });
});
