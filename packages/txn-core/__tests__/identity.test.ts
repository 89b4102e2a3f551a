import { describe, it, expect } from 'vitest';
import { byField, identity } from '../src/identity.js';
import { createMachine } from '../src/machine/machine.js';
import { TransactionError } from '../src/types.js';
import type { TransitionResult } from '../src/types.js';

interface Shard {
  shardId: string;
  region: string;
}

function unwrap<T>(result: TransitionResult<T>): T {
  if (!result.ok) throw new Error(result.detail);
  return result.transaction;
}

describe('identity strategies', () => {
  it('identity returns the participant itself', () => {
    const shard = { shardId: 's1', region: 'eu' };
    expect(identity(shard)).toBe(shard);
  });

  it('byField keys participants by a field', () => {
    expect(byField<Shard, 'shardId'>('shardId')({ shardId: 's1', region: 'eu' })).toBe('s1');
  });
});

describe('machine with a caller-supplied identity', () => {
  const machine = createMachine(byField<Shard, 'shardId'>('shardId'));
  const s1 = { shardId: 's1', region: 'eu' };
  const s2 = { shardId: 's2', region: 'us' };

  it('treats structurally different values with the same key as one participant', () => {
    const tx = machine.create([s1, s2, { shardId: 's1', region: 'ap' }]);
    expect(machine.participants(tx)).toEqual([{ shardId: 's1', region: 'ap' }, s2]);
  });

  it('matches replies by key, not by reference', () => {
    const tx = unwrap(machine.prepare(machine.create([s1, s2])));
    const voted = unwrap(machine.prepared(tx, { shardId: 's1', region: 'eu' }));
    expect(machine.nextAction(voted)).toEqual({ type: 'VOTE', participants: [s2] });
  });

  it('rejects replies whose key is unknown', () => {
    const tx = unwrap(machine.prepare(machine.create([s1, s2])));
    const result = machine.prepared(tx, { shardId: 's9', region: 'eu' });
    expect(result).toEqual({
      ok: false,
      error: TransactionError.UNKNOWN_PARTICIPANT,
      detail: 'participant s9 is not part of this transaction',
    });
  });

  it('restores snapshots by re-deriving keys', () => {
    const tx = unwrap(machine.prepared(unwrap(machine.prepare(machine.create([s1, s2]))), s2));
    const restored = unwrap(machine.restore(structuredClone(machine.snapshot(tx))));
    expect(machine.nextAction(restored)).toEqual({ type: 'VOTE', participants: [s1] });
  });
});

describe('machine keyed by object reference', () => {
  const machine = createMachine((participant: object) => participant);

  it('distinguishes equal-looking objects', () => {
    const tx = machine.create([{ name: 'a' }, { name: 'a' }]);
    expect(machine.participants(tx)).toHaveLength(2);
  });
});
