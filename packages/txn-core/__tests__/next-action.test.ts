import { describe, it, expect } from 'vitest';
import { nextAction } from '../src/machine/next-action.js';
import {
  abortedTxn,
  committedTxn,
  committing,
  interactive,
  machine,
  rollingBack,
  unwrap,
  voting,
} from './fixtures.js';

describe('nextAction', () => {
  it('asks for more data while INTERACTIVE', () => {
    expect(nextAction(interactive())).toEqual({ type: 'WRITE_DATA' });
  });

  it('asks for votes from participants that have not voted', () => {
    const tx = unwrap(machine.prepared(voting(), 'B'));
    expect(nextAction(tx)).toEqual({ type: 'VOTE', participants: ['A', 'C'] });
  });

  it('asks only the outstanding participants to commit', () => {
    const tx = unwrap(machine.committed(committing(), 'A'));
    expect(nextAction(tx)).toEqual({ type: 'COMMIT', participants: ['B', 'C'] });
  });

  it('asks only the outstanding participants to roll back', () => {
    const tx = unwrap(machine.rolledBack(rollingBack(), 'C'));
    expect(nextAction(tx)).toEqual({ type: 'ROLL_BACK', participants: ['A', 'B'] });
  });

  it.each([
    ['ABORTED', abortedTxn],
    ['COMMITTED', committedTxn],
  ])('returns null once %s', (_phase, build) => {
    expect(nextAction(build())).toBeNull();
  });

  it('lists participants in the order they joined, whatever the reply order', () => {
    const tx = machine.create(['D', 'B', 'A', 'C']);
    const prepared = unwrap(machine.prepare(tx));
    const afterVote = unwrap(machine.prepared(prepared, 'B'));
    expect(nextAction(afterVote)).toEqual({ type: 'VOTE', participants: ['D', 'A', 'C'] });
  });
});
