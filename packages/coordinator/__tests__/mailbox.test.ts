import { describe, it, expect } from 'vitest';
import { Mailbox } from '../src/mailbox.js';

describe('Mailbox', () => {
  it('runs tasks one at a time in posting order', async () => {
    const mailbox = new Mailbox();
    const log: string[] = [];

    const slow = mailbox.post(async () => {
      log.push('slow:start');
      await new Promise<void>((resolve) => setTimeout(resolve, 20));
      log.push('slow:end');
      return 1;
    });
    const fast = mailbox.post(() => {
      log.push('fast');
      return 2;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a failed task', async () => {
    const mailbox = new Mailbox();

    const failed = mailbox.post(() => {
      throw new Error('boom');
    });
    const next = mailbox.post(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('counts tasks that have not settled', async () => {
    const mailbox = new Mailbox();
    const first = mailbox.post(() => 'a');
    const second = mailbox.post(() => 'b');

    expect(mailbox.pending).toBe(2);
    await Promise.all([first, second]);
    expect(mailbox.pending).toBe(0);
  });
});
