import { describe, it, expect } from 'vitest';
import { Mailbox } from './mailbox.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Mailbox', () => {
  it('runs commands one at a time in posting order', async () => {
    const mailbox = new Mailbox({ name: 'test' });
    const events: string[] = [];
    const gate = deferred();

    const first = mailbox.post(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mailbox.post(async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(mailbox.pending).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mailbox.pending).toBe(0);
  });

  it('keeps going after a command fails', async () => {
    const mailbox = new Mailbox({ name: 'test' });

    const failing = mailbox.post(async () => {
      throw new Error('boom');
    });
    const next = mailbox.post(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('drops a command whose deadline passed while it waited', async () => {
    let now = 1_000;
    const mailbox = new Mailbox({ name: 'plugins', now: () => now });
    const gate = deferred();
    let ran = false;

    const blocker = mailbox.post(() => gate.promise);
    const stale = mailbox.post(async () => {
      ran = true;
    }, 1_100);

    now = 1_200;
    gate.resolve();
    await blocker;

    await expect(stale).rejects.toMatchObject({
      code: 'PLUGIN_TIMEOUT',
      message: 'plugins: command expired while queued',
    });
    expect(ran).toBe(false);
  });

  it('runs a command whose deadline is still ahead', async () => {
    const mailbox = new Mailbox({ name: 'test', now: () => 0 });
    await expect(mailbox.post(async () => 'done', 10)).resolves.toBe('done');
  });
});
