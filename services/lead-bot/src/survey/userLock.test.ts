import { describe, expect, it } from 'vitest';
import { SessionBusyError } from './errors.js';
import { UserLock } from './userLock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('UserLock', () => {
  it('rejects a second tryRun for the same user while the first is in flight', async () => {
    const lock = new UserLock();
    const gate = deferred();

    const first = lock.tryRun('42', async () => {
      await gate.promise;
      return 'first';
    });
    const second = lock.tryRun('42', async () => 'second');

    await expect(second).rejects.toBeInstanceOf(SessionBusyError);
    expect(lock.isHeld('42')).toBe(true);

    gate.resolve();
    await expect(first).resolves.toBe('first');
    expect(lock.isHeld('42')).toBe(false);
  });

  it('does not block other users', async () => {
    const lock = new UserLock();
    const gate = deferred();

    const slow = lock.tryRun('1', () => gate.promise);
    await expect(lock.tryRun('2', async () => 'other')).resolves.toBe('other');

    gate.resolve();
    await slow;
  });

  it('run waits for the holder and then runs', async () => {
    const lock = new UserLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.tryRun('7', async () => {
      await gate.promise;
      order.push('first');
    });
    const queued = lock.run('7', async () => {
      order.push('queued');
    });

    gate.resolve();
    await Promise.all([first, queued]);
    expect(order).toEqual(['first', 'queued']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new UserLock();

    await expect(lock.tryRun('9', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isHeld('9')).toBe(false);
    await expect(lock.tryRun('9', async () => 'again')).resolves.toBe('again');
  });
});
