import { SessionBusyError } from './errors.js';

/**
 * Per-user mutual exclusion for session mutations.
 *
 * `tryRun` rejects while the user holds the lock (the transport answers
 * "busy"); `run` queues behind it. Locks live in this process only.
 */
export class UserLock {
  private readonly held = new Map<string, Promise<void>>();

  isHeld(userId: string): boolean {
    return this.held.has(userId);
  }

  /**
   * Runs `fn` under the user's lock, or rejects with SessionBusyError when a
   * previous call is still in flight. The check happens before the first await.
   */
  tryRun<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    if (this.held.has(userId)) {
      return Promise.reject(new SessionBusyError(userId));
    }
    return this.acquire(userId, fn);
  }

  /**
   * Waits for any in-flight call of the same user, then runs `fn`.
   */
  async run<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    let current = this.held.get(userId);
    while (current) {
      await current;
      current = this.held.get(userId);
    }
    return this.acquire(userId, fn);
  }

  private acquire<T>(userId: string, fn: () => Promise<T>): Promise<T> {
    let settle: () => void = () => undefined;
    this.held.set(userId, new Promise<void>(resolve => {
      settle = resolve;
    }));

    return (async () => {
      try {
        return await fn();
      } finally {
        this.held.delete(userId);
        settle();
      }
    })();
  }
}
