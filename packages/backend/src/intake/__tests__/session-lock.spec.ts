import { ConflictError } from '../intake.errors';
import { SessionLock } from '../session-lock';
import { createDeferred } from './__mocks__/test-utils';

describe('SessionLock', () => {
  describe('reject policy', () => {
    it('should reject a second caller while the first runs', async () => {
      const lock = new SessionLock('reject');
      const gate = createDeferred<string>();

      const first = lock.runExclusive('s1', () => gate.promise);

      await expect(lock.runExclusive('s1', async () => 'second')).rejects.toBeInstanceOf(ConflictError);

      gate.resolve('first');
      await expect(first).resolves.toBe('first');
      await expect(lock.runExclusive('s1', async () => 'after')).resolves.toBe('after');
    });

    it('should not block other sessions', async () => {
      const lock = new SessionLock('reject');
      const gate = createDeferred<void>();

      const first = lock.runExclusive('s1', () => gate.promise);
      await expect(lock.runExclusive('s2', async () => 'other')).resolves.toBe('other');

      gate.resolve();
      await first;
    });

    it('should release the lock when the work fails', async () => {
      const lock = new SessionLock('reject');

      await expect(
        lock.runExclusive('s1', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      await expect(lock.runExclusive('s1', async () => 'again')).resolves.toBe('again');
    });
  });

  describe('queue policy', () => {
    it('should run callers one after another in arrival order', async () => {
      const lock = new SessionLock('queue');
      const gate = createDeferred<void>();
      const events: string[] = [];

      const first = lock.runExclusive('s1', async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
      });
      const second = lock.runExclusive('s1', async () => {
        events.push('second:start');
      });

      await Promise.resolve();
      expect(events).toEqual(['first:start']);

      gate.resolve();
      await Promise.all([first, second]);

      expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    });

    it('should keep going after a queued caller fails', async () => {
      const lock = new SessionLock('queue');

      const failing = lock.runExclusive('s1', async () => {
        throw new Error('boom');
      });
      const next = lock.runExclusive('s1', async () => 'next');

      await expect(failing).rejects.toThrow('boom');
      await expect(next).resolves.toBe('next');
    });
  });
});
