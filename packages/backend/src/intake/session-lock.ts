import { SessionConflictPolicy } from '../config/app.config';
import { ConflictError } from './intake.errors';

/**
 * In-process mutual exclusion per session id.
 *
 * Under `reject` a second caller fails fast with ConflictError while a
 * turn is running; under `queue` callers run one after another in arrival
 * order. Different sessions never wait on each other.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly policy: SessionConflictPolicy = 'reject') {}

  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId);
    if (previous && this.policy === 'reject') {
      throw new ConflictError(sessionId);
    }

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous ? previous.then(() => current) : current;
    this.tails.set(sessionId, tail);

    try {
      if (previous) {
        await previous;
      }
      return await fn();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }
}
