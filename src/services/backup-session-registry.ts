import { BackupSessionActiveError } from '../types/errors.js';

export interface BackupSessionLease {
  readonly identity: string;
  release(): void;
}

/**
 * Set of backup session identities currently running. Node runs the check
 * and the insert in one synchronous step, so no two callers can both acquire
 * the same identity.
 */
export class BackupSessionRegistry {
  readonly #active = new Set<string>();

  acquire(identity: string): BackupSessionLease {
    if (this.#active.has(identity)) {
      throw new BackupSessionActiveError(identity);
    }
    this.#active.add(identity);

    let released = false;
    return {
      identity,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.#active.delete(identity);
      },
    };
  }

  /** Holds `identity` for the duration of `fn`, releasing it on every exit path. */
  async run<T>(identity: string, fn: () => Promise<T>): Promise<T> {
    const lease = this.acquire(identity);
    try {
      return await fn();
    } finally {
      lease.release();
    }
  }

  isActive(identity: string): boolean {
    return this.#active.has(identity);
  }

  get activeSessions(): string[] {
    return [...this.#active];
  }
}
