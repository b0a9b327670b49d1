import type { ContextKey, RunState } from '../types.js';

/** Read-only view handed to anything that is not the in-flight test body. */
export type RunSnapshot = Readonly<RunState>;

/**
 * Writable handle given to exactly one test body. The runner revokes it when
 * the body settles, so a body that leaks the handle cannot write afterwards.
 */
export interface ContextLease {
  readonly testName: string;
  get<K extends ContextKey>(key: K): RunState[K];
  set<K extends ContextKey>(key: K, value: RunState[K]): void;
  clear(key: ContextKey): void;
  snapshot(): RunSnapshot;
}

export class RevokedLeaseError extends Error {
  constructor(testName: string, key: ContextKey) {
    super(`Test "${testName}" wrote "${key}" after it completed`);
    this.name = 'RevokedLeaseError';
  }
}

/** Run-scoped shared state for the current test account and its artifacts. */
export class RunContext {
  private state: RunState = {};
  private activeLease: { testName: string; revoked: boolean } | null = null;

  snapshot(): RunSnapshot {
    return Object.freeze({ ...this.state });
  }

  reset(): void {
    this.state = {};
  }

  /** Issues the single writable lease; any previous lease is revoked. */
  acquire(testName: string): ContextLease {
    if (this.activeLease) {
      this.activeLease.revoked = true;
    }
    const lease = { testName, revoked: false };
    this.activeLease = lease;

    const assertWritable = (key: ContextKey): void => {
      if (lease.revoked) throw new RevokedLeaseError(testName, key);
    };

    return {
      testName,
      get: (key) => this.state[key],
      set: (key, value) => {
        assertWritable(key);
        const next: RunState = { ...this.state };
        next[key] = value;
        this.state = next;
      },
      clear: (key) => {
        assertWritable(key);
        const next = { ...this.state };
        delete next[key];
        this.state = next;
      },
      snapshot: () => this.snapshot(),
    };
  }

  /** Revokes the outstanding lease, if any. */
  release(): void {
    if (this.activeLease) {
      this.activeLease.revoked = true;
      this.activeLease = null;
    }
  }
}
