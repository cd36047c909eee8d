import lockfile from "proper-lockfile";
import type { LockOptions } from "proper-lockfile";

type RetryPolicy = Exclude<LockOptions["retries"], number | undefined>;

/**
 * Exclusive hold on a named resource, shared by every process that uses the same lock path.
 */
export interface Lease {
  readonly lockPath: string;
  release(): Promise<void>;
}

export interface LeaseOptions {
  /**
   * Waits without a deadline by default.
   */
  retries?: RetryPolicy;
}

// A lock whose holder stopped refreshing it for this long is reclaimed.
const STALE_MS = 10_000;

// No deadline: a writer waits as long as another one holds the lease.
const WAIT_FOREVER: RetryPolicy = {
  forever: true,
  factor: 1.5,
  minTimeout: 10,
  maxTimeout: 250,
  randomize: true
};

export const lockPathFor = (resourcePath: string): string => `${resourcePath}.lock`;

export async function acquireLease(resourcePath: string, options: LeaseOptions = {}): Promise<Lease> {
  const lockPath = lockPathFor(resourcePath);
  const release = await lockfile.lock(resourcePath, {
    lockfilePath: lockPath,
    realpath: false,
    stale: STALE_MS,
    retries: options.retries ?? WAIT_FOREVER
  });

  let released = false;
  return {
    lockPath,
    async release() {
      if (released) return;
      released = true;
      await release();
    }
  };
}

/**
 * Runs `critical` while holding the lease; the lease is released on every exit path.
 */
export async function withLease<T>(resourcePath: string, critical: () => Promise<T>): Promise<T> {
  const lease = await acquireLease(resourcePath);
  try {
    return await critical();
  } finally {
    await lease.release();
  }
}
