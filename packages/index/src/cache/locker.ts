import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import lockfile from 'proper-lockfile';
import { ensureFile, logger as defaultLogger, type Logger } from '@index-meta/shared';

export type ReleaseLock = () => Promise<void>;

/** Cross-process mutual exclusion scoped to a cache directory. */
export interface Locker {
  acquire(dir: string): Promise<ReleaseLock>;
}

/** Zero-length file in the cache directory that holders lock. */
export const LOCK_FILENAME = 'lock';

const RETRY_MIN_MS = 100;
const RETRY_MAX_MS = 2_000;

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export interface FileLockerOptions {
  /** Milliseconds without a refresh after which a lock is taken to be abandoned. */
  staleMs?: number;
  logger?: Logger;
}

/**
 * Locks the zero-length `<dir>/lock` file with proper-lockfile, creating the
 * file if needed. The lock itself is the `lock.lock` directory beside it,
 * refreshed while held; one left behind by a killed process is reclaimed once
 * it goes stale. Waits while another process holds the lock and fails on any
 * other error.
 */
export class FileLocker implements Locker {
  private readonly staleMs: number;
  private readonly logger: Logger;

  constructor(options: FileLockerOptions = {}) {
    this.staleMs = options.staleMs ?? 30_000;
    this.logger = options.logger ?? defaultLogger;
  }

  async acquire(dir: string): Promise<ReleaseLock> {
    const lockPath = path.join(dir, LOCK_FILENAME);
    await ensureFile(lockPath);
    this.logger.debug(`Waiting for lock ${lockPath}`);

    let delay = RETRY_MIN_MS;
    for (;;) {
      try {
        const release = await lockfile.lock(lockPath, {
          realpath: false,
          stale: this.staleMs,
          onCompromised: (error) => {
            this.logger.warn(`Lock ${lockPath} was compromised: ${error.message}`);
          },
        });
        this.logger.debug(`Acquired lock ${lockPath}`);
        return this.releaser(lockPath, release);
      } catch (error) {
        if (errorCode(error) !== 'ELOCKED') {
          throw error;
        }
      }
      await sleep(delay);
      delay = Math.min(delay * 2, RETRY_MAX_MS);
    }
  }

  // A compromised lock was already given up and reported by onCompromised.
  private releaser(lockPath: string, release: () => Promise<void>): ReleaseLock {
    return async () => {
      try {
        await release();
      } catch (error) {
        if (errorCode(error) !== 'ERELEASED') {
          throw error;
        }
        this.logger.debug(`Lock ${lockPath} was already released`);
      }
    };
  }
}

/** For platforms without usable file locking. Concurrent rebuilds race; the last write wins. */
export class NoopLocker implements Locker {
  async acquire(): Promise<ReleaseLock> {
    return async () => {};
  }
}

export type LockingMode = 'file' | 'none';

export function createLocker(mode: LockingMode, logger?: Logger): Locker {
  return mode === 'file' ? new FileLocker({ logger }) : new NoopLocker();
}
