/**
 * Advisory cache lock shared between build processes
 *
 * The lock is a sibling file created with O_EXCL holding the owner PID.
 * A lock whose owner is no longer running (or whose content is unreadable)
 * is taken over.
 */

import { mkdir, open, readFile, rm } from 'node:fs/promises';
import path from 'node:path';

import { CacheLockError, isErrnoException } from '../errors.js';
import type { Logger } from '../logging/logger.js';

/**
 * Check whether a process with the given PID exists
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

export class CacheFileLock {
  private held = false;

  constructor(
    private readonly lockFile: string,
    private readonly log: Logger
  ) {}

  get path(): string {
    return this.lockFile;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Acquire the lock
   *
   * @throws {CacheLockError} if a live process holds it
   */
  async acquire(): Promise<void> {
    if (this.held) {
      return;
    }
    await mkdir(path.dirname(this.lockFile), { recursive: true });

    // Second attempt only after removing a stale lock
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const handle = await open(this.lockFile, 'wx');
        try {
          await handle.writeFile(String(process.pid), 'utf8');
        } finally {
          await handle.close();
        }
        this.held = true;
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }

      const holder = await this.readHolder();
      if (holder !== null && isProcessAlive(holder)) {
        throw new CacheLockError(this.lockFile, holder);
      }
      this.log.warn('Removing stale cache lock', {
        lockFile: this.lockFile,
        holderPid: holder,
      });
      await rm(this.lockFile, { force: true });
    }

    throw new CacheLockError(this.lockFile, await this.readHolder());
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    await rm(this.lockFile, { force: true });
  }

  private async readHolder(): Promise<number | null> {
    try {
      const pid = Number.parseInt((await readFile(this.lockFile, 'utf8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch {
      return null;
    }
  }
}
