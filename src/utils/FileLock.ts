/**
 * File Lock
 * Exclusive `<file>.lock` marker for single-writer files. A lock whose owning
 * process has exited is stale and gets taken over.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import logger from './logger';

const lockOwnerSchema = z.object({
  filePath: z.string(),
  pid: z.number().int(),
  acquiredAt: z.string(),
});

export type LockOwner = z.infer<typeof lockOwnerSchema>;

export type LockResult = { acquired: true } | { acquired: false; owner: LockOwner };

export interface LockOptions {
  isProcessAlive?: (pid: number) => boolean;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(error, 'EPERM');
  }
}

export class FileLock {
  readonly lockPath: string;
  private readonly isAlive: (pid: number) => boolean;
  private held = false;

  constructor(
    readonly filePath: string,
    options: LockOptions = {}
  ) {
    this.lockPath = `${filePath}.lock`;
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
  }

  /**
   * Take the lock without waiting. A live owner is reported back instead.
   */
  async acquire(): Promise<LockResult> {
    for (let attempt = 0; attempt < 2; attempt++) {
      const owner: LockOwner = {
        filePath: this.filePath,
        pid: process.pid,
        acquiredAt: new Date().toISOString(),
      };

      try {
        await fs.writeFile(this.lockPath, JSON.stringify(owner, null, 2), { flag: 'wx' });
        this.held = true;
        logger.debug('Lock acquired', { filePath: this.filePath, processId: process.pid });
        return { acquired: true };
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw error;
        }
      }

      const current = await this.readOwner();
      if (current && this.isAlive(current.pid)) {
        return { acquired: false, owner: current };
      }

      logger.warn('Removing stale lock', { lockPath: this.lockPath, ownerPid: current?.pid });
      await fs.rm(this.lockPath, { force: true });
    }

    const owner = await this.readOwner();
    return {
      acquired: false,
      owner: owner ?? { filePath: this.filePath, pid: -1, acquiredAt: '' },
    };
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await fs.rm(this.lockPath, { force: true });
    this.held = false;
    logger.debug('Lock released', { filePath: this.filePath });
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Owner recorded in the lock file, or null when it is missing or unreadable.
   */
  async readOwner(): Promise<LockOwner | null> {
    let contents: string;
    try {
      contents = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    try {
      const parsed = lockOwnerSchema.safeParse(JSON.parse(contents));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.warn('Unreadable lock file', { lockPath: this.lockPath, error: String(error) });
      return null;
    }
  }
}
