import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileLock, hasErrorCode, isProcessAlive } from '../../utils/FileLock';

describe('FileLock', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-lock-'));
    filePath = path.join(tempDir, 'ledger.jsonl');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('records the owning process in the lock file', async () => {
    const lock = new FileLock(filePath);

    await expect(lock.acquire()).resolves.toEqual({ acquired: true });

    expect(lock.isHeld()).toBe(true);
    expect(lock.lockPath).toBe(`${filePath}.lock`);
    await expect(lock.readOwner()).resolves.toMatchObject({ filePath, pid: process.pid });
    await lock.release();
  });

  it('reports a live owner instead of taking the lock', async () => {
    const first = new FileLock(filePath);
    await first.acquire();

    const result = await new FileLock(filePath).acquire();

    expect(result.acquired).toBe(false);
    if (!result.acquired) {
      expect(result.owner.pid).toBe(process.pid);
    }
    await first.release();
  });

  it('removes the lock file on release', async () => {
    const lock = new FileLock(filePath);
    await lock.acquire();

    await lock.release();

    expect(lock.isHeld()).toBe(false);
    await expect(lock.readOwner()).resolves.toBeNull();
  });

  it('does not remove a lock it does not hold', async () => {
    const owner = new FileLock(filePath);
    await owner.acquire();

    await new FileLock(filePath).release();

    await expect(fs.access(`${filePath}.lock`)).resolves.toBeUndefined();
    await owner.release();
  });

  it('takes over a lock whose owner has exited', async () => {
    await fs.writeFile(
      `${filePath}.lock`,
      JSON.stringify({ filePath, pid: 999999, acquiredAt: '2024-01-01T00:00:00.000Z' })
    );
    const lock = new FileLock(filePath, { isProcessAlive: (pid) => pid !== 999999 });

    await expect(lock.acquire()).resolves.toEqual({ acquired: true });
    await expect(lock.readOwner()).resolves.toMatchObject({ pid: process.pid });
    await lock.release();
  });

  it('takes over an unreadable lock file', async () => {
    await fs.writeFile(`${filePath}.lock`, 'not json');
    const lock = new FileLock(filePath);

    await expect(lock.acquire()).resolves.toEqual({ acquired: true });
    await lock.release();
  });

  describe('helpers', () => {
    it('detects the current process as alive', () => {
      expect(isProcessAlive(process.pid)).toBe(true);
    });

    it('matches error codes', () => {
      const error = Object.assign(new Error('exists'), { code: 'EEXIST' });

      expect(hasErrorCode(error, 'EEXIST')).toBe(true);
      expect(hasErrorCode(error, 'ENOENT')).toBe(false);
      expect(hasErrorCode('EEXIST', 'EEXIST')).toBe(false);
    });
  });
});
