/**
 * Lockfile guarding a batch root against concurrent runs.
 *
 * Every stage renames and moves folders in the batch root and appends
 * to the status log without further locking, so only one run may work
 * on a batch root at a time.
 *
 * The lockfile is created with O_EXCL and names the holder. A lock is
 * stale when its file cannot be read or its holder is a dead process on
 * this host; a stale lock is taken over once. A holder on another host
 * cannot be checked and always counts as live.
 *
 * @module safety/batch-lock
 */

import { z } from 'zod';
import { open, readFile, unlink } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { hostname } from 'node:os';

const LockHolderSchema = z.object({
  pid: z.number().int().positive(),
  hostname: z.string(),
  command: z.string(),
  startedAt: z.string(),
});

export type LockHolder = z.infer<typeof LockHolderSchema>;

/**
 * Thrown when a batch root is locked by a live run, or when a stale
 * lock could not be taken over.
 */
export class LockError extends Error {
  override name = 'LockError' as const;

  constructor(
    readonly lockPath: string,
    readonly holder: LockHolder | undefined,
    message: string,
  ) {
    super(message);
  }
}

/**
 * Read the holder recorded in `lockPath`.
 *
 * @returns The holder, `undefined` without a lockfile, or `null` when
 *   the lockfile is unreadable
 */
export async function readLockHolder(lockPath: string): Promise<LockHolder | null | undefined> {
  let content: string;
  try {
    content = await readFile(lockPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  const result = LockHolderSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** Whether `holder` is a process that may still be running. */
export function isHolderAlive(holder: LockHolder): boolean {
  if (holder.hostname !== hostname()) {
    return true;
  }
  try {
    // Signal 0 checks existence only
    process.kill(holder.pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return (err as NodeJS.ErrnoException).code === 'EPERM';
  }
}

export class BatchLock {
  private released = false;

  private constructor(
    readonly lockPath: string,
    readonly holder: LockHolder,
  ) {}

  /**
   * Take the lock at `lockPath` for `command`.
   *
   * @throws {LockError} If a live run holds it
   */
  static async acquire(lockPath: string, command: string): Promise<BatchLock> {
    const holder: LockHolder = {
      pid: process.pid,
      hostname: hostname(),
      command,
      startedAt: new Date().toISOString(),
    };

    if (await createLockfile(lockPath, holder)) {
      return new BatchLock(lockPath, holder);
    }

    const existing = await readLockHolder(lockPath);
    if (existing && isHolderAlive(existing)) {
      throw new LockError(
        lockPath,
        existing,
        `Batch is locked by ${existing.command} (PID ${existing.pid} on ${existing.hostname}, started ${existing.startedAt}); remove ${lockPath} if that run is gone`,
      );
    }

    await removeLockfile(lockPath);
    if (await createLockfile(lockPath, holder)) {
      return new BatchLock(lockPath, holder);
    }
    throw new LockError(lockPath, undefined, `Unable to take over stale lockfile ${lockPath}`);
  }

  /** Run `fn` while holding the lock, releasing it however `fn` ends. */
  static async withLock<T>(lockPath: string, command: string, fn: () => Promise<T>): Promise<T> {
    const lock = await BatchLock.acquire(lockPath, command);
    try {
      return await fn();
    } finally {
      await lock.release();
    }
  }

  /**
   * Remove the lockfile. A lockfile since replaced by another holder is
   * left alone.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    const current = await readLockHolder(this.lockPath);
    if (current && current.pid === this.holder.pid && current.startedAt === this.holder.startedAt) {
      await removeLockfile(this.lockPath);
    }
  }
}

/** O_CREAT | O_EXCL create; false if the file already exists. */
async function createLockfile(lockPath: string, holder: LockHolder): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(lockPath, 'wx');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw err;
  }
  try {
    await handle.writeFile(JSON.stringify(holder), 'utf-8');
  } finally {
    await handle.close();
  }
  return true;
}

async function removeLockfile(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw err;
    }
  }
}
