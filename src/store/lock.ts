import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export class LockBusyError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly pid: number,
  ) {
    super(`Another planner process is writing (pid=${pid}, lock=${lockPath}).`);
    this.name = 'LockBusyError';
  }
}

export interface LockOptions {
  filename?: string;
  pid?: number;
  /** Liveness check for the pid recorded in an existing lock. */
  isAlive?: (pid: number) => boolean;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function readLockPid(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'pid' in parsed && typeof parsed.pid === 'number') {
      return parsed.pid;
    }
    return undefined;
  } catch {
    // unreadable or half-written lock: treated as stale
    return undefined;
  }
}

/**
 * Exclusive lock file for the state dir. A lock left behind by a dead process
 * (or one that cannot be read) is taken over.
 */
export async function acquireLock(dir: string, opts: LockOptions = {}): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, opts.filename ?? 'lock');
  const pid = opts.pid ?? process.pid;
  const isAlive = opts.isAlive ?? isProcessAlive;
  const payload = JSON.stringify({ pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (e) {
    if (!(e instanceof Error && 'code' in e && e.code === 'EEXIST')) throw e;

    const otherPid = await readLockPid(lockPath);
    if (otherPid !== undefined && otherPid !== pid && isAlive(otherPid)) {
      throw new LockBusyError(lockPath, otherPid);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch((e: unknown) => {
        if (!(e instanceof Error && 'code' in e && e.code === 'ENOENT')) throw e;
      });
    },
  };
}

/** Run `fn` while holding the state-dir lock. */
export async function withLock<T>(dir: string, fn: () => Promise<T>, opts?: LockOptions): Promise<T> {
  const lock = await acquireLock(dir, opts);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
