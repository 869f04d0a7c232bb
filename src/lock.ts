import fs from "node:fs/promises";
import path from "node:path";
import { LockError, errorMessage } from "./errors.js";

export const LOCK_FILE_NAME = ".monitor.lock";

// An ownerless lock younger than this is assumed to be mid-write by another run.
export const LOCK_GRACE_MS = 5000;

const MAX_ATTEMPTS = 3;

export type ReleaseLock = () => Promise<void>;

interface LockState {
  owner: number | null;
  ageMs: number;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else.
    return hasCode(err, "EPERM");
  }
}

function parseOwner(raw: string): number | null {
  const pid = parseInt(raw, 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/** Returns null when the lock file disappeared while it was being inspected. */
async function inspectLock(lockPath: string): Promise<LockState | null> {
  try {
    const stat = await fs.stat(lockPath);
    const owner = parseOwner(await fs.readFile(lockPath, "utf8"));
    return { owner, ageMs: Date.now() - stat.mtimeMs };
  } catch (err) {
    if (hasCode(err, "ENOENT")) return null;
    throw new LockError(`Cannot inspect lock file ${lockPath}: ${errorMessage(err)}`, undefined, { cause: err });
  }
}

function isHeld(state: LockState): boolean {
  if (state.owner === null) return state.ageMs < LOCK_GRACE_MS;
  return state.owner === process.pid || isProcessAlive(state.owner);
}

/**
 * Moves a stale lock aside so only one contender can claim it. Returns false
 * when another run replaced the lock in the meantime.
 */
async function evictStaleLock(lockPath: string, stale: LockState): Promise<boolean> {
  const claimed = `${lockPath}.${process.pid}.${Date.now()}.stale`;
  try {
    await fs.rename(lockPath, claimed);
  } catch (err) {
    if (hasCode(err, "ENOENT")) return true;
    throw new LockError(`Cannot move stale lock ${lockPath}: ${errorMessage(err)}`, undefined, { cause: err });
  }

  try {
    const moved = parseOwner(await fs.readFile(claimed, "utf8"));
    if (moved === stale.owner) return true;

    // Not the file we judged stale: put it back without overwriting a newer lock.
    try {
      await fs.link(claimed, lockPath);
    } catch (err) {
      console.warn(`[LOCK] Could not restore ${lockPath}: ${errorMessage(err)}`);
    }
    return false;
  } finally {
    await fs.rm(claimed, { force: true });
  }
}

/**
 * Takes an exclusive advisory lock on the data directory so overlapping runs
 * cannot interleave their reads and writes of the snapshot store.
 */
export async function acquireRunLock(dataDir: string): Promise<ReleaseLock> {
  const lockPath = path.join(dataDir, LOCK_FILE_NAME);

  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    try {
      await fs.writeFile(lockPath, String(process.pid), { flag: "wx" });
      return async () => {
        await fs.rm(lockPath, { force: true });
      };
    } catch (err) {
      if (!hasCode(err, "EEXIST")) {
        throw new LockError(`Cannot create lock file ${lockPath}: ${errorMessage(err)}`, undefined, { cause: err });
      }
    }

    const state = await inspectLock(lockPath);
    if (!state) continue;
    if (isHeld(state)) {
      const holder = state.owner === null ? "another run" : `another monitor run (pid ${state.owner})`;
      throw new LockError(`${dataDir} is locked by ${holder}`);
    }

    console.warn(`[LOCK] Replacing stale lock ${lockPath}`);
    if (!(await evictStaleLock(lockPath, state))) {
      throw new LockError(`${dataDir} was locked by another run`);
    }
  }

  throw new LockError(`Could not acquire lock ${lockPath}`);
}
