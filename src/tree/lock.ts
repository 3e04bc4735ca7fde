import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TreeLockedError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { isErrnoException, readTextIfExists } from "../utils/fs.js";

export const LOCK_FILE = ".forkstack.lock";

interface LockOwner {
  pid: number;
  host: string;
  startedAt: string;
}

export interface TreeLock {
  readonly path: string;
  release(): Promise<void>;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrnoException(err) && err.code === "EPERM";
  }
}

function parseOwner(raw: string | null): LockOwner | null {
  if (raw === null) return null;
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === "object" &&
      value !== null &&
      "pid" in value &&
      "host" in value &&
      "startedAt" in value &&
      typeof value.pid === "number" &&
      typeof value.host === "string" &&
      typeof value.startedAt === "string"
    ) {
      return { pid: value.pid, host: value.host, startedAt: value.startedAt };
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Takes the advisory lock at the tree root. A lock left behind by a dead
 * process on this host is taken over; anything else is reported as held.
 */
export async function acquireTreeLock(treeRoot: string, log: Logger = rootLog.child("lock")): Promise<TreeLock> {
  const lockPath = path.join(path.resolve(treeRoot), LOCK_FILE);
  const owner: LockOwner = { pid: process.pid, host: os.hostname(), startedAt: new Date().toISOString() };

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.writeFile(lockPath, `${JSON.stringify(owner)}\n`, { flag: "wx" });
      let released = false;
      return {
        path: lockPath,
        release: async () => {
          if (released) return;
          released = true;
          await fs.rm(lockPath, { force: true });
        }
      };
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "EEXIST") {
        throw err;
      }
    }

    const holder = parseOwner(await readTextIfExists(lockPath));
    if (holder === null || holder.host !== owner.host || isProcessAlive(holder.pid) || attempt > 0) {
      const description = holder ? `pid ${holder.pid} on ${holder.host} since ${holder.startedAt}` : "an unknown process";
      throw new TreeLockedError(lockPath, description);
    }
    log.warn(`Removing stale lock left by pid ${holder.pid}: ${lockPath}`);
    await fs.rm(lockPath, { force: true });
  }
  throw new TreeLockedError(lockPath, "an unknown process");
}

export async function withTreeLock<T>(treeRoot: string, fn: () => Promise<T>, log?: Logger): Promise<T> {
  const lock = await acquireTreeLock(treeRoot, log);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
