import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { TreeLockedError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import { acquireTreeLock, LOCK_FILE, withTreeLock } from "../src/tree/lock.js";
import { createTempDir, pathExists, removeDir } from "../src/utils/fs.js";

const log = new Logger("test");
const DEAD_PID = 2147483647;

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const tempRoot = await createTempDir("forkstack-lock-");
  try {
    await fn(tempRoot);
  } finally {
    await removeDir(tempRoot);
  }
}

test("the lock is exclusive until released", async () => {
  await withTempDir(async (dir) => {
    const lock = await acquireTreeLock(dir, log);
    const owner: unknown = JSON.parse(await fs.readFile(path.join(dir, LOCK_FILE), "utf8"));
    assert.ok(typeof owner === "object" && owner !== null && "pid" in owner && "host" in owner);
    assert.equal(owner.pid, process.pid);
    assert.equal(owner.host, os.hostname());

    await assert.rejects(acquireTreeLock(dir, log), TreeLockedError);

    await lock.release();
    await lock.release();
    assert.equal(await pathExists(path.join(dir, LOCK_FILE)), false);

    const again = await acquireTreeLock(dir, log);
    await again.release();
  });
});

test("a lock left by a dead process on this host is taken over", async () => {
  await withTempDir(async (dir) => {
    const stale = { pid: DEAD_PID, host: os.hostname(), startedAt: "2026-01-01T00:00:00.000Z" };
    await fs.writeFile(path.join(dir, LOCK_FILE), JSON.stringify(stale));

    const lock = await acquireTreeLock(dir, log);
    const owner: unknown = JSON.parse(await fs.readFile(path.join(dir, LOCK_FILE), "utf8"));
    assert.ok(typeof owner === "object" && owner !== null && "pid" in owner && owner.pid === process.pid);
    await lock.release();
  });
});

test("locks from another host or with unreadable content are never taken over", async () => {
  await withTempDir(async (dir) => {
    const lockPath = path.join(dir, LOCK_FILE);
    await fs.writeFile(lockPath, JSON.stringify({ pid: DEAD_PID, host: "some-other-host", startedAt: "2026-01-01T00:00:00.000Z" }));
    await assert.rejects(acquireTreeLock(dir, log), /locked by pid 2147483647 on some-other-host/);

    await fs.writeFile(lockPath, "not json");
    await assert.rejects(acquireTreeLock(dir, log), /locked by an unknown process/);
  });
});

test("withTreeLock releases the lock when the work fails", async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(
      withTreeLock(dir, async () => {
        throw new Error("boom");
      }, log),
      /boom/
    );
    assert.equal(await pathExists(path.join(dir, LOCK_FILE)), false);
  });
});
