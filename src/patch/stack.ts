import {
  PatchConflictError,
  PatchLedgerMismatchError,
  PatchTargetMissingError,
  type PatchAction
} from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import type { TreeFileSystem } from "../tree/types.js";
import { readLedger, writeLedger } from "./ledger.js";
import { sortPatches } from "./load.js";
import { applyFilePatch, invertFilePatch } from "./text.js";
import type { ApplyReport, LedgerEntry, Patch, PatchResult, StackStatus } from "./types.js";

export interface PatchStackOptions {
  log?: Logger;
  now?: () => Date;
  /** Checked between patches; an aborted run stops with the ledger describing what was done. */
  signal?: AbortSignal;
}

/**
 * Checks that the ledger is a prefix of the ordered stack and returns the
 * reason when it is not.
 */
function findLedgerMismatch(ordered: Patch[], ledger: LedgerEntry[]): { patchId: string; detail: string } | null {
  for (let i = 0; i < ledger.length; i++) {
    const entry = ledger[i];
    const patch = ordered[i];
    if (!patch) {
      return { patchId: entry.id, detail: "recorded as applied but no longer part of the patch stack" };
    }
    if (patch.id !== entry.id) {
      return { patchId: entry.id, detail: `recorded at position ${i + 1}, where the stack now has ${patch.id}` };
    }
    if (patch.sha256 !== entry.sha256) {
      return { patchId: entry.id, detail: "patch content changed since it was applied" };
    }
  }
  return null;
}

/**
 * Applies (or, for `reverse`, undoes) one patch. Every file is computed before
 * anything is written, so a conflict leaves the tree exactly as it was.
 */
async function transformTree(
  tree: TreeFileSystem,
  patch: Patch,
  action: PatchAction,
  applied: string[]
): Promise<{ files: string[]; created: string[] }> {
  const filePatches = action === "apply" ? patch.files : [...patch.files].reverse().map(invertFilePatch);
  const staged = new Map<string, string | null>();
  const created = new Set<string>();
  const read = async (relPath: string): Promise<string | null> =>
    staged.has(relPath) ? staged.get(relPath) ?? null : tree.readFile(relPath);
  const conflict = (filePath: string, detail: string) =>
    new PatchConflictError(action, patch.id, filePath, applied, detail);

  for (const filePatch of filePatches) {
    const { oldPath, newPath } = filePatch;

    if (oldPath === null) {
      if (newPath === null) continue;
      if ((await read(newPath)) !== null) {
        throw conflict(newPath, "file to be created already exists");
      }
      const content = applyFilePatch("", filePatch);
      if (content === false) {
        throw conflict(newPath, "hunks do not describe a new file");
      }
      staged.set(newPath, content);
      created.add(newPath);
      continue;
    }

    const current = await read(oldPath);
    if (current === null) {
      throw new PatchTargetMissingError(action, patch.id, oldPath, applied);
    }
    const updated = applyFilePatch(current, filePatch);
    if (updated === false) {
      throw conflict(oldPath, "hunks do not match the current file content");
    }

    if (newPath === null) {
      if (updated !== "") {
        throw conflict(oldPath, "file still has content after removing the patched lines");
      }
      staged.set(oldPath, null);
      created.delete(oldPath);
      continue;
    }
    if (newPath !== oldPath) {
      if ((await read(newPath)) !== null) {
        throw conflict(newPath, "rename destination already exists");
      }
      staged.set(oldPath, null);
      created.delete(oldPath);
      created.add(newPath);
    }
    staged.set(newPath, updated);
  }

  for (const [relPath, content] of staged) {
    if (content === null) {
      await tree.removeFile(relPath);
    } else {
      await tree.writeFile(relPath, content);
    }
  }
  return { files: [...staged.keys()], created: [...created] };
}

/**
 * Applies the stack in ascending identifier order. Patches already recorded in
 * the ledger are reported as `already-applied` and left alone; the first
 * failure stops the run.
 */
export async function applyStack(
  tree: TreeFileSystem,
  patches: readonly Patch[],
  options: PatchStackOptions = {}
): Promise<ApplyReport> {
  const log = options.log ?? rootLog.child("patches");
  const now = options.now ?? (() => new Date());
  const ordered = sortPatches(patches);
  const ledger = await readLedger(tree);
  const entries = [...ledger];

  const mismatch = findLedgerMismatch(ordered, ledger);
  if (mismatch) {
    throw new PatchLedgerMismatchError("apply", mismatch.patchId, entries.map((e) => e.id), mismatch.detail);
  }

  const results: PatchResult[] = ledger.map((entry): PatchResult => ({ id: entry.id, status: "already-applied", files: [] }));
  const pending = ordered.slice(ledger.length);
  if (pending.length === 0) {
    log.info(`All ${ordered.length} patches already applied`);
  }

  for (const patch of pending) {
    if (options.signal?.aborted) {
      log.warn(`Interrupted before ${patch.id}`);
      break;
    }
    log.info(`Applying patch: ${patch.id}`);
    const { files, created } = await transformTree(tree, patch, "apply", entries.map((e) => e.id));
    entries.push({ id: patch.id, sha256: patch.sha256, appliedAt: now().toISOString(), created });
    await writeLedger(tree, entries);
    results.push({ id: patch.id, status: "applied", files });
  }

  return {
    action: "apply",
    results,
    applied: entries.map((e) => e.id),
    noop: pending.length === 0
  };
}

/** Undoes the ledger-recorded patches newest first, stopping on the first that does not reverse cleanly. */
export async function reverseStack(
  tree: TreeFileSystem,
  patches: readonly Patch[],
  options: PatchStackOptions = {}
): Promise<ApplyReport> {
  const log = options.log ?? rootLog.child("patches");
  const ordered = sortPatches(patches);
  const entries = await readLedger(tree);
  const initialCount = entries.length;

  const mismatch = findLedgerMismatch(ordered, entries);
  if (mismatch) {
    throw new PatchLedgerMismatchError("reverse", mismatch.patchId, entries.map((e) => e.id), mismatch.detail);
  }

  const results: PatchResult[] = [];
  for (const patch of [...ordered].reverse()) {
    const last = entries[entries.length - 1];
    if (!last || last.id !== patch.id) {
      results.push({ id: patch.id, status: "not-applied", files: [] });
      continue;
    }
    if (options.signal?.aborted) {
      log.warn(`Interrupted before reversing ${patch.id}`);
      break;
    }
    log.info(`Reversing patch: ${patch.id}`);
    const { files } = await transformTree(tree, patch, "reverse", entries.map((e) => e.id));
    entries.pop();
    await writeLedger(tree, entries);
    results.push({ id: patch.id, status: "reversed", files });
  }

  return {
    action: "reverse",
    results,
    applied: entries.map((e) => e.id),
    noop: initialCount === 0
  };
}

export async function stackStatus(tree: TreeFileSystem, patches: readonly Patch[]): Promise<StackStatus> {
  const ordered = sortPatches(patches);
  const ledger = await readLedger(tree);
  const mismatch = findLedgerMismatch(ordered, ledger);
  if (mismatch) {
    return {
      applied: ledger.map((e) => e.id),
      pending: [],
      mismatch: `${mismatch.patchId}: ${mismatch.detail}`
    };
  }
  return {
    applied: ledger.map((e) => e.id),
    pending: ordered.slice(ledger.length).map((p) => p.id),
    mismatch: null
  };
}
