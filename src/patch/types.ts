import type { ParsedDiff } from "diff";
import type { PatchAction } from "../errors.js";

/** One file's worth of a unified diff. `null` paths mean the file is created or deleted. */
export interface FilePatch {
  oldPath: string | null;
  newPath: string | null;
  diff: ParsedDiff;
}

export interface Patch {
  /** Path of the patch file relative to the patch directory, without `.patch`. Defines apply order. */
  id: string;
  sourcePath: string;
  sha256: string;
  files: FilePatch[];
}

export interface LedgerEntry {
  id: string;
  sha256: string;
  appliedAt: string;
  /** Files the patch added; a hard reset leaves them behind as untracked files. */
  created: string[];
}

export type PatchStatus = "applied" | "already-applied" | "reversed" | "not-applied";

export interface PatchResult {
  id: string;
  status: PatchStatus;
  /** Tree paths written or removed; empty when the patch was not touched. */
  files: string[];
}

export interface ApplyReport {
  action: PatchAction;
  results: PatchResult[];
  /** Patches recorded as applied once the run finished, in application order. */
  applied: string[];
  /** True when the run changed nothing in the tree. */
  noop: boolean;
}

export interface StackStatus {
  applied: string[];
  pending: string[];
  /** Why the ledger cannot be reconciled with the stack, or null. */
  mismatch: string | null;
}
