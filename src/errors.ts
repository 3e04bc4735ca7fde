export type ErrorCode =
  | "CONFIG"
  | "SYNC"
  | "PATCH_CONFLICT"
  | "PATCH_TARGET_MISSING"
  | "PATCH_LEDGER_MISMATCH"
  | "RESOURCE_MISSING"
  | "BUILD"
  | "TREE_LOCKED";

export class ForkstackError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid pinned version, configuration file, flag fragment or patch file. */
export class ConfigError extends ForkstackError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super("CONFIG", issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, options);
    this.issues = issues;
  }
}

export class SyncError extends ForkstackError {
  readonly output?: string;

  constructor(message: string, output?: string, options?: { cause?: unknown }) {
    super("SYNC", message, options);
    this.output = output;
  }
}

export type PatchAction = "apply" | "reverse";

/**
 * Failure while applying or reversing the patch stack. `applied` lists the
 * patches recorded in the ledger at the moment of failure, oldest first, so the
 * caller knows the exact state of the tree.
 */
export abstract class PatchStackError extends ForkstackError {
  readonly action: PatchAction;
  readonly patchId: string;
  readonly applied: string[];

  protected constructor(code: ErrorCode, action: PatchAction, patchId: string, applied: string[], message: string) {
    const appliedList = applied.length > 0 ? applied.join(", ") : "(none)";
    super(code, `${message}\n  already applied: ${appliedList}`);
    this.action = action;
    this.patchId = patchId;
    this.applied = applied;
  }
}

export class PatchConflictError extends PatchStackError {
  readonly filePath: string;

  constructor(action: PatchAction, patchId: string, filePath: string, applied: string[], detail: string) {
    super("PATCH_CONFLICT", action, patchId, applied, `Failed to ${action} patch ${patchId}: ${filePath}: ${detail}`);
    this.filePath = filePath;
  }
}

export class PatchTargetMissingError extends PatchStackError {
  readonly filePath: string;

  constructor(action: PatchAction, patchId: string, filePath: string, applied: string[]) {
    super(
      "PATCH_TARGET_MISSING",
      action,
      patchId,
      applied,
      `Failed to ${action} patch ${patchId}: target file does not exist: ${filePath}`
    );
    this.filePath = filePath;
  }
}

export class PatchLedgerMismatchError extends PatchStackError {
  constructor(action: PatchAction, patchId: string, applied: string[], detail: string) {
    super("PATCH_LEDGER_MISMATCH", action, patchId, applied, `Applied-patch ledger does not match the stack at ${patchId}: ${detail}`);
  }
}

export class ResourceMissingError extends ForkstackError {
  readonly source: string;

  constructor(name: string, source: string) {
    super("RESOURCE_MISSING", `Resource overlay "${name}" source directory not found: ${source}`);
    this.source = source;
  }
}

/** An external tool (build-file generator, build runner, icon or packaging script) exited unsuccessfully. */
export class BuildError extends ForkstackError {
  readonly tool: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(tool: string, exitCode: number | null, output: string) {
    const trimmed = output.trim();
    super("BUILD", `${tool} failed with exit code ${exitCode ?? "unknown"}${trimmed ? `\n${trimmed}` : ""}`);
    this.tool = tool;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class TreeLockedError extends ForkstackError {
  readonly lockPath: string;

  constructor(lockPath: string, holder: string) {
    super("TREE_LOCKED", `Working tree is locked by ${holder} (${lockPath})`);
    this.lockPath = lockPath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
